import { SessionManager } from './calls/sessionManager';
import { ConversationSessionStore } from './conversation/sessionStore';
import { env } from './env';
import { HttpKnowledgeRetriever } from './knowledge/retriever';
import { log } from './log';
import { ControlPlaneCallPersistence } from './persistence/callPersistence';
import { VoicePipeline } from './pipeline/voicePipeline';
import { probeProviders, resolveProviderConfig } from './providers/registry';
import { closeRedisClient, getRedisClient } from './redis/client';
import { buildServer } from './server';
import { RedisAgentConfigSource } from './tenants/agentConfig';
import { RedisTenantResolver } from './tenants/tenantResolver';

const SHUTDOWN_TIMEOUT_MS = 30_000;

const redis = getRedisClient();
const tenantResolver = new RedisTenantResolver(redis);
const agentConfigs = new RedisAgentConfigSource(redis);
const store = new ConversationSessionStore({ windowSize: env.HISTORY_WINDOW_SIZE });
const retriever = env.KNOWLEDGE_SEARCH_URL
  ? new HttpKnowledgeRetriever({ url: env.KNOWLEDGE_SEARCH_URL, apiKey: env.KNOWLEDGE_API_KEY })
  : undefined;
const persistence = new ControlPlaneCallPersistence();
const pipeline = new VoicePipeline({ store, agentConfigs, retriever });
const sessionManager = new SessionManager({ pipeline, store, tenantResolver, persistence });

const probeTenantId = env.HEALTH_DEEP_TENANT_ID;
const { server, wss } = buildServer({
  sessionManager,
  health: {
    pingRedis: () => redis.ping(),
    probeProviders: probeTenantId
      ? async () => probeProviders(resolveProviderConfig(await agentConfigs.getAgentConfig(probeTenantId)))
      : undefined,
  },
  webhook: { tenants: tenantResolver, agentConfigs },
});

let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    log.warn({ event: 'shutdown_in_progress', signal }, 'shutdown already in progress');
    return;
  }
  isShuttingDown = true;
  log.info({ event: 'shutdown_started', signal, active_calls: sessionManager.getActiveSessionCount() }, 'graceful shutdown initiated');

  server.close(() => {
    log.info({ event: 'http_server_closed' }, 'http server closed');
  });

  const forceExit = setTimeout(() => {
    log.warn({ event: 'shutdown_timeout', active_calls: sessionManager.getActiveSessionCount() }, 'shutdown timeout reached, forcing exit');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forceExit.unref();

  await sessionManager.teardownAll('server_shutdown');
  wss.close();
  await closeRedisClient();

  log.info({ event: 'shutdown_complete' }, 'shutdown complete');
  process.exit(0);
}

process.on('SIGTERM', () => {
  void gracefulShutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void gracefulShutdown('SIGINT');
});

process.on('uncaughtException', (error) => {
  log.fatal({ event: 'uncaught_exception', err: error }, 'uncaught exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  log.error({ event: 'unhandled_rejection', reason }, 'unhandled rejection');
});

redis.connect().catch((error: unknown) => {
  log.error({ event: 'redis_connect_failed', err: error }, 'redis connect failed');
});

server.listen(env.PORT, () => {
  log.info({ event: 'server_listening', port: env.PORT }, 'server listening');
});
