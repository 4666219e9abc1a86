import { randomUUID } from 'crypto';
import express, { type NextFunction, type Request, type Response } from 'express';
import http from 'http';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import type { SessionManager } from './calls/sessionManager';
import { env } from './env';
import { log } from './log';
import { incProtocolEventIgnored, metricsHandler, metricsMiddleware } from './metrics';
import { createHealthRouter, type HealthDeps } from './routes/health';
import { createVoiceWebhookRouter, MEDIA_PATH_PREFIX, type VoiceWebhookDeps } from './routes/voiceWebhook';

export interface ServerDeps {
  sessionManager: SessionManager;
  health: Omit<HealthDeps, 'activeCalls'>;
  webhook: VoiceWebhookDeps;
  mediaStreamToken?: string;
}

function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  res.locals.requestId = requestId;
  next();
}

function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  log.error({ event: 'http_unhandled_error', err, request_id: res.locals.requestId }, 'unhandled error');
  res.status(500).json({ error: 'internal_server_error' });
}

export function parseMediaRequest(rawUrl: string | undefined, host = 'localhost'): { callSid: string; token: string | null } | null {
  if (!rawUrl) {
    return null;
  }

  const url = new URL(rawUrl, `http://${host}`);
  if (!url.pathname.startsWith(MEDIA_PATH_PREFIX)) {
    return null;
  }

  const callSid = decodeURIComponent(url.pathname.slice(MEDIA_PATH_PREFIX.length));
  if (!callSid || callSid.includes('/')) {
    return null;
  }

  return { callSid, token: url.searchParams.get('token') };
}

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

function bindMediaSocket(ws: WebSocket, callSid: string, sessionManager: SessionManager): void {
  const session = sessionManager.openSession(callSid, ws);
  if (!session) {
    return;
  }

  ws.on('message', (data, isBinary) => {
    if (isBinary) {
      incProtocolEventIgnored('binary_frame');
      return;
    }
    void session.handleMessage(rawDataToString(data));
  });

  ws.on('close', (code, reason) => {
    void session.handleSocketClosed(code, reason.toString('utf8'));
  });

  ws.on('error', (error) => {
    void session.handleSocketError(error);
  });
}

function attachMediaWebSocketServer(server: http.Server, deps: ServerDeps): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });
  const expectedToken = deps.mediaStreamToken ?? env.MEDIA_STREAM_TOKEN;

  server.on('upgrade', (request, socket, head) => {
    const parsed = parseMediaRequest(request.url, request.headers.host);
    if (!parsed) {
      socket.destroy();
      return;
    }

    if (!parsed.token || parsed.token !== expectedToken) {
      log.warn({ event: 'media_upgrade_unauthorized', call_sid: parsed.callSid }, 'media upgrade rejected');
      socket.destroy();
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      log.info({ event: 'media_socket_open', call_sid: parsed.callSid }, 'media socket open');
      bindMediaSocket(ws, parsed.callSid, deps.sessionManager);
    });
  });

  return wss;
}

export function buildServer(deps: ServerDeps): { app: express.Express; server: http.Server; wss: WebSocketServer } {
  const app = express();

  app.disable('x-powered-by');
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));
  app.use(requestIdMiddleware);
  app.use(metricsMiddleware);

  app.use('/health', createHealthRouter({ ...deps.health, activeCalls: () => deps.sessionManager.getActiveSessionCount() }));
  app.get('/metrics', (req, res, next) => {
    metricsHandler(req, res).catch(next);
  });
  app.use('/v1/voice', createVoiceWebhookRouter(deps.webhook));

  app.use(errorHandler);

  const server = http.createServer(app);
  const wss = attachMediaWebSocketServer(server, deps);

  return { app, server, wss };
}
