import { Router } from 'express';
import { log } from '../log';
import type { ProbeResult } from '../providers/registry';

export interface HealthDeps {
  pingRedis: () => Promise<string>;
  /** Provider probes for the deep check; absent when no probe tenant is configured. */
  probeProviders?: () => Promise<ProbeResult[]>;
  activeCalls: () => number;
  startedAt?: number;
}

interface CheckResult {
  ok: boolean;
  latency_ms: number;
  error?: string;
}

export interface HealthReport {
  status: 'ok' | 'degraded' | 'unhealthy';
  checks: { redis: CheckResult; providers?: ProbeResult[] };
  active_calls: number;
  uptime_seconds: number;
}

async function checkRedis(ping: () => Promise<string>): Promise<CheckResult> {
  const start = Date.now();
  try {
    await ping();
    return { ok: true, latency_ms: Date.now() - start };
  } catch (error) {
    return { ok: false, latency_ms: Date.now() - start, error: error instanceof Error ? error.message : 'unknown' };
  }
}

export async function evaluateHealth(
  deps: HealthDeps,
  options: { deep: boolean },
): Promise<{ statusCode: number; report: HealthReport }> {
  const redis = await checkRedis(deps.pingRedis);
  const checks: HealthReport['checks'] = { redis };

  let providersOk = true;
  if (options.deep && deps.probeProviders) {
    try {
      checks.providers = await deps.probeProviders();
      providersOk = checks.providers.every((probe) => probe.healthy);
    } catch (error) {
      log.warn({ event: 'health_probe_failed', err: error }, 'provider health probe failed');
      providersOk = false;
    }
  }

  const status: HealthReport['status'] = !redis.ok ? 'unhealthy' : providersOk ? 'ok' : 'degraded';
  return {
    statusCode: status === 'unhealthy' ? 503 : 200,
    report: {
      status,
      checks,
      active_calls: deps.activeCalls(),
      uptime_seconds: Math.floor((Date.now() - (deps.startedAt ?? Date.now())) / 1000),
    },
  };
}

export function createHealthRouter(deps: HealthDeps): Router {
  const router = Router();
  const startedAt = deps.startedAt ?? Date.now();

  router.get('/live', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  router.get('/', async (req, res) => {
    const deep = req.query.deep === '1' || req.query.deep === 'true';
    const { statusCode, report } = await evaluateHealth({ ...deps, startedAt }, { deep });
    if (statusCode !== 200) {
      log.warn({ event: 'health_unhealthy', checks: report.checks }, 'health check failed');
    }
    res.status(statusCode).json(report);
  });

  return router;
}
