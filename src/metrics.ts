import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client from 'prom-client';

/**
 * Runtime Prometheus metrics.
 *
 * prom-client Histogram.startTimer() measures seconds; this module records
 * milliseconds to match the *_ms metric names.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'call_pipeline_runtime_';

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (Express)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000],
  registers: [register],
});

const stageDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}stage_duration_ms`,
  help: 'Pipeline stage duration in milliseconds (stt/rag/llm/tts/total)',
  labelNames: ['stage', 'tenant'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2000, 2500, 5000, 10000, 20000],
  registers: [register],
});

const stageErrorsTotal = new client.Counter({
  name: `${METRICS_PREFIX}stage_errors_total`,
  help: 'Pipeline stage failures after fallback was exhausted',
  labelNames: ['stage', 'tenant'] as const,
  registers: [register],
});

const providerFallbacksTotal = new client.Counter({
  name: `${METRICS_PREFIX}provider_fallbacks_total`,
  help: 'Invocations that were served by the fallback provider',
  labelNames: ['capability', 'tenant'] as const,
  registers: [register],
});

const inboundAudioFramesTotal = new client.Counter({
  name: `${METRICS_PREFIX}inbound_audio_frames_total`,
  help: 'Inbound media frames appended to a call buffer',
  registers: [register],
});

const inboundAudioFramesDroppedTotal = new client.Counter({
  name: `${METRICS_PREFIX}inbound_audio_frames_dropped_total`,
  help: 'Inbound media frames dropped before buffering',
  labelNames: ['reason'] as const,
  registers: [register],
});

const protocolEventsIgnoredTotal = new client.Counter({
  name: `${METRICS_PREFIX}protocol_events_ignored_total`,
  help: 'Malformed or unknown media stream events',
  labelNames: ['reason'] as const,
  registers: [register],
});

const bufferFlushesTotal = new client.Counter({
  name: `${METRICS_PREFIX}buffer_flushes_total`,
  help: 'Audio buffer flushes by trigger',
  labelNames: ['trigger'] as const,
  registers: [register],
});

const callCompletionsTotal = new client.Counter({
  name: `${METRICS_PREFIX}call_completions_total`,
  help: 'Calls finalized',
  labelNames: ['tenant', 'status'] as const,
  registers: [register],
});

const callDurationSeconds = new client.Histogram({
  name: `${METRICS_PREFIX}call_duration_seconds`,
  help: 'Call duration in seconds',
  labelNames: ['tenant'] as const,
  buckets: [5, 10, 30, 60, 120, 300, 600],
  registers: [register],
});

const callTurns = new client.Histogram({
  name: `${METRICS_PREFIX}call_turns`,
  help: 'Transcript messages per call',
  labelNames: ['tenant'] as const,
  buckets: [0, 1, 2, 3, 5, 10, 20, 50],
  registers: [register],
});

const activeCalls = new client.Gauge({
  name: `${METRICS_PREFIX}active_calls`,
  help: 'Calls with an open media socket',
  registers: [register],
});

// ---------- helpers ----------

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

// Avoid high-cardinality route labels
function getRouteLabel(req: Request): string {
  const route: unknown = req.route;
  const routePath =
    route && typeof route === 'object' && 'path' in route && typeof route.path === 'string'
      ? route.path
      : undefined;

  if (routePath) return req.baseUrl ? `${req.baseUrl}${routePath}` : routePath;

  const raw = req.path || req.url || 'unknown';
  return raw
    .replace(/\bCA[0-9a-f]{32}\b/gi, ':call_sid')
    .replace(/\b[0-9a-f]{16,}\b/gi, ':id')
    .replace(/\b\d{6,}\b/g, ':n');
}

// ---------- exports used by server ----------

export const metricsMiddleware: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
  const start = nowNs();

  res.on('finish', () => {
    try {
      httpRequestDurationMs.observe(
        { method: req.method, route: getRouteLabel(req), code: String(res.statusCode) },
        nsToMs(nowNs() - start),
      );
    } catch {
      // never break requests due to metrics
    }
  });

  next();
};

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
}

// ---------- pipeline API ----------

export function observeStageDuration(stage: string, tenant: string | undefined, durationMs: number): void {
  stageDurationMs.observe({ stage, tenant: tenant ?? 'unknown' }, durationMs);
}

export function incStageError(stage: string, tenant: string | undefined): void {
  stageErrorsTotal.inc({ stage, tenant: tenant ?? 'unknown' });
}

export function incProviderFallback(capability: string, tenant: string | undefined): void {
  providerFallbacksTotal.inc({ capability, tenant: tenant ?? 'unknown' });
}

export function incInboundAudioFrames(count = 1): void {
  inboundAudioFramesTotal.inc(count);
}

export function incInboundAudioFramesDropped(reason: string, count = 1): void {
  const label = reason && reason.trim() !== '' ? reason : 'unknown';
  inboundAudioFramesDroppedTotal.inc({ reason: label }, count);
}

export function incProtocolEventIgnored(reason: string): void {
  protocolEventsIgnoredTotal.inc({ reason });
}

export function incBufferFlush(trigger: 'threshold' | 'stop' | 'teardown'): void {
  bufferFlushesTotal.inc({ trigger });
}

export function setActiveCalls(count: number): void {
  activeCalls.set(count);
}

export function recordCallMetrics(opts: {
  tenantId?: string;
  status: string;
  durationSeconds: number;
  turns: number;
}): void {
  const tenant = opts.tenantId ?? 'unknown';
  callCompletionsTotal.inc({ tenant, status: opts.status });
  callDurationSeconds.observe({ tenant }, opts.durationSeconds);
  callTurns.observe({ tenant }, opts.turns);
}
