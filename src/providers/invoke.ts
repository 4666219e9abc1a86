import { ProviderTimeoutError, RetrievalError, StageError, errorMessage } from '../errors';
import { log } from '../log';
import { incProviderFallback } from '../metrics';
import type { Capability, CapabilityProvider, ResolvedCapability } from './types';

export type ServedBy = 'primary' | 'fallback';

export interface InvocationResult<T> {
  value: T;
  servedBy: ServedBy;
  providerId: string;
}

export interface InvokeOptions {
  timeoutMs: number;
  tenantId?: string;
  logContext?: Record<string, unknown>;
}

/**
 * Runs `fn` with an abort signal and rejects with ProviderTimeoutError once
 * `timeoutMs` elapses. The signal is aborted on timeout so HTTP clients stop.
 */
export async function withTimeout<T>(
  providerId: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new ProviderTimeoutError(providerId, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([Promise.resolve().then(() => fn(controller.signal)), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

function exhausted(capability: Capability, error: unknown, details: Record<string, unknown>): Error {
  const message = `${capability} providers exhausted: ${errorMessage(error)}`;
  if (capability === 'embedding') {
    return new RetrievalError(message, details, { cause: error });
  }
  return new StageError(capability, message, details, { cause: error });
}

/**
 * Primary first, then exactly one fallback attempt when configured. A timeout
 * counts as a failure. Exhaustion surfaces as StageError, or RetrievalError
 * for the embedding capability.
 */
export async function invokeWithFallback<P extends CapabilityProvider, T>(
  resolved: ResolvedCapability<P>,
  fn: (provider: P, signal: AbortSignal) => Promise<T>,
  opts: InvokeOptions,
): Promise<InvocationResult<T>> {
  const { capability, primary, fallback } = resolved;
  const baseLog = { capability, tenant_id: opts.tenantId, ...(opts.logContext ?? {}) };

  try {
    const value = await withTimeout(primary.providerId, opts.timeoutMs, (signal) => fn(primary.provider, signal));
    return { value, servedBy: 'primary', providerId: primary.providerId };
  } catch (primaryError) {
    log.warn(
      {
        event: 'provider_primary_failed',
        ...baseLog,
        provider_id: primary.providerId,
        model: primary.model,
        has_fallback: Boolean(fallback),
        err: primaryError,
      },
      'primary provider failed',
    );

    if (!fallback) {
      throw exhausted(capability, primaryError, { primary: primary.providerId });
    }

    try {
      const value = await withTimeout(fallback.providerId, opts.timeoutMs, (signal) => fn(fallback.provider, signal));
      incProviderFallback(capability, opts.tenantId);
      log.info(
        { event: 'provider_fallback_served', ...baseLog, provider_id: fallback.providerId, model: fallback.model },
        'fallback provider served request',
      );
      return { value, servedBy: 'fallback', providerId: fallback.providerId };
    } catch (fallbackError) {
      log.error(
        {
          event: 'provider_fallback_failed',
          ...baseLog,
          provider_id: fallback.providerId,
          model: fallback.model,
          err: fallbackError,
        },
        'fallback provider failed',
      );
      throw exhausted(capability, fallbackError, { primary: primary.providerId, fallback: fallback.providerId });
    }
  }
}
