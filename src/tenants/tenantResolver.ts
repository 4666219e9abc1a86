import { env } from '../env';
import { log } from '../log';
import type { CallContext, CallSid } from '../calls/types';
import type { TenantKeyValueStore } from '../redis/client';

export interface TenantResolver {
  resolveTenant(context: CallContext): Promise<string | null>;
}

export function normalizeE164(toNumber: string): string {
  return toNumber.trim().replace(/[\s\-().]/g, '');
}

/**
 * Tenant lookup for an inbound call. Sources, in order: the `tenantId`
 * stream parameter written by the inbound webhook, the per-call mapping the
 * webhook stored, then the dialed-number mapping.
 */
export class RedisTenantResolver implements TenantResolver {
  private readonly redis: TenantKeyValueStore;
  private readonly prefix: string;

  constructor(redis: TenantKeyValueStore, options: { prefix?: string } = {}) {
    this.redis = redis;
    this.prefix = options.prefix ?? env.TENANTMAP_PREFIX;
  }

  public didKey(toNumber: string): string {
    return `${this.prefix}:did:${normalizeE164(toNumber)}`;
  }

  public callKey(callSid: CallSid): string {
    return `${this.prefix}:call:${callSid}`;
  }

  public async resolveTenant(context: CallContext): Promise<string | null> {
    const fromParams = context.customParameters.tenantId?.trim();
    if (fromParams) {
      return fromParams;
    }

    const fromCall = await this.read(this.callKey(context.callSid), { call_sid: context.callSid });
    if (fromCall) {
      return fromCall;
    }

    if (context.to) {
      return this.resolveByDid(context.to);
    }
    return null;
  }

  public async resolveByDid(toNumber: string): Promise<string | null> {
    const normalized = normalizeE164(toNumber);
    if (!normalized) {
      return null;
    }
    return this.read(this.didKey(normalized), { did: normalized });
  }

  public async rememberCallTenant(
    callSid: CallSid,
    tenantId: string,
    ttlSeconds: number = env.CALL_TENANT_TTL_SECONDS,
  ): Promise<void> {
    try {
      await this.redis.setex(this.callKey(callSid), ttlSeconds, tenantId);
    } catch (error) {
      log.warn(
        { event: 'call_tenant_store_failed', call_sid: callSid, tenant_id: tenantId, err: error },
        'call tenant mapping not stored',
      );
    }
  }

  private async read(key: string, context: Record<string, unknown>): Promise<string | null> {
    try {
      const value = await this.redis.get(key);
      return value && value.trim() !== '' ? value.trim() : null;
    } catch (error) {
      log.error({ event: 'tenant_resolve_failed', err: error, key, ...context }, 'tenant resolve failed');
      return null;
    }
  }
}
