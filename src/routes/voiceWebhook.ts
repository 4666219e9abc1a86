import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { env } from '../env';
import { ConfigurationError } from '../errors';
import { log } from '../log';
import type { AgentConfigSource } from '../tenants/agentConfig';
import type { RedisTenantResolver } from '../tenants/tenantResolver';

export const MEDIA_PATH_PREFIX = '/v1/voice/media/';

export const UNAVAILABLE_MESSAGE = 'Sorry, this number is not available right now. Goodbye.';

export type InboundTenantDirectory = Pick<RedisTenantResolver, 'resolveByDid' | 'rememberCallTenant'>;

export interface VoiceWebhookDeps {
  tenants: InboundTenantDirectory;
  agentConfigs: AgentConfigSource;
  publicBaseUrl?: string;
  mediaStreamToken?: string;
}

const InboundCallSchema = z.object({
  CallSid: z.string().min(1),
  AccountSid: z.string().optional(),
  From: z.string().optional(),
  To: z.string().optional(),
});

export interface InboundCallOutcome {
  status: number;
  twiml: string;
  tenantId?: string;
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function buildMediaStreamUrl(publicBaseUrl: string, callSid: string, token: string): string {
  const trimmedBase = publicBaseUrl.replace(/\/$/, '');
  let wsBase = trimmedBase;
  if (trimmedBase.startsWith('https://')) {
    wsBase = `wss://${trimmedBase.slice('https://'.length)}`;
  } else if (trimmedBase.startsWith('http://')) {
    wsBase = `ws://${trimmedBase.slice('http://'.length)}`;
  } else if (!trimmedBase.startsWith('ws://') && !trimmedBase.startsWith('wss://')) {
    wsBase = `wss://${trimmedBase}`;
  }
  return `${wsBase}${MEDIA_PATH_PREFIX}${encodeURIComponent(callSid)}?token=${encodeURIComponent(token)}`;
}

export function buildStreamTwiml(streamUrl: string, parameters: Record<string, string | undefined>): string {
  const params = Object.entries(parameters)
    .filter((entry): entry is [string, string] => typeof entry[1] === 'string' && entry[1] !== '')
    .map(([name, value]) => `<Parameter name="${escapeXml(name)}" value="${escapeXml(value)}"/>`)
    .join('');
  return (
    '<?xml version="1.0" encoding="UTF-8"?>' +
    `<Response><Connect><Stream url="${escapeXml(streamUrl)}">${params}</Stream></Connect></Response>`
  );
}

export function buildHangupTwiml(message: string = UNAVAILABLE_MESSAGE): string {
  return `<?xml version="1.0" encoding="UTF-8"?><Response><Say>${escapeXml(message)}</Say><Hangup/></Response>`;
}

/**
 * Resolves the tenant for the dialed number and answers with markup that
 * opens the media socket, or hangs up when the tenant is unknown or inactive.
 */
export async function answerInboundCall(body: unknown, deps: VoiceWebhookDeps): Promise<InboundCallOutcome> {
  const parsed = InboundCallSchema.safeParse(body);
  if (!parsed.success) {
    log.warn({ event: 'inbound_call_invalid', issues: parsed.error.issues.length }, 'inbound call payload invalid');
    return { status: 400, twiml: buildHangupTwiml() };
  }

  const { CallSid: callSid, From: from, To: to } = parsed.data;
  const tenantId = to ? await deps.tenants.resolveByDid(to) : null;
  if (!tenantId) {
    log.warn({ event: 'inbound_call_tenant_unknown', call_sid: callSid, to }, 'no tenant for dialed number');
    return { status: 200, twiml: buildHangupTwiml() };
  }

  try {
    await deps.agentConfigs.getAgentConfig(tenantId);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      log.warn(
        { event: 'inbound_call_rejected', call_sid: callSid, tenant_id: tenantId, reason: error.message },
        'inbound call rejected',
      );
      return { status: 200, twiml: buildHangupTwiml(), tenantId };
    }
    throw error;
  }

  await deps.tenants.rememberCallTenant(callSid, tenantId);

  const streamUrl = buildMediaStreamUrl(
    deps.publicBaseUrl ?? env.PUBLIC_BASE_URL,
    callSid,
    deps.mediaStreamToken ?? env.MEDIA_STREAM_TOKEN,
  );
  log.info({ event: 'inbound_call_accepted', call_sid: callSid, tenant_id: tenantId, to }, 'inbound call accepted');

  return { status: 200, twiml: buildStreamTwiml(streamUrl, { tenantId, from, to }), tenantId };
}

export function createVoiceWebhookRouter(deps: VoiceWebhookDeps): Router {
  const router = Router();

  router.post('/inbound', async (req: Request, res: Response) => {
    try {
      const outcome = await answerInboundCall(req.body, deps);
      res.status(outcome.status).type('text/xml').send(outcome.twiml);
    } catch (error) {
      log.error({ event: 'inbound_call_failed', err: error }, 'inbound call handling failed');
      res.status(500).type('text/xml').send(buildHangupTwiml());
    }
  });

  return router;
}
