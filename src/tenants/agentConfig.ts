import { z } from 'zod';
import { env } from '../env';
import { ConfigurationError } from '../errors';
import { log } from '../log';
import type { TenantKeyValueStore } from '../redis/client';

const ProviderSelectionSchema = z.object({
  provider: z.string().min(1),
  model: z.string().min(1).optional(),
});

const CapabilitySelectionSchema = ProviderSelectionSchema.extend({
  fallback: ProviderSelectionSchema.optional(),
});

const VoiceSettingsSchema = z.object({
  stability: z.number().min(0).max(1).default(0.5),
  similarityBoost: z.number().min(0).max(1).default(0.75),
  style: z.number().min(0).max(1).optional(),
  useSpeakerBoost: z.boolean().optional(),
});

export const AgentConfigSchema = z
  .object({
    tenantId: z.string().min(1),
    active: z.boolean().default(true),
    stt: CapabilitySelectionSchema.default({ provider: 'groq' }),
    llm: CapabilitySelectionSchema.default({ provider: 'groq' }),
    tts: CapabilitySelectionSchema.default({ provider: 'elevenlabs' }),
    embedding: CapabilitySelectionSchema.optional(),
    systemPrompt: z
      .string()
      .min(1)
      .default(
        "You are a helpful and friendly customer support agent. You provide accurate information based on the company's knowledge base. Be concise and professional.",
      ),
    greetingMessage: z.string().min(1).optional(),
    language: z.string().min(2).optional(),
    voiceId: z.string().min(1).optional(),
    voiceSettings: VoiceSettingsSchema.optional(),
    temperature: z.number().min(0).max(2).default(0.7),
    maxTokens: z.number().int().min(1).max(4096).default(150),
    topP: z.number().min(0).max(1).default(1),
    ragEnabled: z.boolean().default(false),
    topK: z.number().int().min(1).max(20).default(3),
    historyWindow: z.number().int().positive().optional(),
  })
  .passthrough();

export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type CapabilitySelection = z.infer<typeof CapabilitySelectionSchema>;
export type ProviderSelection = z.infer<typeof ProviderSelectionSchema>;
export type VoiceSettings = z.infer<typeof VoiceSettingsSchema>;

export interface AgentConfigSource {
  getAgentConfig(tenantId: string): Promise<AgentConfig>;
}

export function parseAgentConfig(raw: string, tenantId: string): AgentConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError('agent config is not valid json', { tenant_id: tenantId }, { cause: error });
  }

  const result = AgentConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError('agent config invalid', {
      tenant_id: tenantId,
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  if (result.data.tenantId !== tenantId) {
    throw new ConfigurationError('agent config tenant mismatch', {
      tenant_id: tenantId,
      config_tenant_id: result.data.tenantId,
    });
  }
  return result.data;
}

export class RedisAgentConfigSource implements AgentConfigSource {
  private readonly redis: TenantKeyValueStore;
  private readonly prefix: string;

  constructor(redis: TenantKeyValueStore, options: { prefix?: string } = {}) {
    this.redis = redis;
    this.prefix = options.prefix ?? env.TENANTCFG_PREFIX;
  }

  public configKey(tenantId: string): string {
    return `${this.prefix}:${tenantId}`;
  }

  public async getAgentConfig(tenantId: string): Promise<AgentConfig> {
    const key = this.configKey(tenantId);
    let raw: string | null;
    try {
      raw = await this.redis.get(key);
    } catch (error) {
      log.error({ event: 'agent_config_fetch_failed', err: error, tenant_id: tenantId, key }, 'agent config fetch failed');
      throw new ConfigurationError('agent config unavailable', { tenant_id: tenantId }, { cause: error });
    }

    if (!raw) {
      throw new ConfigurationError('agent config missing', { tenant_id: tenantId, key });
    }

    const config = parseAgentConfig(raw, tenantId);
    if (!config.active) {
      throw new ConfigurationError('tenant inactive', { tenant_id: tenantId });
    }
    return config;
  }
}
