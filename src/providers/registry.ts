import { env } from '../env';
import { ConfigurationError } from '../errors';
import { log } from '../log';
import { withTimeout } from './invoke';
import type { AgentConfig, CapabilitySelection, ProviderSelection } from '../tenants/agentConfig';
import { OpenAiEmbeddingProvider } from './embeddings/openaiEmbeddings';
import { OpenAiChatProvider } from './llm/openaiChat';
import { DisabledSttProvider } from './stt/disabled';
import { OpenAiWhisperProvider } from './stt/openaiWhisper';
import { WhisperHttpProvider } from './stt/whisperHttp';
import { ElevenLabsTtsProvider } from './tts/elevenLabs';
import { KokoroTtsProvider } from './tts/kokoroHttp';
import { OpenAiSpeechProvider } from './tts/openaiSpeech';
import type {
  Capability,
  CapabilityProvider,
  EmbeddingProvider,
  LanguageModelProvider,
  ProviderBinding,
  ProviderConfig,
  ResolvedCapability,
  SpeechSynthesisProvider,
  SpeechToTextProvider,
} from './types';

export type ProviderFactory<P extends CapabilityProvider> = (selection: ProviderSelection, agent: AgentConfig) => P;

export interface ProviderFactories {
  stt: Record<string, ProviderFactory<SpeechToTextProvider>>;
  llm: Record<string, ProviderFactory<LanguageModelProvider>>;
  tts: Record<string, ProviderFactory<SpeechSynthesisProvider>>;
  embedding: Record<string, ProviderFactory<EmbeddingProvider>>;
}

function requireSetting(value: string | undefined, name: string, provider: string): string {
  if (!value) {
    throw new ConfigurationError(`${provider} requires ${name}`, { provider, setting: name });
  }
  return value;
}

export const defaultProviderFactories: ProviderFactories = {
  stt: {
    openai: (selection) =>
      new OpenAiWhisperProvider({
        id: 'openai',
        baseUrl: env.OPENAI_BASE_URL,
        apiKey: requireSetting(env.OPENAI_API_KEY, 'OPENAI_API_KEY', 'openai'),
        model: selection.model ?? 'whisper-1',
      }),
    groq: (selection) =>
      new OpenAiWhisperProvider({
        id: 'groq',
        baseUrl: env.GROQ_BASE_URL,
        apiKey: requireSetting(env.GROQ_API_KEY, 'GROQ_API_KEY', 'groq'),
        model: selection.model ?? 'whisper-large-v3',
      }),
    whisper_http: (selection) =>
      new WhisperHttpProvider({
        url: requireSetting(env.WHISPER_URL, 'WHISPER_URL', 'whisper_http'),
        model: selection.model,
      }),
    disabled: () => new DisabledSttProvider(),
  },
  llm: {
    openai: (selection, agent) =>
      new OpenAiChatProvider({
        id: 'openai',
        baseUrl: env.OPENAI_BASE_URL,
        apiKey: requireSetting(env.OPENAI_API_KEY, 'OPENAI_API_KEY', 'openai'),
        model: selection.model ?? 'gpt-4o-mini',
        temperature: agent.temperature,
        maxTokens: agent.maxTokens,
        topP: agent.topP,
      }),
    groq: (selection, agent) =>
      new OpenAiChatProvider({
        id: 'groq',
        baseUrl: env.GROQ_BASE_URL,
        apiKey: requireSetting(env.GROQ_API_KEY, 'GROQ_API_KEY', 'groq'),
        model: selection.model ?? 'llama-3.3-70b-versatile',
        temperature: agent.temperature,
        maxTokens: agent.maxTokens,
        topP: agent.topP,
      }),
  },
  tts: {
    elevenlabs: (selection, agent) =>
      new ElevenLabsTtsProvider({
        baseUrl: env.ELEVENLABS_BASE_URL,
        apiKey: requireSetting(env.ELEVENLABS_API_KEY, 'ELEVENLABS_API_KEY', 'elevenlabs'),
        model: selection.model ?? 'eleven_turbo_v2_5',
        voiceId: agent.voiceId,
        voiceSettings: agent.voiceSettings,
      }),
    openai: (selection, agent) =>
      new OpenAiSpeechProvider({
        baseUrl: env.OPENAI_BASE_URL,
        apiKey: requireSetting(env.OPENAI_API_KEY, 'OPENAI_API_KEY', 'openai'),
        model: selection.model ?? 'tts-1',
        voiceId: agent.voiceId,
      }),
    kokoro_http: (selection) =>
      new KokoroTtsProvider({
        url: requireSetting(env.KOKORO_URL, 'KOKORO_URL', 'kokoro_http'),
        model: selection.model,
        voice: env.KOKORO_VOICE_ID,
      }),
  },
  embedding: {
    openai: (selection) =>
      new OpenAiEmbeddingProvider({
        baseUrl: env.OPENAI_BASE_URL,
        apiKey: requireSetting(env.OPENAI_API_KEY, 'OPENAI_API_KEY', 'openai'),
        model: selection.model ?? 'text-embedding-3-small',
      }),
  },
};

function bind<P extends CapabilityProvider>(
  capability: Capability,
  selection: ProviderSelection,
  factories: Record<string, ProviderFactory<P>>,
  agent: AgentConfig,
): ProviderBinding<P> {
  const factory = Object.hasOwn(factories, selection.provider) ? factories[selection.provider] : undefined;
  if (!factory) {
    throw new ConfigurationError(`unknown ${capability} provider "${selection.provider}"`, {
      capability,
      provider: selection.provider,
      known: Object.keys(factories),
    });
  }
  const provider = factory(selection, agent);
  return { providerId: selection.provider, model: provider.model, provider };
}

function resolveCapability<P extends CapabilityProvider>(
  capability: Capability,
  selection: CapabilitySelection,
  factories: Record<string, ProviderFactory<P>>,
  agent: AgentConfig,
): ResolvedCapability<P> {
  const primary = bind(capability, selection, factories, agent);
  const fallback = selection.fallback ? bind(capability, selection.fallback, factories, agent) : undefined;
  return fallback ? { capability, primary, fallback } : { capability, primary };
}

/** Called once per call at stream start; the result is reused for every flush. */
export function resolveProviderConfig(
  agent: AgentConfig,
  factories: ProviderFactories = defaultProviderFactories,
): ProviderConfig {
  const config: ProviderConfig = {
    stt: resolveCapability('stt', agent.stt, factories.stt, agent),
    llm: resolveCapability('llm', agent.llm, factories.llm, agent),
    tts: resolveCapability('tts', agent.tts, factories.tts, agent),
  };
  if (agent.embedding) {
    config.embedding = resolveCapability('embedding', agent.embedding, factories.embedding, agent);
  }
  return config;
}

export interface ProbeResult {
  capability: Capability;
  role: 'primary' | 'fallback';
  providerId: string;
  model: string;
  healthy: boolean;
}

async function probe(binding: ProviderBinding<CapabilityProvider>, timeoutMs: number): Promise<boolean> {
  try {
    return await withTimeout(binding.providerId, timeoutMs, () => binding.provider.healthCheck());
  } catch (error) {
    log.warn({ event: 'provider_probe_failed', provider_id: binding.providerId, err: error }, 'provider probe failed');
    return false;
  }
}

/** Health probes for every binding; a probe slower than `timeoutMs` counts as unhealthy. */
export async function probeProviders(
  config: ProviderConfig,
  options: { timeoutMs?: number } = {},
): Promise<ProbeResult[]> {
  const timeoutMs = options.timeoutMs ?? env.PROVIDER_TIMEOUT_MS;
  const capabilities: ResolvedCapability<CapabilityProvider>[] = [config.stt, config.llm, config.tts];
  if (config.embedding) capabilities.push(config.embedding);

  const targets: Array<Omit<ProbeResult, 'healthy'> & { binding: ProviderBinding<CapabilityProvider> }> = [];
  for (const resolved of capabilities) {
    targets.push({
      capability: resolved.capability,
      role: 'primary',
      providerId: resolved.primary.providerId,
      model: resolved.primary.model,
      binding: resolved.primary,
    });
    if (resolved.fallback) {
      targets.push({
        capability: resolved.capability,
        role: 'fallback',
        providerId: resolved.fallback.providerId,
        model: resolved.fallback.model,
        binding: resolved.fallback,
      });
    }
  }

  return Promise.all(
    targets.map(async ({ binding, ...rest }) => ({ ...rest, healthy: await probe(binding, timeoutMs) })),
  );
}
