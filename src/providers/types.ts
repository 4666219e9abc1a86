import type { SynthesisAudioFormat } from '../audio/codec';

export type Capability = 'stt' | 'llm' | 'tts' | 'embedding';

export interface ProviderCallOptions {
  signal?: AbortSignal;
  logContext?: Record<string, unknown>;
}

export interface CapabilityProvider {
  readonly id: string;
  readonly model: string;
  healthCheck(): Promise<boolean>;
}

// ---------- speech-to-text ----------

export interface TranscribeOptions extends ProviderCallOptions {
  language?: string;
}

export interface TranscriptionResult {
  text: string;
  language?: string;
  confidence?: number;
}

export interface SpeechToTextProvider extends CapabilityProvider {
  /** Input is a 16-bit PCM WAV container. */
  transcribe(wav: Buffer, opts?: TranscribeOptions): Promise<TranscriptionResult>;
}

// ---------- language generation ----------

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface GenerateOptions extends ProviderCallOptions {
  temperature?: number;
  maxTokens?: number;
  topP?: number;
}

export interface GenerationResult {
  text: string;
  finishReason?: string;
  totalTokens?: number;
}

export interface LanguageModelProvider extends CapabilityProvider {
  generate(messages: ChatMessage[], opts?: GenerateOptions): Promise<GenerationResult>;
}

// ---------- speech synthesis ----------

export interface SynthesizeOptions extends ProviderCallOptions {
  voiceId?: string;
}

export interface SynthesisResult {
  audio: Buffer;
  format: SynthesisAudioFormat;
  /** Required when format is pcm16le. */
  sampleRateHz?: number;
}

export interface SpeechSynthesisProvider extends CapabilityProvider {
  synthesize(text: string, opts?: SynthesizeOptions): Promise<SynthesisResult>;
}

// ---------- embeddings ----------

export interface EmbeddingResult {
  vectors: number[][];
  dimensions: number;
}

export interface EmbeddingProvider extends CapabilityProvider {
  embed(texts: string[], opts?: ProviderCallOptions): Promise<EmbeddingResult>;
}

// ---------- per-call resolution ----------

export interface ProviderBinding<P extends CapabilityProvider> {
  providerId: string;
  model: string;
  provider: P;
}

export interface ResolvedCapability<P extends CapabilityProvider> {
  capability: Capability;
  primary: ProviderBinding<P>;
  fallback?: ProviderBinding<P>;
}

/** Resolved once per call at "start" and reused for every invocation in that call. */
export interface ProviderConfig {
  stt: ResolvedCapability<SpeechToTextProvider>;
  llm: ResolvedCapability<LanguageModelProvider>;
  tts: ResolvedCapability<SpeechSynthesisProvider>;
  embedding?: ResolvedCapability<EmbeddingProvider>;
}
