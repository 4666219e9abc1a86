import OpenAI from 'openai';
import type { SpeechSynthesisProvider, SynthesisResult, SynthesizeOptions } from '../types';

// The "pcm" response format is raw 24 kHz signed 16-bit little-endian.
const PCM_SAMPLE_RATE_HZ = 24000;

type OpenAiVoice = 'alloy' | 'echo' | 'fable' | 'onyx' | 'nova' | 'shimmer';

const VOICES: readonly OpenAiVoice[] = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'];

function toVoice(value: string | undefined, fallback: OpenAiVoice): OpenAiVoice {
  return VOICES.find((voice) => voice === value) ?? fallback;
}

export class OpenAiSpeechProvider implements SpeechSynthesisProvider {
  public readonly id = 'openai';
  public readonly model: string;
  private readonly client: OpenAI;
  private readonly voice: OpenAiVoice;

  constructor(options: { apiKey: string; baseUrl: string; model: string; voiceId?: string; client?: OpenAI }) {
    this.model = options.model;
    this.voice = toVoice(options.voiceId, 'alloy');
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl, maxRetries: 0 });
  }

  public async synthesize(text: string, opts: SynthesizeOptions = {}): Promise<SynthesisResult> {
    const response = await this.client.audio.speech.create(
      {
        model: this.model,
        voice: toVoice(opts.voiceId, this.voice),
        input: text,
        response_format: 'pcm',
      },
      { signal: opts.signal },
    );

    const audio = Buffer.from(await response.arrayBuffer());
    return { audio, format: 'pcm16le', sampleRateHz: PCM_SAMPLE_RATE_HZ };
  }

  public async healthCheck(): Promise<boolean> {
    try {
      const page = await this.client.models.list();
      return page.data.some((model) => model.id === this.model);
    } catch {
      return false;
    }
  }
}
