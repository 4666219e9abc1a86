import { fetch } from 'undici';
import { ProviderError } from '../../errors';
import type { VoiceSettings } from '../../tenants/agentConfig';
import { previewBody, readResponseText, trimBaseUrl } from '../http';
import type { SpeechSynthesisProvider, SynthesisResult, SynthesizeOptions } from '../types';

const OUTPUT_SAMPLE_RATE_HZ = 16000;
const DEFAULT_VOICE_ID = '21m00Tcm4TlvDq8ikWAM';
const DEFAULT_VOICE_SETTINGS: VoiceSettings = { stability: 0.5, similarityBoost: 0.75 };

function toRequestSettings(settings: VoiceSettings): Record<string, number | boolean> {
  return {
    stability: settings.stability,
    similarity_boost: settings.similarityBoost,
    ...(settings.style !== undefined ? { style: settings.style } : {}),
    ...(settings.useSpeakerBoost !== undefined ? { use_speaker_boost: settings.useSpeakerBoost } : {}),
  };
}

export class ElevenLabsTtsProvider implements SpeechSynthesisProvider {
  public readonly id = 'elevenlabs';
  public readonly model: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly voiceId: string;
  private readonly voiceSettings: VoiceSettings;

  constructor(options: {
    apiKey: string;
    baseUrl: string;
    model: string;
    voiceId?: string;
    voiceSettings?: VoiceSettings;
  }) {
    this.apiKey = options.apiKey;
    this.baseUrl = trimBaseUrl(options.baseUrl);
    this.model = options.model;
    this.voiceId = options.voiceId ?? DEFAULT_VOICE_ID;
    this.voiceSettings = options.voiceSettings ?? DEFAULT_VOICE_SETTINGS;
  }

  public async synthesize(text: string, opts: SynthesizeOptions = {}): Promise<SynthesisResult> {
    const voiceId = encodeURIComponent(opts.voiceId ?? this.voiceId);
    const url = `${this.baseUrl}/text-to-speech/${voiceId}?output_format=pcm_${OUTPUT_SAMPLE_RATE_HZ}`;

    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Accept: 'audio/pcm',
        'xi-api-key': this.apiKey,
      },
      body: JSON.stringify({
        text,
        model_id: this.model,
        voice_settings: toRequestSettings(this.voiceSettings),
      }),
      signal: opts.signal,
    });

    if (!response.ok) {
      const body = await readResponseText(response);
      throw new ProviderError(this.id, `synthesis failed ${response.status}`, { body_preview: previewBody(body) });
    }

    const audio = Buffer.from(await response.arrayBuffer());
    return { audio, format: 'pcm16le', sampleRateHz: OUTPUT_SAMPLE_RATE_HZ };
  }

  public async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/voices`, { headers: { 'xi-api-key': this.apiKey } });
      await readResponseText(response);
      return response.ok;
    } catch {
      return false;
    }
  }
}
