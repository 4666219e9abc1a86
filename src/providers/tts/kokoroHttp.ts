import { fetch } from 'undici';
import { looksLikeWav } from '../../audio/codec';
import { ProviderError } from '../../errors';
import { log } from '../../log';
import { previewBody, readResponseText } from '../http';
import type { SpeechSynthesisProvider, SynthesisResult, SynthesizeOptions } from '../types';

export class KokoroTtsProvider implements SpeechSynthesisProvider {
  public readonly id = 'kokoro_http';
  public readonly model: string;
  private readonly url: string;
  private readonly voice?: string;

  constructor(options: { url: string; model?: string; voice?: string }) {
    this.url = options.url;
    this.model = options.model ?? 'kokoro';
    this.voice = options.voice;
  }

  public async synthesize(text: string, opts: SynthesizeOptions = {}): Promise<SynthesisResult> {
    const response = await fetch(this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ text, voice: opts.voiceId ?? this.voice, format: 'wav' }),
      signal: opts.signal,
    });

    if (!response.ok) {
      const body = await readResponseText(response);
      log.error(
        { event: 'kokoro_tts_error', status: response.status, body_preview: previewBody(body), ...(opts.logContext ?? {}) },
        'kokoro tts error',
      );
      throw new ProviderError(this.id, `synthesis failed ${response.status}`);
    }

    const audio = Buffer.from(await response.arrayBuffer());
    if (!looksLikeWav(audio)) {
      throw new ProviderError(this.id, 'expected wav audio', {
        content_type: response.headers.get('content-type') ?? 'unknown',
        bytes: audio.length,
      });
    }
    return { audio, format: 'wav' };
  }

  public async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(this.url, { method: 'GET' });
      await readResponseText(response);
      return response.status < 500;
    } catch {
      return false;
    }
  }
}
