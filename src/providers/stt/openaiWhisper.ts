import { Blob } from 'node:buffer';
import { FormData, fetch } from 'undici';
import { z } from 'zod';
import { ProviderError } from '../../errors';
import { bearer, previewBody, readResponseText, trimBaseUrl } from '../http';
import type { SpeechToTextProvider, TranscribeOptions, TranscriptionResult } from '../types';

const TranscriptionResponseSchema = z.object({
  text: z.string().default(''),
  language: z.string().optional(),
});

/**
 * OpenAI-compatible `/audio/transcriptions` endpoint. Serves both OpenAI
 * (whisper-1) and Groq (whisper-large-v3) depending on base URL.
 */
export class OpenAiWhisperProvider implements SpeechToTextProvider {
  public readonly id: string;
  public readonly model: string;
  private readonly baseUrl: string;
  private readonly apiKey: string;

  constructor(options: { id: string; baseUrl: string; apiKey: string; model: string }) {
    this.id = options.id;
    this.baseUrl = trimBaseUrl(options.baseUrl);
    this.apiKey = options.apiKey;
    this.model = options.model;
  }

  public async transcribe(wav: Buffer, opts: TranscribeOptions = {}): Promise<TranscriptionResult> {
    const form = new FormData();
    form.append('file', new Blob([wav], { type: 'audio/wav' }), 'audio.wav');
    form.append('model', this.model);
    form.append('response_format', 'json');
    if (opts.language) {
      form.append('language', opts.language);
    }

    const response = await fetch(`${this.baseUrl}/audio/transcriptions`, {
      method: 'POST',
      headers: bearer(this.apiKey),
      body: form,
      signal: opts.signal,
    });

    if (!response.ok) {
      const body = await readResponseText(response);
      throw new ProviderError(this.id, `transcription failed ${response.status}`, {
        body_preview: previewBody(body),
      });
    }

    const parsed = TranscriptionResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderError(this.id, 'unexpected transcription response', { issues: parsed.error.issues });
    }
    return {
      text: parsed.data.text.trim(),
      language: parsed.data.language ?? opts.language,
    };
  }

  public async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/models`, { headers: bearer(this.apiKey) });
      await readResponseText(response);
      return response.ok;
    } catch {
      return false;
    }
  }
}
