import { fetch } from 'undici';
import { looksLikeWav } from '../../audio/codec';
import { UnsupportedFormatError, ProviderError } from '../../errors';
import { log } from '../../log';
import { previewBody, readResponseText } from '../http';
import type { SpeechToTextProvider, TranscribeOptions, TranscriptionResult } from '../types';

/**
 * Self-hosted Whisper server that accepts the raw WAV body
 * (curl --data-binary) and answers with JSON `{ text }`.
 */
export class WhisperHttpProvider implements SpeechToTextProvider {
  public readonly id = 'whisper_http';
  public readonly model: string;
  private readonly url: string;

  constructor(options: { url: string; model?: string }) {
    this.url = options.url;
    this.model = options.model ?? 'whisper';
  }

  public async transcribe(wav: Buffer, opts: TranscribeOptions = {}): Promise<TranscriptionResult> {
    if (!looksLikeWav(wav)) {
      throw new UnsupportedFormatError('whisper_http expects a WAV container', { bytes: wav.length });
    }

    const target = new URL(this.url);
    if (opts.language) {
      target.searchParams.set('language', opts.language);
    }

    const startedAt = Date.now();
    const response = await fetch(target, {
      method: 'POST',
      headers: {
        'Content-Type': 'audio/wav',
        Accept: 'application/json, text/plain;q=0.9, */*;q=0.1',
      },
      body: new Uint8Array(wav),
      signal: opts.signal,
    });

    const respText = await readResponseText(response);
    log.debug(
      {
        event: 'whisper_fetch_done',
        status: response.status,
        elapsed_ms: Date.now() - startedAt,
        wav_bytes: wav.length,
        ...(opts.logContext ?? {}),
      },
      'whisper responded',
    );

    if (!response.ok) {
      throw new ProviderError(this.id, `http ${response.status}`, { body_preview: previewBody(respText) });
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (!contentType.includes('json')) {
      return { text: respText.trim() };
    }

    let data: unknown;
    try {
      data = JSON.parse(respText);
    } catch (error) {
      throw new ProviderError(this.id, 'invalid json response', { body_preview: previewBody(respText) }, { cause: error });
    }

    const text = data && typeof data === 'object' && 'text' in data && typeof data.text === 'string' ? data.text : '';
    return { text: text.trim() };
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
