// Per-call accumulation of inbound telephony frames until a flush.

import { TELEPHONY_SAMPLE_RATE_HZ } from './codec';

export type AudioEncoding = 'mulaw' | 'pcm16le' | 'wav';

export interface AudioFrame {
  readonly encoding: AudioEncoding;
  readonly sampleRateHz: number;
  readonly durationMs: number;
  readonly payload: Buffer;
}

export function createAudioFrame(
  payload: Buffer,
  durationMs: number,
  encoding: AudioEncoding = 'mulaw',
  sampleRateHz = TELEPHONY_SAMPLE_RATE_HZ,
): AudioFrame {
  return Object.freeze({ encoding, sampleRateHz, durationMs, payload });
}

export interface DrainedAudio {
  payload: Buffer;
  durationMs: number;
  frames: number;
}

export class AudioBuffer {
  private frames: AudioFrame[] = [];
  private totalMs = 0;
  private totalBytes = 0;

  /** Frames must share the encoding and rate of the frames already buffered. */
  public append(frame: AudioFrame): boolean {
    if (frame.payload.length === 0) return false;
    if (!Number.isFinite(frame.durationMs) || frame.durationMs <= 0) return false;

    const first = this.frames[0];
    if (first && (first.encoding !== frame.encoding || first.sampleRateHz !== frame.sampleRateHz)) {
      return false;
    }

    this.frames.push(frame);
    this.totalMs += frame.durationMs;
    this.totalBytes += frame.payload.length;
    return true;
  }

  public isReady(thresholdMs: number): boolean {
    return this.totalMs >= thresholdMs;
  }

  public drain(): DrainedAudio {
    if (this.frames.length === 0) {
      return { payload: Buffer.alloc(0), durationMs: 0, frames: 0 };
    }

    const drained: DrainedAudio = {
      payload: Buffer.concat(
        this.frames.map((frame) => frame.payload),
        this.totalBytes,
      ),
      durationMs: this.totalMs,
      frames: this.frames.length,
    };
    this.reset();
    return drained;
  }

  public reset(): void {
    this.frames = [];
    this.totalMs = 0;
    this.totalBytes = 0;
  }

  public get bufferedMs(): number {
    return this.totalMs;
  }

  public get byteLength(): number {
    return this.totalBytes;
  }

  public get frameCount(): number {
    return this.frames.length;
  }

  public get isEmpty(): boolean {
    return this.frames.length === 0;
  }
}
