// G.711 mu-law <-> PCM16 <-> WAV conversions for the media stream path.
// Telephony side is always 8 kHz mono mu-law; providers get 16 kHz PCM16 WAV.

import { UnsupportedFormatError } from '../errors';

export const TELEPHONY_SAMPLE_RATE_HZ = 8000;
export const TRANSCRIPTION_SAMPLE_RATE_HZ = 16000;

const MULAW_BIAS = 0x84;
const MULAW_CLIP = 32635;

export type SynthesisAudioFormat = 'wav' | 'pcm16le' | 'mulaw';

export interface Pcm16Data {
  samples: Int16Array;
  sampleRateHz: number;
}

function clampInt16(n: number): number {
  if (n > 32767) return 32767;
  if (n < -32768) return -32768;
  return n | 0;
}

function muLawToPcmSample(uLawByte: number): number {
  const u = ~uLawByte & 0xff;
  const sign = u & 0x80;
  const exponent = (u >> 4) & 0x07;
  const mantissa = u & 0x0f;
  let sample = ((mantissa << 3) + MULAW_BIAS) << exponent;
  sample -= MULAW_BIAS;
  return clampInt16(sign ? -sample : sample);
}

function pcmSampleToMuLaw(pcm: number): number {
  let sample = clampInt16(pcm);
  const sign = sample < 0 ? 0x80 : 0;
  if (sign) sample = -sample;
  if (sample > MULAW_CLIP) sample = MULAW_CLIP;
  sample += MULAW_BIAS;

  let exponent = 7;
  for (let mask = 0x4000; (sample & mask) === 0 && exponent > 0; mask >>= 1) {
    exponent -= 1;
  }
  const mantissa = (sample >> (exponent + 3)) & 0x0f;
  return ~(sign | (exponent << 4) | mantissa) & 0xff;
}

export function decodeMulaw(payload: Buffer): Int16Array {
  const out = new Int16Array(payload.length);
  for (let i = 0; i < payload.length; i += 1) out[i] = muLawToPcmSample(payload[i] ?? 0xff);
  return out;
}

export function encodeMulaw(samples: Int16Array): Buffer {
  const out = Buffer.alloc(samples.length);
  for (let i = 0; i < samples.length; i += 1) out[i] = pcmSampleToMuLaw(samples[i] ?? 0);
  return out;
}

export function pcm16ToBuffer(samples: Int16Array): Buffer {
  const out = Buffer.alloc(samples.length * 2);
  for (let i = 0; i < samples.length; i += 1) {
    out.writeInt16LE(samples[i] ?? 0, i * 2);
  }
  return out;
}

export function bufferToPcm16(buffer: Buffer): Int16Array {
  const count = Math.floor(buffer.length / 2);
  const out = new Int16Array(count);
  for (let i = 0; i < count; i += 1) {
    out[i] = buffer.readInt16LE(i * 2);
  }
  return out;
}

export function resamplePcm16(samples: Int16Array, inputRateHz: number, outputRateHz: number): Int16Array {
  if (samples.length === 0) return samples;
  if (inputRateHz <= 0 || outputRateHz <= 0) return samples;
  if (inputRateHz === outputRateHz) return samples;

  const outputLength = Math.max(1, Math.round(samples.length * (outputRateHz / inputRateHz)));
  const output = new Int16Array(outputLength);

  const ratio = inputRateHz / outputRateHz;
  for (let i = 0; i < outputLength; i += 1) {
    const position = i * ratio;
    const index = Math.min(Math.floor(position), samples.length - 1);
    const nextIndex = Math.min(index + 1, samples.length - 1);
    const frac = position - index;
    const s0 = samples[index] ?? 0;
    const s1 = samples[nextIndex] ?? s0;
    output[i] = clampInt16(Math.round(s0 + (s1 - s0) * frac));
  }

  return output;
}

function wavHeader(pcmDataBytes: number, sampleRateHz: number, channels: number): Buffer {
  const bytesPerSample = 2;
  const blockAlign = channels * bytesPerSample;
  const byteRate = sampleRateHz * blockAlign;

  const header = Buffer.alloc(44);
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + pcmDataBytes, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRateHz, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(16, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(pcmDataBytes, 40);
  return header;
}

export function looksLikeWav(buf: Buffer): boolean {
  if (buf.length < 12) return false;
  return buf.toString('ascii', 0, 4) === 'RIFF' && buf.toString('ascii', 8, 12) === 'WAVE';
}

export function encodeWav(samples: Int16Array, sampleRateHz: number): Buffer {
  const pcm = pcm16ToBuffer(samples);
  return Buffer.concat([wavHeader(pcm.length, sampleRateHz, 1), pcm]);
}

/** Parses a PCM16 RIFF/WAVE container, downmixing to mono. */
export function decodeWav(wav: Buffer): Pcm16Data {
  if (!looksLikeWav(wav) || wav.length < 44) {
    throw new UnsupportedFormatError('not a RIFF/WAVE container', { bytes: wav.length });
  }

  let offset = 12;
  let audioFormat = 0;
  let channels = 0;
  let sampleRateHz = 0;
  let bitsPerSample = 0;
  let dataOffset = 0;
  let dataSize = 0;

  while (offset + 8 <= wav.length) {
    const chunkId = wav.toString('ascii', offset, offset + 4);
    const chunkSize = wav.readUInt32LE(offset + 4);
    const chunkStart = offset + 8;

    if (chunkId === 'fmt ') {
      if (chunkStart + 16 > wav.length) {
        throw new UnsupportedFormatError('truncated fmt chunk');
      }
      audioFormat = wav.readUInt16LE(chunkStart);
      channels = wav.readUInt16LE(chunkStart + 2);
      sampleRateHz = wav.readUInt32LE(chunkStart + 4);
      bitsPerSample = wav.readUInt16LE(chunkStart + 14);
    } else if (chunkId === 'data') {
      dataOffset = chunkStart;
      dataSize = chunkSize;
      break;
    }

    const nextOffset = chunkStart + chunkSize + (chunkSize % 2);
    if (nextOffset <= offset) {
      break;
    }
    offset = nextOffset;
  }

  if (audioFormat !== 1 || bitsPerSample !== 16 || dataOffset === 0 || sampleRateHz <= 0) {
    throw new UnsupportedFormatError('wav must be 16-bit linear PCM', {
      audio_format: audioFormat,
      bits_per_sample: bitsPerSample,
      sample_rate_hz: sampleRateHz,
    });
  }

  const channelCount = Math.max(1, channels);
  const bytesPerFrame = 2 * channelCount;
  const availableBytes = Math.min(dataSize, Math.max(0, wav.length - dataOffset));
  const frameCount = Math.floor(availableBytes / bytesPerFrame);

  const samples = new Int16Array(frameCount);
  for (let i = 0; i < frameCount; i += 1) {
    let sum = 0;
    for (let ch = 0; ch < channelCount; ch += 1) {
      sum += wav.readInt16LE(dataOffset + i * bytesPerFrame + ch * 2);
    }
    samples[i] = clampInt16(Math.round(sum / channelCount));
  }

  return { samples, sampleRateHz };
}

/** mu-law is one byte per sample at 8 kHz. */
export function mulawDurationMs(bytes: number): number {
  return (bytes / TELEPHONY_SAMPLE_RATE_HZ) * 1000;
}

export function telephonyToTranscriptionWav(
  mulaw: Buffer,
  targetRateHz: number = TRANSCRIPTION_SAMPLE_RATE_HZ,
): Buffer {
  const pcm = decodeMulaw(mulaw);
  const resampled = resamplePcm16(pcm, TELEPHONY_SAMPLE_RATE_HZ, targetRateHz);
  return encodeWav(resampled, targetRateHz);
}

export function synthesisToTelephony(
  audio: Buffer,
  format: SynthesisAudioFormat,
  sampleRateHz?: number,
): Buffer {
  if (audio.length === 0) {
    return Buffer.alloc(0);
  }

  let pcm: Pcm16Data;
  switch (format) {
    case 'wav':
      pcm = decodeWav(audio);
      break;
    case 'pcm16le':
      if (!sampleRateHz || sampleRateHz <= 0) {
        throw new UnsupportedFormatError('raw pcm16le audio requires a sample rate');
      }
      pcm = { samples: bufferToPcm16(audio), sampleRateHz };
      break;
    case 'mulaw':
      if (sampleRateHz !== undefined && sampleRateHz !== TELEPHONY_SAMPLE_RATE_HZ) {
        throw new UnsupportedFormatError('mu-law audio must be 8 kHz', { sample_rate_hz: sampleRateHz });
      }
      return Buffer.from(audio);
    default: {
      const unknownFormat: never = format;
      throw new UnsupportedFormatError(`unsupported synthesis format ${String(unknownFormat)}`);
    }
  }

  const narrowband = resamplePcm16(pcm.samples, pcm.sampleRateHz, TELEPHONY_SAMPLE_RATE_HZ);
  return encodeMulaw(narrowband);
}
