import assert from 'node:assert/strict';
import test from 'node:test';
import {
  decodeMulaw,
  decodeWav,
  encodeMulaw,
  encodeWav,
  looksLikeWav,
  mulawDurationMs,
  resamplePcm16,
  synthesisToTelephony,
  telephonyToTranscriptionWav,
} from '../src/audio/codec';
import { UnsupportedFormatError } from '../src/errors';

test('decodeMulaw maps silence and the extremes', () => {
  const decoded = decodeMulaw(Buffer.from([0xff, 0x80, 0x00]));
  assert.deepEqual(Array.from(decoded), [0, 32124, -32124]);
});

test('encodeMulaw maps zero to 0xff and clips full scale', () => {
  assert.deepEqual([...encodeMulaw(Int16Array.from([0]))], [0xff]);
  assert.deepEqual([...encodeMulaw(Int16Array.from([32767, -32768]))], [0x80, 0x00]);
});

test('encodeMulaw quantizes within one segment step', () => {
  const encoded = encodeMulaw(Int16Array.from([1000]));
  assert.equal(encoded[0], 0xce);
  assert.equal(decodeMulaw(encoded)[0], 988);
});

test('every mu-law byte survives decode then encode except negative zero', () => {
  for (let byte = 0; byte < 256; byte += 1) {
    if (byte === 0x7f) continue;
    const roundTrip = encodeMulaw(decodeMulaw(Buffer.from([byte])));
    assert.equal(roundTrip[0], byte, `byte ${byte}`);
  }
});

test('resamplePcm16 interpolates linearly when upsampling', () => {
  const out = resamplePcm16(Int16Array.from([0, 100]), 8000, 16000);
  assert.deepEqual(Array.from(out), [0, 50, 100, 100]);
});

test('resamplePcm16 returns the input when rates match', () => {
  const samples = Int16Array.from([1, 2, 3]);
  assert.equal(resamplePcm16(samples, 16000, 16000), samples);
});

test('telephonyToTranscriptionWav produces a 16 kHz PCM16 container', () => {
  const wav = telephonyToTranscriptionWav(Buffer.alloc(160, 0xff));
  assert.equal(wav.length, 684);
  assert.ok(looksLikeWav(wav));
  assert.equal(wav.readUInt32LE(24), 16000);

  const decoded = decodeWav(wav);
  assert.equal(decoded.sampleRateHz, 16000);
  assert.equal(decoded.samples.length, 320);
});

test('encodeWav and decodeWav agree on samples', () => {
  const samples = Int16Array.from([100, -200, 300]);
  const decoded = decodeWav(encodeWav(samples, 16000));
  assert.deepEqual(Array.from(decoded.samples), [100, -200, 300]);
});

test('decodeWav downmixes stereo to mono', () => {
  const stereo = encodeWav(Int16Array.from([100, 300, -50, -150]), 8000);
  stereo.writeUInt16LE(2, 22);
  stereo.writeUInt16LE(4, 32);
  const decoded = decodeWav(stereo);
  assert.deepEqual(Array.from(decoded.samples), [200, -100]);
});

test('decodeWav rejects data that is not a RIFF container', () => {
  assert.throws(() => decodeWav(Buffer.alloc(64)), UnsupportedFormatError);
});

test('synthesisToTelephony downsamples 16 kHz PCM to one byte per 8 kHz sample', () => {
  const out = synthesisToTelephony(Buffer.alloc(640), 'pcm16le', 16000);
  assert.equal(out.length, 160);
  assert.ok(out.every((byte) => byte === 0xff));
});

test('synthesisToTelephony accepts WAV input', () => {
  const wav = encodeWav(new Int16Array(320), 16000);
  const out = synthesisToTelephony(wav, 'wav');
  assert.equal(out.length, 160);
});

test('synthesisToTelephony passes 8 kHz mu-law through', () => {
  const audio = Buffer.from([1, 2, 3]);
  assert.deepEqual(synthesisToTelephony(audio, 'mulaw', 8000), audio);
});

test('synthesisToTelephony rejects formats it cannot convert', () => {
  assert.throws(() => synthesisToTelephony(Buffer.from([1, 2]), 'mulaw', 16000), UnsupportedFormatError);
  assert.throws(() => synthesisToTelephony(Buffer.from([1, 2]), 'pcm16le'), UnsupportedFormatError);
});

test('synthesisToTelephony returns empty audio for empty input', () => {
  assert.equal(synthesisToTelephony(Buffer.alloc(0), 'wav').length, 0);
});

test('mulawDurationMs counts one byte per 8 kHz sample', () => {
  assert.equal(mulawDurationMs(160), 20);
  assert.equal(mulawDurationMs(8000), 1000);
});
