import assert from 'node:assert/strict';
import { after, test } from 'node:test';
import { MockAgent, setGlobalDispatcher } from 'undici';
import { encodeWav, telephonyToTranscriptionWav } from '../src/audio/codec';
import { makeAgentConfig } from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();
process.env.ELEVENLABS_API_KEY = 'test-secret';
process.env.ELEVENLABS_BASE_URL = 'http://elevenlabs.test/v1';
process.env.GROQ_API_KEY = 'test-secret';

const mockAgent = new MockAgent();
mockAgent.disableNetConnect();
setGlobalDispatcher(mockAgent);

after(async () => {
  await mockAgent.close();
});

async function load() {
  const elevenLabs = await import('../src/providers/tts/elevenLabs');
  const kokoro = await import('../src/providers/tts/kokoroHttp');
  const openaiWhisper = await import('../src/providers/stt/openaiWhisper');
  const whisperHttp = await import('../src/providers/stt/whisperHttp');
  const registry = await import('../src/providers/registry');
  const errors = await import('../src/errors');
  return { ...elevenLabs, ...kokoro, ...openaiWhisper, ...whisperHttp, ...registry, ...errors };
}

const callerWav = () => telephonyToTranscriptionWav(Buffer.alloc(160, 0xff));

test('elevenlabs asks for 16 kHz pcm with the agent voice and its settings', async () => {
  const { resolveProviderConfig } = await load();
  let path = '';
  let body = '';
  mockAgent
    .get('http://elevenlabs.test')
    .intercept({ path: (p) => p.startsWith('/v1/text-to-speech/'), method: 'POST' })
    .reply(200, (opts) => {
      path = opts.path;
      body = typeof opts.body === 'string' ? opts.body : '';
      return Buffer.alloc(640, 1);
    });

  const config = resolveProviderConfig(
    makeAgentConfig({
      voiceId: 'voice-1',
      voiceSettings: { stability: 0.2, similarityBoost: 0.9, useSpeakerBoost: true },
    }),
  );
  const result = await config.tts.primary.provider.synthesize('Hello there');

  assert.equal(path, '/v1/text-to-speech/voice-1?output_format=pcm_16000');
  assert.deepEqual(JSON.parse(body), {
    text: 'Hello there',
    model_id: 'eleven_turbo_v2_5',
    voice_settings: { stability: 0.2, similarity_boost: 0.9, use_speaker_boost: true },
  });
  assert.equal(result.format, 'pcm16le');
  assert.equal(result.sampleRateHz, 16000);
  assert.equal(result.audio.length, 640);
});

test('elevenlabs sends default voice settings when the agent has none', async () => {
  const { ElevenLabsTtsProvider } = await load();
  let body = '';
  mockAgent
    .get('http://elevenlabs.test')
    .intercept({ path: (p) => p.startsWith('/v1/text-to-speech/'), method: 'POST' })
    .reply(200, (opts) => {
      body = typeof opts.body === 'string' ? opts.body : '';
      return Buffer.alloc(2);
    });

  const provider = new ElevenLabsTtsProvider({
    apiKey: 'test-secret',
    baseUrl: 'http://elevenlabs.test/v1/',
    model: 'eleven_flash_v2_5',
  });
  await provider.synthesize('Hi');

  assert.deepEqual(JSON.parse(body), {
    text: 'Hi',
    model_id: 'eleven_flash_v2_5',
    voice_settings: { stability: 0.5, similarity_boost: 0.75 },
  });
});

test('an elevenlabs error status is a provider error', async () => {
  const { ElevenLabsTtsProvider, ProviderError } = await load();
  mockAgent
    .get('http://elevenlabs.test')
    .intercept({ path: (p) => p.startsWith('/v1/text-to-speech/'), method: 'POST' })
    .reply(401, 'bad key');

  const provider = new ElevenLabsTtsProvider({ apiKey: 'test-secret', baseUrl: 'http://elevenlabs.test/v1', model: 'm' });
  await assert.rejects(
    provider.synthesize('Hi'),
    (error: unknown) => error instanceof ProviderError && error.message === 'elevenlabs: synthesis failed 401',
  );
});

test('openai-compatible transcription trims the text and keeps the requested language', async () => {
  const { OpenAiWhisperProvider } = await load();
  mockAgent
    .get('http://stt.test')
    .intercept({ path: '/openai/v1/audio/transcriptions', method: 'POST' })
    .reply(200, { text: '  what time do you open  ' });

  const provider = new OpenAiWhisperProvider({
    id: 'groq',
    baseUrl: 'http://stt.test/openai/v1/',
    apiKey: 'test-secret',
    model: 'whisper-large-v3',
  });
  const result = await provider.transcribe(callerWav(), { language: 'es' });

  assert.deepEqual(result, { text: 'what time do you open', language: 'es' });
});

test('openai-compatible transcription rejects error statuses and malformed bodies', async () => {
  const { OpenAiWhisperProvider, ProviderError } = await load();
  const provider = new OpenAiWhisperProvider({
    id: 'groq',
    baseUrl: 'http://stt.test/openai/v1',
    apiKey: 'test-secret',
    model: 'whisper-large-v3',
  });

  mockAgent.get('http://stt.test').intercept({ path: '/openai/v1/audio/transcriptions', method: 'POST' }).reply(500, 'down');
  await assert.rejects(
    provider.transcribe(callerWav()),
    (error: unknown) => error instanceof ProviderError && error.message === 'groq: transcription failed 500',
  );

  mockAgent.get('http://stt.test').intercept({ path: '/openai/v1/audio/transcriptions', method: 'POST' }).reply(200, { text: 5 });
  await assert.rejects(
    provider.transcribe(callerWav()),
    (error: unknown) => error instanceof ProviderError && error.message === 'groq: unexpected transcription response',
  );
});

test('self-hosted whisper reads json text and passes the language as a query', async () => {
  const { WhisperHttpProvider } = await load();
  let path = '';
  mockAgent
    .get('http://whisper.test')
    .intercept({ path: (p) => p.startsWith('/transcribe'), method: 'POST' })
    .reply(
      200,
      (opts) => {
        path = opts.path;
        return { text: ' we are open until five ' };
      },
      { headers: { 'content-type': 'application/json' } },
    );

  const provider = new WhisperHttpProvider({ url: 'http://whisper.test/transcribe' });
  const result = await provider.transcribe(callerWav(), { language: 'es' });

  assert.equal(path, '/transcribe?language=es');
  assert.deepEqual(result, { text: 'we are open until five' });
});

test('self-hosted whisper treats a non-json answer as plain text', async () => {
  const { WhisperHttpProvider } = await load();
  mockAgent
    .get('http://whisper.test')
    .intercept({ path: '/transcribe', method: 'POST' })
    .reply(200, '  plain words \n', { headers: { 'content-type': 'text/plain' } });

  const provider = new WhisperHttpProvider({ url: 'http://whisper.test/transcribe' });
  assert.deepEqual(await provider.transcribe(callerWav()), { text: 'plain words' });
});

test('self-hosted whisper rejects broken json and non-wav input', async () => {
  const { WhisperHttpProvider, ProviderError, UnsupportedFormatError } = await load();
  const provider = new WhisperHttpProvider({ url: 'http://whisper.test/transcribe' });

  mockAgent
    .get('http://whisper.test')
    .intercept({ path: '/transcribe', method: 'POST' })
    .reply(200, '{oops', { headers: { 'content-type': 'application/json' } });
  await assert.rejects(
    provider.transcribe(callerWav()),
    (error: unknown) => error instanceof ProviderError && error.message === 'whisper_http: invalid json response',
  );

  await assert.rejects(provider.transcribe(Buffer.from('not a wav file')), UnsupportedFormatError);
});

test('kokoro posts the text and voice and returns wav audio', async () => {
  const { KokoroTtsProvider } = await load();
  const wav = encodeWav(new Int16Array(80), 16000);
  let body = '';
  mockAgent
    .get('http://kokoro.test')
    .intercept({ path: '/tts', method: 'POST' })
    .reply(200, (opts) => {
      body = typeof opts.body === 'string' ? opts.body : '';
      return wav;
    });

  const provider = new KokoroTtsProvider({ url: 'http://kokoro.test/tts', voice: 'af_bella' });
  const result = await provider.synthesize('One moment please');

  assert.deepEqual(JSON.parse(body), { text: 'One moment please', voice: 'af_bella', format: 'wav' });
  assert.equal(result.format, 'wav');
  assert.ok(result.audio.equals(wav));
});

test('kokoro rejects audio that is not wav and error statuses', async () => {
  const { KokoroTtsProvider, ProviderError } = await load();
  const provider = new KokoroTtsProvider({ url: 'http://kokoro.test/tts' });

  mockAgent.get('http://kokoro.test').intercept({ path: '/tts', method: 'POST' }).reply(200, 'not audio');
  await assert.rejects(
    provider.synthesize('Hi'),
    (error: unknown) => error instanceof ProviderError && error.message === 'kokoro_http: expected wav audio',
  );

  mockAgent.get('http://kokoro.test').intercept({ path: '/tts', method: 'POST' }).reply(503, 'busy');
  await assert.rejects(
    provider.synthesize('Hi'),
    (error: unknown) => error instanceof ProviderError && error.message === 'kokoro_http: synthesis failed 503',
  );
});
