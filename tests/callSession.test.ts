import assert from 'node:assert/strict';
import test from 'node:test';
import type { CallSession, CallSessionSettings } from '../src/calls/callSession';
import type { TranscriptionResult } from '../src/providers/types';
import {
  FakeCallPipeline,
  FakeLlmProvider,
  FakeSocket,
  FakeSttProvider,
  FakeTtsProvider,
  RecordingPersistence,
  StaticAgentConfigs,
  StaticTenantResolver,
  deferred,
  events,
  fails,
  makeAgentConfig,
  pcmSpeech,
  pipelineResult,
  providerConfig,
} from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

const CALL = 'CA200';

async function setup(
  options: { tenantId?: string | null; settings?: Partial<CallSessionSettings>; pipeline?: FakeCallPipeline } = {},
) {
  const { CallSession } = await import('../src/calls/callSession');
  const { ConversationSessionStore } = await import('../src/conversation/sessionStore');
  const socket = new FakeSocket();
  const pipeline = options.pipeline ?? new FakeCallPipeline();
  const store = new ConversationSessionStore({ windowSize: 10 });
  const tenantResolver = new StaticTenantResolver(options.tenantId === undefined ? 'tenant-a' : options.tenantId);
  const persistence = new RecordingPersistence();
  const clock = { now: 0 };
  const closed: string[] = [];

  const session = new CallSession({
    callSid: CALL,
    socket,
    pipeline,
    store,
    tenantResolver,
    persistence,
    settings: {
      flushThresholdMs: 2000,
      frameDurationMs: 20,
      frameDurationMode: 'fixed',
      outboundChunkBytes: 3200,
      stopFlushTimeoutMs: 1000,
      defaultGreeting: 'Hello caller',
      ...options.settings,
    },
    now: () => clock.now,
    onClosed: (s) => closed.push(s.callSid),
  });
  return { session, socket, pipeline, store, tenantResolver, persistence, clock, closed };
}

function sendFrames(session: CallSession, count: number, payload?: string): Promise<void> {
  let last: Promise<void> = Promise.resolve();
  for (let i = 0; i < count; i += 1) {
    last = session.handleMessage(events.media(payload));
  }
  return last;
}

const settle = () => new Promise<void>((resolve) => setImmediate(resolve));

test('start resolves the tenant, greets the caller and begins streaming', async () => {
  const { session, socket, pipeline, store, tenantResolver, persistence } = await setup();

  await session.handleMessage(events.connected());
  assert.equal(session.getState(), 'Connected');

  await session.handleMessage(events.start(CALL, { tenantId: 'tenant-a', from: '+15550001111', to: '+15550002222' }));

  assert.equal(session.getState(), 'Streaming');
  assert.equal(session.getTenantId(), 'tenant-a');
  assert.equal(tenantResolver.contexts[0]?.from, '+15550001111');
  assert.equal(tenantResolver.contexts[0]?.to, '+15550002222');
  assert.equal(tenantResolver.contexts[0]?.streamSid, 'MZ-stream-1');
  assert.deepEqual(pipeline.utterances, ['Hello caller']);
  assert.deepEqual(socket.sent, []);
  assert.deepEqual(
    store.transcript(CALL).map((m) => `${m.role}:${m.text}`),
    ['agent:Hello caller'],
  );
  assert.equal(persistence.starts.length, 1);
  assert.equal(persistence.starts[0]?.tenantId, 'tenant-a');
  assert.equal(persistence.starts[0]?.streamSid, 'MZ-stream-1');
});

test('the agent greeting is synthesized and sent with a mark', async () => {
  const pipeline = new FakeCallPipeline();
  pipeline.greetingMessage = 'Thanks for calling the clinic.';
  pipeline.greetingAudio = Buffer.alloc(160, 0xff);
  const { session, socket } = await setup({ pipeline });

  await session.handleMessage(events.start(CALL));

  assert.deepEqual(pipeline.utterances, ['Thanks for calling the clinic.']);
  const sent = socket.sentEvents();
  assert.deepEqual(
    sent.map((e) => e.event),
    ['media', 'mark'],
  );
  assert.equal(sent[0]?.streamSid, 'MZ-stream-1');
  assert.equal(sent[0]?.media?.payload, Buffer.alloc(160, 0xff).toString('base64'));
  assert.equal(sent[1]?.mark?.name, 'agent-1');
});

test('one hundred 20 ms frames trigger exactly one flush', async () => {
  const { session, pipeline } = await setup();
  await session.handleMessage(events.start(CALL));

  await sendFrames(session, 99);
  assert.equal(session.flushCount, 0);
  assert.equal(session.bufferedMs, 1980);

  await sendFrames(session, 1);
  assert.equal(session.flushCount, 1);
  assert.equal(pipeline.processed.length, 1);
  assert.equal(pipeline.processed[0]?.length, 16000);
  assert.equal(session.bufferedMs, 0);
});

test('stop flushes the remainder once and finalizes the call as completed', async () => {
  const { session, socket, pipeline, store, persistence, clock, closed } = await setup();
  await session.handleMessage(events.start(CALL));

  await sendFrames(session, 100);
  await sendFrames(session, 30);
  assert.equal(session.bufferedMs, 600);

  clock.now = 5000;
  await session.handleMessage(events.stop());

  assert.equal(session.flushCount, 2);
  assert.equal(pipeline.processed[1]?.length, 4800);
  assert.equal(session.getState(), 'Closed');
  assert.deepEqual(socket.closedWith, { code: 1000, reason: 'stop' });
  assert.equal(persistence.finals.length, 1);
  assert.equal(persistence.finals[0]?.status, 'completed');
  assert.equal(persistence.finals[0]?.tenantId, 'tenant-a');
  assert.equal(persistence.finals[0]?.durationSeconds, 5);
  assert.deepEqual(
    persistence.finals[0]?.transcript.map((m) => m.text),
    ['Hello caller'],
  );
  assert.deepEqual(pipeline.released, [CALL]);
  assert.equal(store.has(CALL), false);
  assert.deepEqual(closed, [CALL]);
});

test('stop with an empty buffer finalizes without a flush', async () => {
  const { session, pipeline, persistence } = await setup();
  await session.handleMessage(events.start(CALL));
  await session.handleMessage(events.stop());

  assert.equal(session.flushCount, 0);
  assert.equal(pipeline.processed.length, 0);
  assert.equal(persistence.finals[0]?.status, 'completed');
});

test('response audio is chunked on frame boundaries and followed by a mark', async () => {
  const pipeline = new FakeCallPipeline();
  pipeline.result = pipelineResult({ responseAudio: Buffer.alloc(400, 0x7f), transcript: 'hi', responseText: 'hello' });
  const { session, socket } = await setup({ pipeline, settings: { outboundChunkBytes: 320 } });
  await session.handleMessage(events.start(CALL));

  await sendFrames(session, 100);

  const sent = socket.sentEvents();
  assert.deepEqual(
    sent.map((e) => e.event),
    ['media', 'media', 'mark'],
  );
  assert.equal(Buffer.from(sent[0]?.media?.payload ?? '', 'base64').length, 320);
  assert.equal(Buffer.from(sent[1]?.media?.payload ?? '', 'base64').length, 80);
  assert.equal(sent[2]?.mark?.name, 'agent-1');
});

test('media that arrives during a flush waits for it instead of being dropped', async () => {
  const pipeline = new FakeCallPipeline();
  const gate = deferred();
  pipeline.gate = gate;
  const { session } = await setup({ pipeline });
  await session.handleMessage(events.start(CALL));

  const first = sendFrames(session, 100);
  await settle();
  const second = sendFrames(session, 100);
  await settle();

  assert.equal(pipeline.processed.length, 1);
  assert.equal(session.bufferedMs, 0);

  gate.resolve();
  await first;
  await second;

  assert.equal(pipeline.processed.length, 2);
  assert.equal(pipeline.processed[1]?.length, 16000);
  assert.equal(session.flushCount, 2);
});

test('a stage error in the pipeline does not end the call', async () => {
  const pipeline = new FakeCallPipeline();
  pipeline.result = pipelineResult({ transcript: 'hello', stageErrors: ['llm'], flags: ['stage-error'] });
  const { session, socket } = await setup({ pipeline });
  await session.handleMessage(events.start(CALL));

  await sendFrames(session, 100);

  assert.equal(session.getState(), 'Streaming');
  assert.equal(socket.closedWith, undefined);
  assert.deepEqual(socket.sent, []);
});

test('media before start and after stop is dropped', async () => {
  const { session, pipeline } = await setup();

  await sendFrames(session, 100);
  assert.equal(session.bufferedMs, 0);

  await session.handleMessage(events.start(CALL));
  await session.handleMessage(events.stop());
  await sendFrames(session, 100);

  assert.equal(pipeline.processed.length, 0);
  assert.equal(session.bufferedMs, 0);
});

test('an unknown tenant fails the call with a policy violation', async () => {
  const { session, socket, pipeline, persistence } = await setup({ tenantId: null });

  await session.handleMessage(events.start(CALL));

  assert.equal(session.getState(), 'Closed');
  assert.deepEqual(socket.closedWith, { code: 1008, reason: 'tenant_not_found' });
  assert.deepEqual(pipeline.utterances, []);
  assert.deepEqual(persistence.finals, []);
  assert.deepEqual(pipeline.released, [CALL]);
});

test('a configuration failure at start fails the call', async () => {
  const pipeline = new FakeCallPipeline();
  pipeline.prepareError = new Error('agent config missing');
  const { session, socket, persistence } = await setup({ pipeline });

  await session.handleMessage(events.start(CALL));

  assert.equal(session.getState(), 'Closed');
  assert.deepEqual(socket.closedWith, { code: 1008, reason: 'configuration_error' });
  assert.equal(persistence.finals.length, 1);
  assert.equal(persistence.finals[0]?.status, 'failed');
});

test('a socket close mid-stream flushes silently and finalizes as disconnected', async () => {
  const { session, socket, pipeline, persistence } = await setup();
  await session.handleMessage(events.start(CALL));
  await sendFrames(session, 25);

  socket.readyState = 3;
  await session.handleSocketClosed(1006, '');

  assert.equal(pipeline.processed.length, 1);
  assert.equal(pipeline.processed[0]?.length, 4000);
  assert.deepEqual(socket.sent, []);
  assert.equal(session.getState(), 'Closed');
  assert.equal(persistence.finals[0]?.status, 'disconnected');
  assert.equal(socket.closedWith, undefined);
});

test('finalization runs once however many close paths fire', async () => {
  const { session, persistence, pipeline } = await setup();
  await session.handleMessage(events.start(CALL));
  await session.handleMessage(events.stop());

  await session.handleSocketClosed(1000, 'stop');
  await session.handleMessage(events.stop());
  await session.whenFinalized();

  assert.equal(persistence.finals.length, 1);
  assert.deepEqual(pipeline.released, [CALL]);
});

test('a socket error runs the disconnect path', async () => {
  const { session, socket, persistence } = await setup();
  await session.handleMessage(events.start(CALL));

  await session.handleSocketError(new Error('ECONNRESET'));

  assert.equal(session.getState(), 'Closed');
  assert.equal(persistence.finals[0]?.status, 'disconnected');
  assert.deepEqual(socket.closedWith, { code: 1000, reason: 'disconnected' });
});

test('shutdown closes the socket with 1001 and finalizes the call', async () => {
  const { session, socket, persistence } = await setup();
  await session.handleMessage(events.start(CALL));

  await session.shutdown('server_shutdown');

  assert.deepEqual(socket.closedWith, { code: 1001, reason: 'server_shutdown' });
  assert.equal(persistence.finals[0]?.status, 'disconnected');
  assert.equal(session.getState(), 'Closed');
});

test('malformed and out-of-order events are ignored', async () => {
  const { session, tenantResolver } = await setup();

  await session.handleMessage('{not json');
  await session.handleMessage(events.stop());
  assert.equal(session.getState(), 'Idle');

  await session.handleMessage(events.start(CALL));
  await session.handleMessage(events.start(CALL));
  await session.handleMessage(events.mark('agent-1'));

  assert.equal(session.getState(), 'Streaming');
  assert.equal(tenantResolver.contexts.length, 1);
});

test('sample-accurate mode measures frame duration from its length', async () => {
  const doubleFrame = Buffer.alloc(320, 0xff).toString('base64');

  const fixed = await setup();
  await fixed.session.handleMessage(events.start(CALL));
  await sendFrames(fixed.session, 50, doubleFrame);
  assert.equal(fixed.session.bufferedMs, 1000);
  assert.equal(fixed.session.flushCount, 0);

  const accurate = await setup({ settings: { frameDurationMode: 'sample_accurate' } });
  await accurate.session.handleMessage(events.start(CALL));
  await sendFrames(accurate.session, 50, doubleFrame);
  assert.equal(accurate.session.flushCount, 1);
  assert.equal(accurate.pipeline.processed[0]?.length, 16000);
});

async function withVoicePipeline(options: {
  transcribe: () => Promise<TranscriptionResult>;
  tts: FakeTtsProvider;
  settings?: Partial<CallSessionSettings>;
}) {
  const { CallSession } = await import('../src/calls/callSession');
  const { ConversationSessionStore } = await import('../src/conversation/sessionStore');
  const { VoicePipeline } = await import('../src/pipeline/voicePipeline');
  const stt = new FakeSttProvider('stt-a', options.transcribe);
  const llm = new FakeLlmProvider('llm-a', async () => ({ text: 'We open at nine.' }));
  const store = new ConversationSessionStore({ windowSize: 10 });
  const pipeline = new VoicePipeline({
    store,
    agentConfigs: new StaticAgentConfigs(makeAgentConfig()),
    resolveProviders: () => providerConfig({ stt, llm, tts: options.tts }),
    settings: { providerTimeoutMs: 5000 },
  });
  const socket = new FakeSocket();
  const persistence = new RecordingPersistence();
  const session = new CallSession({
    callSid: CALL,
    socket,
    pipeline,
    store,
    tenantResolver: new StaticTenantResolver('tenant-a'),
    persistence,
    settings: {
      flushThresholdMs: 2000,
      frameDurationMs: 20,
      frameDurationMode: 'fixed',
      outboundChunkBytes: 3200,
      stopFlushTimeoutMs: 1000,
      defaultGreeting: 'Hello caller',
      ...options.settings,
    },
  });
  return { session, socket, pipeline, store, persistence, stt };
}

test('a teardown that outlives its wait drops queued media and leaves no per-call state', async () => {
  const gate = deferred();
  let transcriptions = 0;
  const { session, socket, pipeline, store, persistence, stt } = await withVoicePipeline({
    transcribe: async () => {
      transcriptions += 1;
      if (transcriptions === 1) await gate.promise;
      return { text: '' };
    },
    tts: new FakeTtsProvider('tts-a', async () => pcmSpeech()),
    settings: { stopFlushTimeoutMs: 50 },
  });
  await session.handleMessage(events.start(CALL));
  assert.equal(pipeline.isPrepared(CALL), true);

  const queued = sendFrames(session, 200);
  await settle();
  assert.equal(stt.calls, 1);

  await session.handleSocketClosed(1006, 'gone');

  assert.equal(session.getState(), 'Closed');
  assert.equal(persistence.finals.length, 1);
  assert.equal(persistence.finals[0]?.status, 'disconnected');
  assert.equal(pipeline.isPrepared(CALL), false);
  assert.equal(store.has(CALL), false);

  gate.resolve();
  await queued;

  assert.equal(stt.calls, 1);
  assert.equal(session.flushCount, 1);
  assert.equal(session.bufferedMs, 0);
  assert.equal(pipeline.isPrepared(CALL), false);
  assert.equal(store.has(CALL), false);
  assert.equal(persistence.finals.length, 1);
  assert.deepEqual(
    socket.sentEvents().map((e) => e.event),
    ['media', 'mark'],
  );
});

test('a greeting that cannot be synthesized is still logged and the call streams', async () => {
  const tts = new FakeTtsProvider('tts-a', fails('tts down'));
  const { session, socket, store } = await withVoicePipeline({
    transcribe: async () => ({ text: '' }),
    tts,
  });

  await session.handleMessage(events.start(CALL));

  assert.equal(session.getState(), 'Streaming');
  assert.deepEqual(tts.texts, ['Hello caller']);
  assert.deepEqual(socket.sent, []);
  assert.deepEqual(
    store.transcript(CALL).map((m) => `${m.role}:${m.text}`),
    ['agent:Hello caller'],
  );
});
