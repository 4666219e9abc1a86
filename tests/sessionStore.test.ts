import assert from 'node:assert/strict';
import test from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

async function loadStore() {
  const { ConversationSessionStore } = await import('../src/conversation/sessionStore');
  return ConversationSessionStore;
}

test('window keeps the last N messages while the transcript keeps all of them', async () => {
  const ConversationSessionStore = await loadStore();
  const store = new ConversationSessionStore({ windowSize: 3 });
  store.create('CA1', 'tenant-a');

  for (let i = 1; i <= 5; i += 1) {
    store.append('CA1', i % 2 === 1 ? 'caller' : 'agent', `turn ${i}`);
  }

  assert.deepEqual(
    store.window('CA1').map((m) => m.text),
    ['turn 3', 'turn 4', 'turn 5'],
  );
  assert.deepEqual(
    store.transcript('CA1').map((m) => `${m.role}:${m.text}`),
    ['caller:turn 1', 'agent:turn 2', 'caller:turn 3', 'agent:turn 4', 'caller:turn 5'],
  );
});

test('create honours a per-call window size', async () => {
  const ConversationSessionStore = await loadStore();
  const store = new ConversationSessionStore({ windowSize: 10 });
  const session = store.create('CA1', 'tenant-a', { windowSize: 2 });
  assert.equal(session.windowSize, 2);

  store.append('CA1', 'caller', 'one');
  store.append('CA1', 'agent', 'two');
  store.append('CA1', 'caller', 'three');
  assert.deepEqual(
    store.window('CA1').map((m) => m.text),
    ['two', 'three'],
  );
});

test('create returns the existing session for a known call', async () => {
  const ConversationSessionStore = await loadStore();
  const store = new ConversationSessionStore({ windowSize: 10 });
  store.create('CA1', 'tenant-a');
  store.append('CA1', 'caller', 'hello');

  const again = store.create('CA1', 'tenant-b');
  assert.equal(again.tenantId, 'tenant-a');
  assert.equal(again.messages.length, 1);
  assert.equal(store.size, 1);
});

test('append trims text and skips blank messages', async () => {
  const ConversationSessionStore = await loadStore();
  const store = new ConversationSessionStore({ windowSize: 10 });
  store.create('CA1', 'tenant-a');

  const appended = store.append('CA1', 'caller', '  hi there  ');
  assert.equal(appended?.text, 'hi there');
  assert.equal(store.append('CA1', 'agent', '   '), null);
  assert.equal(store.transcript('CA1').length, 1);
});

test('append to an unknown call is a no-op', async () => {
  const ConversationSessionStore = await loadStore();
  const store = new ConversationSessionStore({ windowSize: 10 });
  assert.equal(store.append('missing', 'caller', 'hello'), null);
  assert.deepEqual(store.window('missing'), []);
  assert.deepEqual(store.transcript('missing'), []);
});

test('calls are isolated from one another', async () => {
  const ConversationSessionStore = await loadStore();
  const store = new ConversationSessionStore({ windowSize: 10 });
  store.create('CA1', 'tenant-a');
  store.create('CA2', 'tenant-b');
  store.append('CA1', 'caller', 'for one');
  store.append('CA2', 'caller', 'for two');

  assert.deepEqual(
    store.transcript('CA1').map((m) => m.text),
    ['for one'],
  );
  assert.equal(store.get('CA2')?.tenantId, 'tenant-b');
});

test('returned transcripts are copies', async () => {
  const ConversationSessionStore = await loadStore();
  const store = new ConversationSessionStore({ windowSize: 10 });
  store.create('CA1', 'tenant-a');
  store.append('CA1', 'caller', 'hello');

  const copy = store.transcript('CA1');
  copy.pop();
  assert.equal(store.transcript('CA1').length, 1);
  assert.ok(Object.isFrozen(store.transcript('CA1')[0]));
});

test('remove drops the session', async () => {
  const ConversationSessionStore = await loadStore();
  const store = new ConversationSessionStore({ windowSize: 10 });
  store.create('CA1', 'tenant-a');
  assert.equal(store.remove('CA1'), true);
  assert.equal(store.has('CA1'), false);
  assert.equal(store.remove('CA1'), false);
});
