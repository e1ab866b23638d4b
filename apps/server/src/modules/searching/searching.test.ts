import test from 'node:test';
import assert from 'node:assert/strict';
import { SERVER_EVENT } from '@strangerline/shared';
import { createSession, isQueued, type Store } from '../../core/store';
import { createHarness, type Harness } from '../../testing/fakes';

const join = (harness: Harness, id: string, address = `10.1.0.${harness.store.sessions.size + 1}`) =>
  createSession(harness.store, { id, address, now: harness.clock.now() });

const assertConsistent = (store: Store) => {
  assert.equal(new Set(store.queue).size, store.queue.length, 'queue has duplicates');
  for (const id of store.queue) {
    const session = store.sessions.get(id);
    assert.ok(session, `queued session ${id} is unknown`);
    assert.equal(session.roomId, undefined, `session ${id} is queued and in a room`);
  }
  for (const room of store.rooms.values()) {
    for (const memberId of room.userIds) {
      assert.equal(store.sessions.get(memberId)?.roomId, room.id);
    }
  }
  for (const session of store.sessions.values()) {
    if (session.roomId) assert.ok(store.rooms.has(session.roomId));
  }
};

// Deterministic PRNG so interleavings are reproducible.
const mulberry32 = (seed: number) => {
  let state = seed;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

test('requestPairing queues when nobody is waiting', async () => {
  const harness = createHarness();
  join(harness, 'sock-a');

  const result = await harness.searching.requestPairing('sock-a', 'text', ['Music']);

  assert.equal(result.status, 'WAITING');
  assert.deepEqual(harness.store.queue, ['sock-a']);
  const session = harness.store.sessions.get('sock-a');
  assert.equal(session?.mode, 'text');
  assert.deepEqual(session?.interests, ['music']);
});

test('requestPairing picks the most compatible waiting session', async () => {
  const harness = createHarness();
  join(harness, 'sock-z');
  join(harness, 'sock-y');
  join(harness, 'sock-x');

  await harness.searching.requestPairing('sock-z', 'text', []);
  await harness.searching.requestPairing('sock-y', 'text', ['gaming']);
  const result = await harness.searching.requestPairing('sock-x', 'text', ['music', 'gaming']);

  assert.equal(result.status, 'MATCHED');
  if (result.status !== 'MATCHED') return;
  assert.equal(result.partnerId, 'sock-y');
  assert.equal(result.requesterId, 'sock-x');
  assert.equal(result.room.initiatorId, 'sock-x');
  assert.deepEqual(harness.store.queue, ['sock-z']);
  assertConsistent(harness.store);
});

test('requestPairing breaks ties by queue order', async () => {
  const harness = createHarness();
  for (const id of ['sock-a', 'sock-b', 'sock-c']) {
    join(harness, id);
    await harness.searching.requestPairing(id, 'text', []);
  }
  join(harness, 'sock-d');
  join(harness, 'sock-e');

  const first = await harness.searching.requestPairing('sock-d', 'text', []);
  const second = await harness.searching.requestPairing('sock-e', 'text', []);

  assert.equal(first.status === 'MATCHED' && first.partnerId, 'sock-a');
  assert.equal(second.status === 'MATCHED' && second.partnerId, 'sock-b');
  assert.deepEqual(harness.store.queue, ['sock-c']);
});

test('requestPairing never pairs across modes', async () => {
  const harness = createHarness();
  join(harness, 'sock-text');
  join(harness, 'sock-video');

  await harness.searching.requestPairing('sock-text', 'text', []);
  const result = await harness.searching.requestPairing('sock-video', 'video', []);

  assert.equal(result.status, 'WAITING');
  assert.deepEqual(harness.store.queue, ['sock-text', 'sock-video']);
  assert.equal(harness.store.rooms.size, 0);
});

test('requestPairing skips banned candidates', async () => {
  const harness = createHarness();
  join(harness, 'sock-banned', '10.9.9.9');
  join(harness, 'sock-clean', '10.9.9.10');
  join(harness, 'sock-x', '10.9.9.11');
  await harness.searching.requestPairing('sock-banned', 'text', ['music']);
  await harness.searching.requestPairing('sock-clean', 'text', []);
  harness.store.bans.set('10.9.9.9', {
    banEnd: harness.clock.now() + 60_000,
    reason: 'spam',
  });

  const result = await harness.searching.requestPairing('sock-x', 'text', ['music']);

  assert.equal(result.status === 'MATCHED' && result.partnerId, 'sock-clean');
  assert.deepEqual(harness.store.queue, ['sock-banned']);
});

test('requestPairing refuses a banned requester', async () => {
  const harness = createHarness();
  join(harness, 'sock-a', '10.9.9.9');
  const banEnd = new Date(harness.clock.now() + 60_000);
  await harness.memoryStore.upsertBan({
    address: '10.9.9.9',
    banEnd,
    reason: 'harassment',
    banCount: 1,
  });

  const result = await harness.searching.requestPairing('sock-a', 'text', []);

  assert.deepEqual(result, {
    status: 'BANNED',
    banEnd: banEnd.getTime(),
    reason: 'harassment',
  });
  assert.deepEqual(harness.store.queue, []);
});

test('requestPairing returns GONE when the session vanishes mid-request', async () => {
  const harness = createHarness();
  join(harness, 'sock-a');

  const pending = harness.searching.requestPairing('sock-a', 'text', []);
  harness.store.sessions.delete('sock-a');

  assert.deepEqual(await pending, { status: 'GONE' });
  assert.deepEqual(harness.store.queue, []);
});

test('repeated requests keep a single queue entry', async () => {
  const harness = createHarness();
  join(harness, 'sock-a');

  await harness.searching.requestPairing('sock-a', 'text', []);
  await harness.searching.requestPairing('sock-a', 'text', ['music']);

  assert.deepEqual(harness.store.queue, ['sock-a']);
  assert.deepEqual(harness.store.sessions.get('sock-a')?.interests, ['music']);
});

test('requesting while in a room closes the room first', async () => {
  const harness = createHarness();
  join(harness, 'sock-a');
  join(harness, 'sock-b');
  await harness.searching.requestPairing('sock-a', 'text', []);
  await harness.searching.requestPairing('sock-b', 'text', []);

  const result = await harness.searching.requestPairing('sock-b', 'text', []);

  assert.equal(result.status, 'WAITING');
  assert.equal(harness.store.rooms.size, 0);
  assert.equal(harness.store.sessions.get('sock-a')?.roomId, undefined);
  assert.deepEqual(harness.store.queue, ['sock-b']);
  assert.equal(harness.io.eventsTo('sock-a', SERVER_EVENT.PARTNER_DISCONNECTED).length, 1);
});

test('concurrent requests with an empty queue create exactly one room', async () => {
  const harness = createHarness();
  join(harness, 'sock-a');
  join(harness, 'sock-b');

  const results = await Promise.all([
    harness.searching.requestPairing('sock-a', 'text', ['music']),
    harness.searching.requestPairing('sock-b', 'text', ['music']),
  ]);

  assert.deepEqual(
    results.map((result) => result.status).sort(),
    ['MATCHED', 'WAITING']
  );
  assert.equal(harness.store.rooms.size, 1);
  assert.deepEqual(harness.store.queue, []);
  assertConsistent(harness.store);
});

test('cancel removes a queued session and is a no-op otherwise', async () => {
  const harness = createHarness();
  join(harness, 'sock-a');
  await harness.searching.requestPairing('sock-a', 'text', []);

  assert.deepEqual(harness.searching.cancel('sock-a'), { status: 'CANCELLED' });
  assert.equal(isQueued(harness.store, 'sock-a'), false);
  assert.deepEqual(harness.searching.cancel('sock-a'), { status: 'NOOP' });
  assert.deepEqual(harness.searching.cancel('sock-unknown'), { status: 'NOOP' });
});

test('no session is ever both queued and in a room under random interleavings', async () => {
  for (const seed of [1, 7, 42, 1337]) {
    const random = mulberry32(seed);
    const harness = createHarness();
    const ids = Array.from({ length: 8 }, (_, index) => `sock-${index}`);
    const interestPool = ['music', 'gaming', 'films', 'travel'];
    let created = 0;

    for (let step = 0; step < 200; step += 1) {
      const pending: Promise<unknown>[] = [];
      const burst = 1 + Math.floor(random() * 4);
      for (let i = 0; i < burst; i += 1) {
        const id = ids[Math.floor(random() * ids.length)];
        const action = random();
        if (!harness.store.sessions.has(id)) {
          created += 1;
          join(harness, id, `10.2.${seed}.${created}`);
        } else if (action < 0.5) {
          const mode = random() < 0.7 ? 'text' : 'video';
          const interests = interestPool.filter(() => random() < 0.4);
          pending.push(harness.searching.requestPairing(id, mode, interests));
        } else if (action < 0.65) {
          harness.searching.cancel(id);
        } else if (action < 0.85) {
          harness.rooms.leaveRoom(id, 'next');
        } else {
          harness.rooms.endSession(id, 'disconnect');
        }
        assertConsistent(harness.store);
      }
      await Promise.all(pending);
      assertConsistent(harness.store);
    }
  }
});
