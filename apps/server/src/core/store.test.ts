import test from 'node:test';
import assert from 'node:assert/strict';
import {
  createSession,
  createStore,
  getStats,
  isQueued,
  partnerOf,
  removeFromQueue,
  sessionsAt,
  type Room,
} from './store';

test('createSession registers an idle session', () => {
  const store = createStore();
  const session = createSession(store, { id: 'sock-a', address: '10.0.0.1', now: 1000 });

  assert.equal(store.sessions.get('sock-a'), session);
  assert.deepEqual(session.interests, []);
  assert.equal(session.mode, undefined);
  assert.equal(session.roomId, undefined);
  assert.equal(session.connectedAt, 1000);
  assert.equal(session.lastActiveAt, 1000);
});

test('removeFromQueue is safe on sessions that are not queued', () => {
  const store = createStore();
  store.queue.push('sock-a', 'sock-b');

  assert.equal(removeFromQueue(store, 'sock-c'), false);
  assert.equal(removeFromQueue(store, 'sock-a'), true);
  assert.deepEqual(store.queue, ['sock-b']);
  assert.equal(isQueued(store, 'sock-a'), false);
  assert.equal(isQueued(store, 'sock-b'), true);
});

test('partnerOf returns the other member', () => {
  const room: Room = {
    id: 'room-1',
    userIds: ['sock-a', 'sock-b'],
    initiatorId: 'sock-a',
    mode: 'text',
    createdAt: 0,
  };
  assert.equal(partnerOf(room, 'sock-a'), 'sock-b');
  assert.equal(partnerOf(room, 'sock-b'), 'sock-a');
});

test('sessionsAt finds every session on an address', () => {
  const store = createStore();
  createSession(store, { id: 'sock-a', address: '10.0.0.1', now: 0 });
  createSession(store, { id: 'sock-b', address: '10.0.0.2', now: 0 });
  createSession(store, { id: 'sock-c', address: '10.0.0.1', now: 0 });

  assert.deepEqual(
    sessionsAt(store, '10.0.0.1').map((session) => session.id),
    ['sock-a', 'sock-c']
  );
});

test('getStats counts sessions, queue and rooms', () => {
  const store = createStore();
  createSession(store, { id: 'sock-a', address: '10.0.0.1', now: 0 });
  createSession(store, { id: 'sock-b', address: '10.0.0.2', now: 0 });
  createSession(store, { id: 'sock-c', address: '10.0.0.3', now: 0 });
  store.queue.push('sock-c');
  store.rooms.set('room-1', {
    id: 'room-1',
    userIds: ['sock-a', 'sock-b'],
    initiatorId: 'sock-a',
    mode: 'video',
    createdAt: 0,
  });

  assert.deepEqual(getStats(store), { online: 3, waiting: 1, active_chats: 1 });
});
