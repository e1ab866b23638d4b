import test from 'node:test';
import assert from 'node:assert/strict';
import Fastify from 'fastify';
import { createSession, createStore } from '../../core/store';
import { registerSearchingRoutes } from './routes';

const buildApp = () => {
  const fastify = Fastify({ logger: false });
  const store = createStore();
  registerSearchingRoutes(fastify, { store });
  return { fastify, store };
};

test('GET /stats reports an empty server', async () => {
  const { fastify } = buildApp();
  const response = await fastify.inject({ method: 'GET', url: '/stats' });

  assert.equal(response.statusCode, 200);
  assert.deepEqual(response.json(), { online: 0, waiting: 0, active_chats: 0 });
  await fastify.close();
});

test('GET /stats counts sessions, waiting users and rooms', async () => {
  const { fastify, store } = buildApp();
  for (const id of ['sock-a', 'sock-b', 'sock-c']) {
    createSession(store, { id, address: `10.0.0.${id.length}`, now: 0 });
  }
  store.queue.push('sock-c');
  store.rooms.set('room-1', {
    id: 'room-1',
    userIds: ['sock-a', 'sock-b'],
    initiatorId: 'sock-a',
    mode: 'text',
    createdAt: 0,
  });

  const response = await fastify.inject({ method: 'GET', url: '/stats' });

  assert.equal(response.statusCode, 200);
  assert.deepEqual(response.json(), { online: 3, waiting: 1, active_chats: 1 });
  await fastify.close();
});
