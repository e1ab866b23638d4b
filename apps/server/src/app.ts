import Fastify from 'fastify';
import cors from '@fastify/cors';
import { Server } from 'socket.io';
import { loadConfig } from './config';
import { createStore } from './core/store';
import { createSocketHub, registerSocketHandlers } from './core/socket';
import { createSearchingService, registerSearchingRoutes } from './modules/searching';
import { createRoomService, createTranscriptCache } from './modules/room';
import {
  createBanService,
  createFileTranscriptSink,
  createMemoryModerationStore,
  createModerationService,
  MongoModerationStore,
  registerModerationRoutes,
  type ModerationStore,
} from './modules/moderation';
import { createSweepers } from './modules/sweepers';

const config = loadConfig();

const fastify = Fastify({
  logger: { level: config.logLevel },
  trustProxy: config.trustProxy,
});
fastify.register(cors, {
  origin: config.corsOrigin === '*' ? true : config.corsOrigin.split(','),
});
const io = new Server(fastify.server, {
  cors: {
    origin: config.corsOrigin === '*' ? '*' : config.corsOrigin.split(','),
  },
});

const connectModerationStore = async (): Promise<ModerationStore> => {
  const mongo = await MongoModerationStore.connect(config.mongoUri);
  if (mongo) {
    fastify.log.info({ event: 'moderation_store', backend: 'mongo' }, 'Moderation store connected');
    return mongo;
  }
  fastify.log.warn(
    { event: 'moderation_store', backend: 'memory' },
    'MONGO_URI not set, bans and reports are kept in memory'
  );
  return createMemoryModerationStore();
};

const start = async () => {
  try {
    const moderationStore = await connectModerationStore();
    const store = createStore();
    const hub = createSocketHub(io);
    const logger = fastify.log;

    const bans = createBanService({
      store,
      moderationStore,
      logger,
      baseDurationSeconds: config.banDurationSeconds,
    });
    const transcripts = createTranscriptCache({
      maxAgeMs: config.transcriptRetentionMs,
      maxRooms: config.transcriptMaxRooms,
    });
    const rooms = createRoomService({ store, hub, bans, transcripts, logger });
    const searching = createSearchingService({ store, bans, rooms, logger });
    const moderation = createModerationService({
      store,
      moderationStore,
      bans,
      rooms,
      transcripts,
      sink: createFileTranscriptSink(config.transcriptDir),
      hub,
      logger,
      reportThreshold: config.reportThreshold,
    });
    const sweepers = createSweepers({
      store,
      bans,
      rooms,
      transcripts,
      hub,
      logger,
      banSweepIntervalMs: config.banSweepIntervalMs,
      staleSweepIntervalMs: config.staleSweepIntervalMs,
      staleSessionTimeoutMs: config.staleSessionTimeoutMs,
      transcriptSweepIntervalMs: config.transcriptSweepIntervalMs,
    });

    registerSocketHandlers(io, {
      store,
      hub,
      bans,
      searching,
      rooms,
      moderation,
      logger,
      trustProxy: config.trustProxy,
    });

    fastify.get('/ping', async () => ({
      status: 'ok',
      timestamp: new Date().toISOString(),
    }));
    registerSearchingRoutes(fastify, { store });
    registerModerationRoutes(fastify, { bans });

    const shutdown = async (signal: string) => {
      fastify.log.info({ event: 'shutdown', signal }, 'Shutting down');
      sweepers.stop();
      io.disconnectSockets(true);
      await fastify.close();
      await moderationStore.close();
      process.exit(0);
    };
    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.once(signal, () => {
        shutdown(signal).catch((err: unknown) => {
          fastify.log.error(err);
          process.exit(1);
        });
      });
    }

    await fastify.listen({ port: config.port, host: config.host });
    sweepers.start();
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

void start();
