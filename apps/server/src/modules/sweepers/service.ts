import { TERMINATION_REASON } from '@strangerline/shared';
import { getStats, type Store } from '../../core/store';
import { errorMessage, type Logger } from '../../core/logger';
import { createScheduledTask, type ScheduledTask } from '../../core/scheduler';
import type { SocketHub } from '../../core/socket';
import type { BanService } from '../moderation/bans';
import type { RoomService } from '../room/service';
import type { TranscriptCache } from '../room/transcripts';

type SweeperOptions = {
  store: Store;
  bans: BanService;
  rooms: RoomService;
  transcripts: TranscriptCache;
  hub: SocketHub;
  logger: Logger;
  banSweepIntervalMs: number;
  staleSweepIntervalMs: number;
  staleSessionTimeoutMs: number;
  transcriptSweepIntervalMs: number;
  now?: () => number;
};

export type Sweepers = {
  tasks: ScheduledTask[];
  sweepStaleSessions: () => string[];
  start: () => void;
  stop: () => void;
};

/**
 * Idle sessions are evicted like a disconnect. A session bound to a room is
 * treated as active: media flows peer to peer and never touches the server.
 */
export const findStaleSessions = (store: Store, cutoff: number): string[] =>
  [...store.sessions.values()]
    .filter((session) => !session.roomId && session.lastActiveAt < cutoff)
    .map((session) => session.id);

export const createSweepers = (options: SweeperOptions): Sweepers => {
  const { store, bans, rooms, transcripts, hub, logger } = options;
  const now = options.now ?? Date.now;

  const sweepStaleSessions = (): string[] => {
    const evicted: string[] = [];
    for (const sessionId of findStaleSessions(store, now() - options.staleSessionTimeoutMs)) {
      try {
        rooms.endSession(sessionId, TERMINATION_REASON.STALE);
        hub.disconnect(sessionId);
        evicted.push(sessionId);
      } catch (error) {
        logger.error(
          { event: 'stale_session_sweep_failed', sessionId, errorMessage: errorMessage(error) },
          'Stale session could not be evicted'
        );
      }
    }
    if (evicted.length > 0) {
      logger.info({ event: 'stale_sessions_evicted', count: evicted.length }, 'Stale sessions evicted');
      hub.broadcastStats(getStats(store));
    }
    return evicted;
  };

  const tasks = [
    createScheduledTask({
      name: 'ban-expiry',
      intervalMs: options.banSweepIntervalMs,
      logger,
      run: async () => {
        await bans.sweepExpired();
      },
    }),
    createScheduledTask({
      name: 'stale-sessions',
      intervalMs: options.staleSweepIntervalMs,
      logger,
      run: () => {
        sweepStaleSessions();
      },
    }),
    createScheduledTask({
      name: 'transcript-eviction',
      intervalMs: options.transcriptSweepIntervalMs,
      logger,
      run: () => {
        const evicted = transcripts.evict();
        if (evicted > 0) {
          logger.info({ event: 'transcripts_evicted', evicted }, 'Transcripts evicted');
        }
      },
    }),
  ];

  return {
    tasks,
    sweepStaleSessions,
    start: () => {
      for (const task of tasks) task.start();
    },
    stop: () => {
      for (const task of tasks) task.stop();
    },
  };
};
