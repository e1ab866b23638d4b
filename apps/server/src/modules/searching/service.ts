import { TERMINATION_REASON, type ChatMode } from '@strangerline/shared';
import { removeFromQueue, type Room, type SessionRecord, type Store } from '../../core/store';
import type { Logger } from '../../core/logger';
import type { BanService, BanStatus } from '../moderation/bans';
import type { RoomService } from '../room/service';
import { normalizeInterests, rankCandidates } from './compatibility';

export type PairingResult =
  | { status: 'GONE' }
  | { status: 'BANNED'; banEnd: number; reason: string }
  | { status: 'WAITING' }
  | { status: 'MATCHED'; room: Room; requesterId: string; partnerId: string };

export type CancelResult = {
  status: 'CANCELLED' | 'NOOP';
};

export type SearchingService = {
  requestPairing: (
    sessionId: string,
    mode: ChatMode,
    interests: readonly string[]
  ) => Promise<PairingResult>;
  cancel: (sessionId: string) => CancelResult;
};

type SearchingServiceOptions = {
  store: Store;
  bans: BanService;
  rooms: RoomService;
  logger: Logger;
};

const toBannedResult = (status: Extract<BanStatus, { banned: true }>): PairingResult => ({
  status: 'BANNED',
  banEnd: status.banEnd,
  reason: status.reason,
});

const waitingOfMode = (store: Store, mode: ChatMode, excludeId: string): SessionRecord[] => {
  const waiting: SessionRecord[] = [];
  for (const id of store.queue) {
    if (id === excludeId) continue;
    const candidate = store.sessions.get(id);
    if (candidate && candidate.mode === mode && !candidate.roomId) {
      waiting.push(candidate);
    }
  }
  return waiting;
};

export const createSearchingService = (options: SearchingServiceOptions): SearchingService => {
  const { store, bans, rooms, logger } = options;

  /**
   * Selection, removal and room creation in one synchronous block. Candidate
   * mode and queue membership are read from current state here, and the
   * in-process ban list is re-checked at selection time.
   */
  const pairOrEnqueue = (
    sessionId: string,
    mode: ChatMode,
    interests: string[],
    bannedAddresses: ReadonlySet<string>
  ): PairingResult => {
    const session = store.sessions.get(sessionId);
    if (!session) return { status: 'GONE' };

    const selfBan = bans.isBlocked(session.address);
    if (selfBan.banned) return toBannedResult(selfBan);

    if (session.roomId) {
      rooms.leaveRoom(sessionId, TERMINATION_REASON.REQUEUE);
    }
    session.mode = mode;
    session.interests = interests;
    removeFromQueue(store, sessionId);

    const candidates = waitingOfMode(store, mode, sessionId).filter(
      (candidate) => !bannedAddresses.has(candidate.address)
    );
    const ranked = rankCandidates(interests, candidates);
    const selected = ranked.find(
      ({ candidate }) => !bans.isBlocked(candidate.address).banned
    );

    if (!selected) {
      store.queue.push(sessionId);
      logger.info(
        { event: 'queued', sessionId, mode, waiting: store.queue.length },
        'Session waiting for partner'
      );
      return { status: 'WAITING' };
    }

    const partnerId = selected.candidate.id;
    removeFromQueue(store, partnerId);
    const room = rooms.createRoom(sessionId, partnerId, mode);

    logger.info(
      { event: 'partner_found', sessionId, partnerId, roomId: room.id, score: selected.score },
      'Partner found'
    );
    return { status: 'MATCHED', room, requesterId: sessionId, partnerId };
  };

  return {
    requestPairing: async (sessionId, mode, rawInterests) => {
      const session = store.sessions.get(sessionId);
      if (!session) return { status: 'GONE' };

      const ban = await bans.checkBan(session.address);
      if (ban.banned) return toBannedResult(ban);

      const interests = normalizeInterests(rawInterests);
      const addresses = new Set(
        waitingOfMode(store, mode, sessionId).map((candidate) => candidate.address)
      );
      const statuses = await Promise.all(
        [...addresses].map(async (address) => ({ address, status: await bans.checkBan(address) }))
      );
      const bannedAddresses = new Set(
        statuses.filter(({ status }) => status.banned).map(({ address }) => address)
      );

      return pairOrEnqueue(sessionId, mode, interests, bannedAddresses);
    },
    cancel: (sessionId) => {
      const removed = removeFromQueue(store, sessionId);
      if (removed) {
        logger.info({ event: 'search_cancelled', sessionId }, 'Search cancelled');
      }
      return { status: removed ? 'CANCELLED' : 'NOOP' };
    },
  };
};
