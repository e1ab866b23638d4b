import type { BanEntry, Store } from '../../core/store';
import { errorMessage, type Logger } from '../../core/logger';
import type { BanRecord, ModerationStore } from './store';

export type BanStatus =
  | { banned: false }
  | { banned: true; banEnd: number; reason: string };

export type PendingBan = BanRecord & {
  durationSeconds: number;
};

export type BanService = {
  checkBan: (address: string) => Promise<BanStatus>;
  isBlocked: (address: string) => BanStatus;
  prepareBan: (address: string, reason: string, knownBanCount: number) => Promise<PendingBan>;
  persistBan: (ban: PendingBan) => Promise<boolean>;
  sweepExpired: () => Promise<number>;
  flushDeferred: () => Promise<number>;
  deferredCount: () => number;
};

type BanServiceOptions = {
  store: Store;
  moderationStore: ModerationStore;
  logger: Logger;
  baseDurationSeconds: number;
  now?: () => number;
};

const NOT_BANNED: BanStatus = { banned: false };

export const MAX_BAN_DURATION_SECONDS = 365 * 24 * 60 * 60;

/** Ban length after `priorBans` earlier bans: base, then doubling, capped at one year. */
export const banDurationSeconds = (priorBans: number, baseDurationSeconds: number): number =>
  Math.min(baseDurationSeconds * 2 ** Math.max(0, priorBans), MAX_BAN_DURATION_SECONDS);

const toStatus = (entry: BanEntry): BanStatus => ({
  banned: true,
  banEnd: entry.banEnd,
  reason: entry.reason,
});

export const createBanService = (options: BanServiceOptions): BanService => {
  const { store, moderationStore, logger } = options;
  const now = options.now ?? Date.now;
  const deferred = new Map<string, PendingBan>();

  const isBlocked = (address: string): BanStatus => {
    const entry = store.bans.get(address);
    if (!entry) return NOT_BANNED;
    if (entry.banEnd <= now()) {
      store.bans.delete(address);
      return NOT_BANNED;
    }
    return toStatus(entry);
  };

  const checkBan = async (address: string): Promise<BanStatus> => {
    let record: BanRecord | null;
    try {
      record = await moderationStore.lookupBan(address);
    } catch (error) {
      logger.warn(
        { event: 'ban_lookup_failed', address, errorMessage: errorMessage(error) },
        'Ban lookup failed, using in-process bans'
      );
      return isBlocked(address);
    }

    if (record && record.banEnd.getTime() > now()) {
      const entry = { banEnd: record.banEnd.getTime(), reason: record.reason };
      store.bans.set(address, entry);
      return toStatus(entry);
    }

    if (record) {
      try {
        await moderationStore.deleteBan(address);
        logger.info({ event: 'ban_expired', address }, 'Expired ban removed');
      } catch (error) {
        logger.warn(
          { event: 'ban_delete_failed', address, errorMessage: errorMessage(error) },
          'Expired ban could not be removed'
        );
      }
    }

    return isBlocked(address);
  };

  const prepareBan = async (
    address: string,
    reason: string,
    knownBanCount: number
  ): Promise<PendingBan> => {
    let priorBans = knownBanCount;
    try {
      const active = await moderationStore.lookupBan(address);
      if (active) priorBans = Math.max(priorBans, active.banCount);
    } catch (error) {
      logger.warn(
        { event: 'ban_lookup_failed', address, errorMessage: errorMessage(error) },
        'Prior ban count unavailable, using report record'
      );
    }

    const durationSeconds = banDurationSeconds(priorBans, options.baseDurationSeconds);
    const banEnd = now() + durationSeconds * 1000;
    store.bans.set(address, { banEnd, reason });

    return {
      address,
      banEnd: new Date(banEnd),
      reason,
      banCount: priorBans + 1,
      durationSeconds,
    };
  };

  const persistBan = async (ban: PendingBan): Promise<boolean> => {
    try {
      await moderationStore.upsertBan({
        address: ban.address,
        banEnd: ban.banEnd,
        reason: ban.reason,
        banCount: ban.banCount,
      });
      deferred.delete(ban.address);
      logger.warn(
        {
          event: 'user_banned',
          address: ban.address,
          banEnd: ban.banEnd.toISOString(),
          banCount: ban.banCount,
          durationSeconds: ban.durationSeconds,
          reason: ban.reason,
        },
        'Address banned'
      );
      return true;
    } catch (error) {
      deferred.set(ban.address, ban);
      logger.error(
        { event: 'ban_write_deferred', address: ban.address, errorMessage: errorMessage(error) },
        'Ban write failed, queued for retry'
      );
      return false;
    }
  };

  const flushDeferred = async (): Promise<number> => {
    let written = 0;
    for (const ban of [...deferred.values()]) {
      if (ban.banEnd.getTime() <= now()) {
        deferred.delete(ban.address);
        continue;
      }
      if (await persistBan(ban)) written += 1;
    }
    return written;
  };

  const sweepExpired = async (): Promise<number> => {
    let deleted = 0;
    try {
      deleted = await moderationStore.deleteExpiredBans(new Date(now()));
      if (deleted > 0) {
        logger.info({ event: 'bans_expired', deleted }, 'Expired bans removed');
      }
    } catch (error) {
      logger.error(
        { event: 'ban_sweep_failed', errorMessage: errorMessage(error) },
        'Expired ban sweep failed'
      );
    }

    for (const address of [...store.bans.keys()]) {
      isBlocked(address);
    }
    await flushDeferred();
    return deleted;
  };

  return {
    checkBan,
    isBlocked,
    prepareBan,
    persistBan,
    sweepExpired,
    flushDeferred,
    deferredCount: () => deferred.size,
  };
};
