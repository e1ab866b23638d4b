import {
  ERROR_CODE,
  MAX_COMMENT_LENGTH,
  ReportReasonSchema,
  TERMINATION_REASON,
  type ReportReason,
} from '@strangerline/shared';
import { sessionsAt, type Store } from '../../core/store';
import { errorMessage, type Logger } from '../../core/logger';
import type { SocketHub } from '../../core/socket';
import { escapeHtml, type RoomService } from '../room/service';
import type { TranscriptCache, TranscriptEntry } from '../room/transcripts';
import type { BanService, PendingBan } from './bans';
import type { TranscriptSink } from './sink';
import type { ModerationStore, ReportRecord } from './store';

export type ReportInput = {
  reporterId: string;
  reportedId: string;
  reason: string;
  comment: string;
};

export type ReportOutcome = {
  reportId?: number;
  reportCount: number;
  transcriptPath?: string;
  ban?: {
    banEnd: Date;
    reason: string;
    durationSeconds: number;
    evictedSessionIds: string[];
  };
};

export type ModerationService = {
  reportUser: (input: ReportInput) => Promise<ReportOutcome>;
};

type ModerationServiceOptions = {
  store: Store;
  moderationStore: ModerationStore;
  bans: BanService;
  rooms: RoomService;
  transcripts: TranscriptCache;
  sink: TranscriptSink;
  hub: SocketHub;
  logger: Logger;
  reportThreshold: number;
  now?: () => number;
};

export const sanitizeComment = (comment: string): string =>
  escapeHtml(comment.slice(0, MAX_COMMENT_LENGTH));

export const createModerationService = (
  options: ModerationServiceOptions
): ModerationService => {
  const { store, moderationStore, bans, rooms, transcripts, sink, hub, logger } = options;
  const now = options.now ?? Date.now;

  const persistTranscript = async (
    reportId: number,
    reportedAddress: string,
    reportedAt: Date,
    entries: TranscriptEntry[]
  ): Promise<string | undefined> => {
    try {
      const filePath = await sink.save({ reportId, reportedAddress, reportedAt, entries });
      logger.info({ event: 'transcript_saved', reportId, filePath }, 'Conversation log saved');
      return filePath;
    } catch (error) {
      logger.error(
        { event: 'transcript_save_failed', reportId, errorMessage: errorMessage(error) },
        'Conversation log could not be saved'
      );
      return undefined;
    }
  };

  // Tears down every live session on the banned address.
  const evict = (ban: PendingBan): string[] => {
    const notice = { ban_end: ban.banEnd.toISOString(), reason: ban.reason };
    const evicted: string[] = [];
    for (const session of sessionsAt(store, ban.address)) {
      rooms.endSession(session.id, TERMINATION_REASON.BANNED);
      hub.emitForceDisconnect(session.id, notice);
      evicted.push(session.id);
    }
    return evicted;
  };

  const escalate = async (address: string, reason: ReportReason, record: ReportRecord) => {
    const ban = await bans.prepareBan(address, reason, record.banCount);
    const evictedSessionIds = evict(ban);
    await bans.persistBan(ban);
    return {
      banEnd: ban.banEnd,
      reason: ban.reason,
      durationSeconds: ban.durationSeconds,
      evictedSessionIds,
    };
  };

  return {
    reportUser: async ({ reporterId, reportedId, reason, comment }) => {
      if (reporterId === reportedId) {
        throw new Error(ERROR_CODE.CANNOT_REPORT_SELF);
      }
      const reporter = store.sessions.get(reporterId);
      const reported = store.sessions.get(reportedId);
      if (!reporter || !reported) {
        throw new Error(ERROR_CODE.USER_NOT_FOUND);
      }
      const parsedReason = ReportReasonSchema.safeParse(reason);
      if (!parsedReason.success) {
        throw new Error(ERROR_CODE.INVALID_REASON);
      }

      const reportedAddress = reported.address;
      const reportedAt = new Date(now());
      const evidence = reporter.roomId ? transcripts.snapshot(reporter.roomId) : undefined;

      let record: ReportRecord;
      try {
        record = await moderationStore.incrementReport(reportedAddress, reportedAt);
      } catch (error) {
        logger.error(
          { event: 'report_store_failed', reporterId, reportedId, errorMessage: errorMessage(error) },
          'Report could not be recorded'
        );
        throw new Error(ERROR_CODE.REPORT_UNAVAILABLE);
      }

      // The count is committed at this point, so escalation goes ahead even without a log entry.
      let reportId: number | undefined;
      try {
        reportId = await moderationStore.appendReportLog({
          reporterAddress: reporter.address,
          reportedAddress,
          reason: parsedReason.data,
          comment: sanitizeComment(comment),
          timestamp: reportedAt,
        });
      } catch (error) {
        logger.error(
          { event: 'report_log_failed', reporterId, reportedId, errorMessage: errorMessage(error) },
          'Report log entry could not be written'
        );
      }

      const transcriptPath = evidence && reportId !== undefined
        ? await persistTranscript(reportId, reportedAddress, reportedAt, evidence)
        : undefined;

      logger.info(
        {
          event: 'user_reported',
          reportId,
          reporterId,
          reportedId,
          reporterAddress: reporter.address,
          reportedAddress,
          reason: parsedReason.data,
          reportCount: record.reportCount,
        },
        'User reported'
      );

      if (record.reportCount < options.reportThreshold) {
        return { reportId, reportCount: record.reportCount, transcriptPath };
      }

      const ban = await escalate(reportedAddress, parsedReason.data, record);
      return { reportId, reportCount: record.reportCount, transcriptPath, ban };
    },
  };
};
