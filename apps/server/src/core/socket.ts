import type { Server, Socket } from 'socket.io';
import { z } from 'zod';
import {
  BanNoticeSchema,
  CLIENT_EVENT,
  ERROR_CODE,
  ERROR_CODES,
  ErrorEventSchema,
  FindPartnerRequestSchema,
  IceCandidateSchema,
  MatchedEventSchema,
  MessageEventSchema,
  ReportUserRequestSchema,
  SendMessageRequestSchema,
  SERVER_EVENT,
  StatsUpdateEventSchema,
  TERMINATION_REASON,
  VideoAnswerSchema,
  VideoOfferSchema,
  type BanNotice,
  type ClientEvent,
  type ErrorCode,
} from '@strangerline/shared';
import { createSession, getStats, type Store } from './store';
import { errorMessage, type Logger } from './logger';
import type { BanService } from '../modules/moderation/bans';
import type { ModerationService } from '../modules/moderation/service';
import type { RoomService } from '../modules/room/service';
import type { SearchingService } from '../modules/searching/service';

export type SignalKind = 'offer' | 'answer' | 'candidate';

const SIGNAL_EVENT: Record<SignalKind, string> = {
  offer: SERVER_EVENT.VIDEO_OFFER,
  answer: SERVER_EVENT.VIDEO_ANSWER,
  candidate: SERVER_EVENT.ICE_CANDIDATE,
};

export type SocketHub = {
  emitWaiting: (sessionId: string) => boolean;
  emitMatched: (sessionId: string, payload: unknown) => boolean;
  emitMessage: (sessionId: string, payload: unknown) => boolean;
  emitTyping: (sessionId: string, isTyping: boolean) => boolean;
  emitSignal: (sessionId: string, kind: SignalKind, payload: unknown) => boolean;
  emitPartnerDisconnected: (sessionId: string) => boolean;
  emitBanned: (sessionId: string, payload: unknown) => boolean;
  emitForceDisconnect: (sessionId: string, payload: unknown) => boolean;
  emitError: (sessionId: string, code: ErrorCode) => boolean;
  emitStats: (sessionId: string, payload: unknown) => boolean;
  broadcastStats: (payload: unknown) => boolean;
  disconnect: (sessionId: string) => void;
};

// Session ids are socket ids, so every socket already sits in a room named by its id.
export const createSocketHub = (io: Server): SocketHub => ({
  emitWaiting: (sessionId) => {
    io.to(sessionId).emit(SERVER_EVENT.WAITING);
    return true;
  },
  emitMatched: (sessionId, payload) => {
    const parsed = MatchedEventSchema.safeParse(payload);
    if (!parsed.success) return false;
    io.to(sessionId).emit(SERVER_EVENT.MATCHED, parsed.data);
    return true;
  },
  emitMessage: (sessionId, payload) => {
    const parsed = MessageEventSchema.safeParse(payload);
    if (!parsed.success) return false;
    io.to(sessionId).emit(SERVER_EVENT.MESSAGE, parsed.data);
    return true;
  },
  emitTyping: (sessionId, isTyping) => {
    io.to(sessionId).emit(isTyping ? SERVER_EVENT.TYPING : SERVER_EVENT.STOP_TYPING);
    return true;
  },
  emitSignal: (sessionId, kind, payload) => {
    io.to(sessionId).emit(SIGNAL_EVENT[kind], { [kind]: payload });
    return true;
  },
  emitPartnerDisconnected: (sessionId) => {
    io.to(sessionId).emit(SERVER_EVENT.PARTNER_DISCONNECTED);
    return true;
  },
  emitBanned: (sessionId, payload) => {
    const parsed = BanNoticeSchema.safeParse(payload);
    if (!parsed.success) return false;
    io.to(sessionId).emit(SERVER_EVENT.BANNED, parsed.data);
    return true;
  },
  emitForceDisconnect: (sessionId, payload) => {
    const parsed = BanNoticeSchema.safeParse(payload);
    if (!parsed.success) return false;
    io.to(sessionId).emit(SERVER_EVENT.FORCE_DISCONNECT, parsed.data);
    io.in(sessionId).disconnectSockets(true);
    return true;
  },
  emitError: (sessionId, code) => {
    const parsed = ErrorEventSchema.safeParse({ message: code });
    if (!parsed.success) return false;
    io.to(sessionId).emit(SERVER_EVENT.ERROR, parsed.data);
    return true;
  },
  emitStats: (sessionId, payload) => {
    const parsed = StatsUpdateEventSchema.safeParse(payload);
    if (!parsed.success) return false;
    io.to(sessionId).emit(SERVER_EVENT.STATS_UPDATE, parsed.data);
    return true;
  },
  broadcastStats: (payload) => {
    const parsed = StatsUpdateEventSchema.safeParse(payload);
    if (!parsed.success) return false;
    io.emit(SERVER_EVENT.STATS_UPDATE, parsed.data);
    return true;
  },
  disconnect: (sessionId) => {
    io.in(sessionId).disconnectSockets(true);
  },
});

export class AdmissionError extends Error {
  readonly data: BanNotice;

  constructor(notice: BanNotice) {
    super('BANNED');
    this.data = notice;
  }
}

type Handshake = {
  address: string;
  headers: Record<string, string | string[] | undefined>;
};

export const resolveAddress = (handshake: Handshake, trustProxy: boolean): string => {
  if (trustProxy) {
    const header = handshake.headers['x-forwarded-for'];
    const raw = Array.isArray(header) ? header[0] : header;
    const forwarded = raw?.split(',')[0]?.trim();
    if (forwarded) return forwarded;
  }
  return handshake.address || 'unknown';
};

type SocketDependencies = {
  store: Store;
  hub: SocketHub;
  bans: BanService;
  searching: SearchingService;
  rooms: RoomService;
  moderation: ModerationService;
  logger: Logger;
  trustProxy: boolean;
  now?: () => number;
};

const KNOWN_ERROR_CODES = new Set<string>(ERROR_CODES);

const isErrorCode = (value: string): value is ErrorCode => KNOWN_ERROR_CODES.has(value);

const NoPayloadSchema = z.unknown();

export const registerSocketHandlers = (io: Server, deps: SocketDependencies) => {
  const { store, hub, bans, searching, rooms, moderation, logger } = deps;
  const now = deps.now ?? Date.now;

  const publishStats = () => hub.broadcastStats(getStats(store));

  io.use((socket, next) => {
    const address = resolveAddress(socket.handshake, deps.trustProxy);
    bans
      .checkBan(address)
      .then((status) => {
        if (!status.banned) {
          next();
          return;
        }
        logger.info({ event: 'connection_refused', address }, 'Banned address refused');
        next(
          new AdmissionError({
            ban_end: new Date(status.banEnd).toISOString(),
            reason: status.reason,
          })
        );
      })
      .catch((error: unknown) => {
        logger.error(
          { event: 'admission_failed', address, errorMessage: errorMessage(error) },
          'Admission check failed'
        );
        next(error instanceof Error ? error : new Error(ERROR_CODE.INTERNAL_ERROR));
      });
  });

  io.on('connection', (socket: Socket) => {
    const sessionId = socket.id;
    const address = resolveAddress(socket.handshake, deps.trustProxy);
    createSession(store, { id: sessionId, address, now: now() });
    logger.info({ event: 'session_connected', sessionId, address }, 'Session connected');
    publishStats();

    const fail = (event: ClientEvent, error: unknown) => {
      const message = errorMessage(error);
      if (isErrorCode(message)) {
        hub.emitError(sessionId, message);
        return;
      }
      logger.error(
        { event: 'socket_handler_failed', sessionId, clientEvent: event, errorMessage: message },
        'Socket handler failed'
      );
      hub.emitError(sessionId, ERROR_CODE.INTERNAL_ERROR);
    };

    const on = <S extends z.ZodTypeAny>(
      event: ClientEvent,
      schema: S,
      handler: (payload: z.output<S>) => Promise<void> | void
    ) => {
      socket.on(event, async (raw: unknown) => {
        const session = store.sessions.get(sessionId);
        if (!session) return;
        session.lastActiveAt = now();

        const parsed = schema.safeParse(raw ?? {});
        if (!parsed.success) {
          hub.emitError(sessionId, ERROR_CODE.INVALID_PAYLOAD);
          return;
        }
        try {
          await handler(parsed.data);
        } catch (error) {
          fail(event, error);
        }
      });
    };

    on(CLIENT_EVENT.FIND_PARTNER, FindPartnerRequestSchema, async (payload) => {
      const result = await searching.requestPairing(sessionId, payload.chat_mode, payload.interests);
      switch (result.status) {
        case 'BANNED':
          hub.emitBanned(sessionId, {
            ban_end: new Date(result.banEnd).toISOString(),
            reason: result.reason,
          });
          return;
        case 'WAITING':
          hub.emitWaiting(sessionId);
          break;
        case 'MATCHED':
          hub.emitMatched(result.requesterId, {
            room: result.room.id,
            partner_id: result.partnerId,
            initiator: true,
          });
          hub.emitMatched(result.partnerId, {
            room: result.room.id,
            partner_id: result.requesterId,
            initiator: false,
          });
          break;
        case 'GONE':
          return;
      }
      publishStats();
    });

    on(CLIENT_EVENT.STOP_SEARCHING, NoPayloadSchema, () => {
      if (searching.cancel(sessionId).status === 'CANCELLED') publishStats();
    });

    on(CLIENT_EVENT.SEND_MESSAGE, SendMessageRequestSchema, (payload) => {
      rooms.relayMessage(sessionId, payload.message);
    });

    on(CLIENT_EVENT.TYPING, NoPayloadSchema, () => {
      rooms.relayTypingSignal(sessionId, true);
    });

    on(CLIENT_EVENT.STOP_TYPING, NoPayloadSchema, () => {
      rooms.relayTypingSignal(sessionId, false);
    });

    on(CLIENT_EVENT.VIDEO_OFFER, VideoOfferSchema, (payload) => {
      rooms.relaySignalingPayload(sessionId, 'offer', payload.offer);
    });

    on(CLIENT_EVENT.VIDEO_ANSWER, VideoAnswerSchema, (payload) => {
      rooms.relaySignalingPayload(sessionId, 'answer', payload.answer);
    });

    on(CLIENT_EVENT.ICE_CANDIDATE, IceCandidateSchema, (payload) => {
      rooms.relaySignalingPayload(sessionId, 'candidate', payload.candidate);
    });

    on(CLIENT_EVENT.NEXT_PARTNER, NoPayloadSchema, () => {
      const cancelled = searching.cancel(sessionId);
      const left = rooms.leaveRoom(sessionId, TERMINATION_REASON.NEXT);
      if (cancelled.status === 'CANCELLED' || left.status === 'LEFT') publishStats();
    });

    on(CLIENT_EVENT.REPORT_USER, ReportUserRequestSchema, async (payload) => {
      const outcome = await moderation.reportUser({
        reporterId: sessionId,
        reportedId: payload.reported_id,
        reason: payload.reason,
        comment: payload.comment,
      });
      if (outcome.ban) publishStats();
    });

    on(CLIENT_EVENT.CHANGE_MODE, NoPayloadSchema, () => {
      rooms.endSession(sessionId, TERMINATION_REASON.CHANGE_MODE);
      createSession(store, { id: sessionId, address, now: now() });
      publishStats();
    });

    on(CLIENT_EVENT.GET_STATS, NoPayloadSchema, () => {
      hub.emitStats(sessionId, getStats(store));
    });

    socket.on('disconnect', (reason: string) => {
      const result = rooms.endSession(sessionId, TERMINATION_REASON.DISCONNECT);
      if (!result.removed) return;
      logger.info(
        {
          event: 'socket_disconnect_cleanup',
          sessionId,
          socketReason: reason,
          roomId: result.roomId,
          partnerId: result.partnerId,
        },
        'Session disconnected, cleaned up queue/room'
      );
      publishStats();
    });
  });
};
