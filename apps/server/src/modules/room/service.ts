import { randomBytes } from 'crypto';
import {
  ANONYMOUS_SENDER,
  ERROR_CODE,
  type ChatMode,
  type TerminationReason,
} from '@strangerline/shared';
import {
  partnerOf,
  removeFromQueue,
  type Room,
  type SessionRecord,
  type Store,
} from '../../core/store';
import type { Logger } from '../../core/logger';
import type { SignalKind, SocketHub } from '../../core/socket';
import type { BanService } from '../moderation/bans';
import type { TranscriptCache } from './transcripts';

export type LeaveResult =
  | { status: 'NOOP' }
  | { status: 'LEFT'; roomId: string; partnerId: string };

export type EndSessionResult = {
  removed: boolean;
  wasQueued: boolean;
  roomId?: string;
  partnerId?: string;
};

export type RoomService = {
  createRoom: (requesterId: string, partnerId: string, mode: ChatMode) => Room;
  relayMessage: (sessionId: string, text: string) => void;
  relayTypingSignal: (sessionId: string, isTyping: boolean) => boolean;
  relaySignalingPayload: (sessionId: string, kind: SignalKind, payload: unknown) => boolean;
  leaveRoom: (sessionId: string, reason: TerminationReason) => LeaveResult;
  endSession: (sessionId: string, reason: TerminationReason) => EndSessionResult;
};

type RoomServiceOptions = {
  store: Store;
  hub: SocketHub;
  bans: BanService;
  transcripts: TranscriptCache;
  logger: Logger;
  now?: () => number;
};

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

export const escapeHtml = (value: string): string =>
  value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);

export const createRoomId = (): string => randomBytes(8).toString('hex');

type Membership = {
  session: SessionRecord;
  room: Room;
  partnerId: string;
};

export const createRoomService = (options: RoomServiceOptions): RoomService => {
  const { store, hub, bans, transcripts, logger } = options;
  const now = options.now ?? Date.now;

  const findMembership = (sessionId: string): Membership | null => {
    const session = store.sessions.get(sessionId);
    if (!session?.roomId) return null;
    const room = store.rooms.get(session.roomId);
    if (!room || !room.userIds.includes(sessionId)) return null;
    return { session, room, partnerId: partnerOf(room, sessionId) };
  };

  const leaveRoom = (sessionId: string, reason: TerminationReason): LeaveResult => {
    const session = store.sessions.get(sessionId);
    const roomId = session?.roomId;
    if (!session || !roomId) return { status: 'NOOP' };

    session.roomId = undefined;
    const room = store.rooms.get(roomId);
    if (!room) return { status: 'NOOP' };

    store.rooms.delete(room.id);
    const partnerId = partnerOf(room, sessionId);
    const partner = store.sessions.get(partnerId);
    if (partner?.roomId === room.id) {
      partner.roomId = undefined;
    }
    transcripts.close(room.id);
    hub.emitPartnerDisconnected(partnerId);

    logger.info(
      { event: 'room_closed', roomId: room.id, sessionId, partnerId, reason },
      'Room closed'
    );
    return { status: 'LEFT', roomId: room.id, partnerId };
  };

  return {
    createRoom: (requesterId, partnerId, mode) => {
      const room: Room = {
        id: createRoomId(),
        userIds: [requesterId, partnerId],
        initiatorId: requesterId,
        mode,
        createdAt: now(),
      };
      store.rooms.set(room.id, room);
      for (const memberId of room.userIds) {
        const member = store.sessions.get(memberId);
        if (member) member.roomId = room.id;
      }
      transcripts.open(room.id);

      logger.info(
        { event: 'room_created', roomId: room.id, requesterId, partnerId, mode },
        'Room created'
      );
      return room;
    },
    relayMessage: (sessionId, text) => {
      const session = store.sessions.get(sessionId);
      if (!session?.roomId) {
        throw new Error(ERROR_CODE.NOT_IN_ROOM);
      }
      const membership = findMembership(sessionId);
      if (!membership) {
        throw new Error(ERROR_CODE.ROOM_CLOSED);
      }

      const { room, partnerId } = membership;
      const partner = store.sessions.get(partnerId);
      if (!partner || bans.isBlocked(partner.address).banned) {
        throw new Error(ERROR_CODE.PARTNER_UNAVAILABLE);
      }

      const message = escapeHtml(text);
      hub.emitMessage(partnerId, { message, sender: ANONYMOUS_SENDER });
      transcripts.append(room.id, {
        sender: room.initiatorId === sessionId ? 'initiator' : 'responder',
        message,
        timestamp: new Date(now()).toISOString(),
      });
    },
    relayTypingSignal: (sessionId, isTyping) => {
      const membership = findMembership(sessionId);
      if (!membership) return false;
      return hub.emitTyping(membership.partnerId, isTyping);
    },
    relaySignalingPayload: (sessionId, kind, payload) => {
      const membership = findMembership(sessionId);
      if (!membership) return false;
      return hub.emitSignal(membership.partnerId, kind, payload);
    },
    leaveRoom,
    endSession: (sessionId, reason) => {
      const wasQueued = removeFromQueue(store, sessionId);
      const left = leaveRoom(sessionId, reason);
      const removed = store.sessions.delete(sessionId);

      if (removed) {
        logger.info({ event: 'session_ended', sessionId, reason }, 'Session ended');
      }
      return left.status === 'LEFT'
        ? { removed, wasQueued, roomId: left.roomId, partnerId: left.partnerId }
        : { removed, wasQueued };
    },
  };
};
