import type { ChatMode, StatsUpdateEvent } from '@strangerline/shared';

export type SessionRecord = {
  id: string;
  address: string;
  mode?: ChatMode;
  interests: string[];
  connectedAt: number;
  lastActiveAt: number;
  roomId?: string;
};

export type Room = {
  id: string;
  userIds: [string, string];
  initiatorId: string;
  mode: ChatMode;
  createdAt: number;
};

export type BanEntry = {
  banEnd: number;
  reason: string;
};

/**
 * Process-wide mutable state. Every transition that touches more than one of
 * these structures runs synchronously, so a single event-loop turn is the
 * critical section.
 */
export type Store = {
  sessions: Map<string, SessionRecord>;
  queue: string[];
  rooms: Map<string, Room>;
  // Bans known to this process, consulted synchronously at selection time.
  bans: Map<string, BanEntry>;
};

export const createStore = (): Store => ({
  sessions: new Map(),
  queue: [],
  rooms: new Map(),
  bans: new Map(),
});

export const createSession = (
  store: Store,
  params: { id: string; address: string; now: number }
): SessionRecord => {
  const session: SessionRecord = {
    id: params.id,
    address: params.address,
    interests: [],
    connectedAt: params.now,
    lastActiveAt: params.now,
  };
  store.sessions.set(session.id, session);
  return session;
};

export const isQueued = (store: Store, sessionId: string) => store.queue.includes(sessionId);

export const removeFromQueue = (store: Store, sessionId: string): boolean => {
  const index = store.queue.indexOf(sessionId);
  if (index < 0) return false;
  store.queue.splice(index, 1);
  return true;
};

export const partnerOf = (room: Room, sessionId: string): string => {
  const [first, second] = room.userIds;
  return first === sessionId ? second : first;
};

export const sessionsAt = (store: Store, address: string): SessionRecord[] =>
  [...store.sessions.values()].filter((session) => session.address === address);

export const getStats = (store: Store): StatsUpdateEvent => ({
  online: store.sessions.size,
  waiting: store.queue.length,
  active_chats: store.rooms.size,
});
