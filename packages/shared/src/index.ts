import { z } from 'zod';

export const CHAT_MODE = {
  TEXT: 'text',
  VIDEO: 'video',
} as const;
export const CHAT_MODES = [CHAT_MODE.TEXT, CHAT_MODE.VIDEO] as const;
export const ChatModeSchema = z.enum(CHAT_MODES);
export type ChatMode = z.infer<typeof ChatModeSchema>;

export const REPORT_REASON = {
  INAPPROPRIATE_LANGUAGE: 'inappropriate_language',
  SPAM: 'spam',
  OFFENSIVE_BEHAVIOR: 'offensive_behavior',
  THREATENING: 'threatening',
  INAPPROPRIATE_VIDEO: 'inappropriate_video',
  OTHER: 'other',
} as const;
export const REPORT_REASONS = [
  REPORT_REASON.INAPPROPRIATE_LANGUAGE,
  REPORT_REASON.SPAM,
  REPORT_REASON.OFFENSIVE_BEHAVIOR,
  REPORT_REASON.THREATENING,
  REPORT_REASON.INAPPROPRIATE_VIDEO,
  REPORT_REASON.OTHER,
] as const;
export const ReportReasonSchema = z.enum(REPORT_REASONS);
export type ReportReason = z.infer<typeof ReportReasonSchema>;

export const TERMINATION_REASON = {
  NEXT: 'next',
  DISCONNECT: 'disconnect',
  CHANGE_MODE: 'change_mode',
  REQUEUE: 'requeue',
  BANNED: 'banned',
  STALE: 'stale',
} as const;
export const TERMINATION_REASONS = [
  TERMINATION_REASON.NEXT,
  TERMINATION_REASON.DISCONNECT,
  TERMINATION_REASON.CHANGE_MODE,
  TERMINATION_REASON.REQUEUE,
  TERMINATION_REASON.BANNED,
  TERMINATION_REASON.STALE,
] as const;
export const TerminationReasonSchema = z.enum(TERMINATION_REASONS);
export type TerminationReason = z.infer<typeof TerminationReasonSchema>;

export const CLIENT_EVENT = {
  FIND_PARTNER: 'find_partner',
  STOP_SEARCHING: 'stop_searching',
  SEND_MESSAGE: 'send_message',
  TYPING: 'typing',
  STOP_TYPING: 'stop_typing',
  VIDEO_OFFER: 'video_offer',
  VIDEO_ANSWER: 'video_answer',
  ICE_CANDIDATE: 'ice_candidate',
  NEXT_PARTNER: 'next_partner',
  REPORT_USER: 'report_user',
  CHANGE_MODE: 'change_mode',
  GET_STATS: 'get_stats',
} as const;
export type ClientEvent = (typeof CLIENT_EVENT)[keyof typeof CLIENT_EVENT];

export const SERVER_EVENT = {
  WAITING: 'waiting',
  MATCHED: 'matched',
  MESSAGE: 'message',
  TYPING: 'typing',
  STOP_TYPING: 'stop_typing',
  VIDEO_OFFER: 'video_offer',
  VIDEO_ANSWER: 'video_answer',
  ICE_CANDIDATE: 'ice_candidate',
  PARTNER_DISCONNECTED: 'partner_disconnected',
  BANNED: 'banned',
  FORCE_DISCONNECT: 'force_disconnect',
  STATS_UPDATE: 'stats_update',
  ERROR: 'error',
} as const;
export type ServerEvent = (typeof SERVER_EVENT)[keyof typeof SERVER_EVENT];

export const ERROR_CODE = {
  INVALID_PAYLOAD: 'INVALID_PAYLOAD',
  NOT_IN_ROOM: 'NOT_IN_ROOM',
  ROOM_CLOSED: 'ROOM_CLOSED',
  PARTNER_UNAVAILABLE: 'PARTNER_UNAVAILABLE',
  CANNOT_REPORT_SELF: 'CANNOT_REPORT_SELF',
  USER_NOT_FOUND: 'USER_NOT_FOUND',
  INVALID_REASON: 'INVALID_REASON',
  REPORT_UNAVAILABLE: 'REPORT_UNAVAILABLE',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;
export const ERROR_CODES = [
  ERROR_CODE.INVALID_PAYLOAD,
  ERROR_CODE.NOT_IN_ROOM,
  ERROR_CODE.ROOM_CLOSED,
  ERROR_CODE.PARTNER_UNAVAILABLE,
  ERROR_CODE.CANNOT_REPORT_SELF,
  ERROR_CODE.USER_NOT_FOUND,
  ERROR_CODE.INVALID_REASON,
  ERROR_CODE.REPORT_UNAVAILABLE,
  ERROR_CODE.INTERNAL_ERROR,
] as const;
export const ErrorCodeSchema = z.enum(ERROR_CODES);
export type ErrorCode = z.infer<typeof ErrorCodeSchema>;

export const ANONYMOUS_SENDER = 'Stranger';

export const MAX_MESSAGE_LENGTH = 2000;
export const MAX_COMMENT_LENGTH = 500;
export const MAX_INTERESTS = 10;
export const MAX_INTEREST_LENGTH = 32;

export const SessionIdSchema = z.string().min(1);
export type SessionId = z.infer<typeof SessionIdSchema>;

export const RoomIdSchema = z.string().min(1);
export type RoomId = z.infer<typeof RoomIdSchema>;

// Opaque peer-negotiation data: required, never inspected.
const SignalingPayloadSchema = z
  .unknown()
  .refine((value) => value !== undefined && value !== null, {
    message: 'signaling payload is required',
  });

export const FindPartnerRequestSchema = z.object({
  interests: z.array(z.string()).default([]),
  chat_mode: ChatModeSchema.default(CHAT_MODE.TEXT),
});
export type FindPartnerRequest = z.infer<typeof FindPartnerRequestSchema>;

export const SendMessageRequestSchema = z.object({
  message: z
    .string()
    .max(MAX_MESSAGE_LENGTH)
    .refine((value) => value.trim().length > 0, { message: 'message must not be blank' }),
});
export type SendMessageRequest = z.infer<typeof SendMessageRequestSchema>;

export const VideoOfferSchema = z.object({
  offer: SignalingPayloadSchema,
});
export type VideoOffer = z.infer<typeof VideoOfferSchema>;

export const VideoAnswerSchema = z.object({
  answer: SignalingPayloadSchema,
});
export type VideoAnswer = z.infer<typeof VideoAnswerSchema>;

export const IceCandidateSchema = z.object({
  candidate: SignalingPayloadSchema,
});
export type IceCandidate = z.infer<typeof IceCandidateSchema>;

export const ReportUserRequestSchema = z.object({
  reported_id: SessionIdSchema,
  reason: z.string(),
  comment: z.string().default(''),
});
export type ReportUserRequest = z.infer<typeof ReportUserRequestSchema>;

export const MatchedEventSchema = z.object({
  room: RoomIdSchema,
  partner_id: SessionIdSchema,
  initiator: z.boolean(),
});
export type MatchedEvent = z.infer<typeof MatchedEventSchema>;

export const MessageEventSchema = z.object({
  message: z.string(),
  sender: z.literal(ANONYMOUS_SENDER),
});
export type MessageEvent = z.infer<typeof MessageEventSchema>;

export const BanNoticeSchema = z.object({
  ban_end: z.string().datetime(),
  reason: z.string(),
});
export type BanNotice = z.infer<typeof BanNoticeSchema>;

export const StatsUpdateEventSchema = z.object({
  online: z.number().int().nonnegative(),
  waiting: z.number().int().nonnegative(),
  active_chats: z.number().int().nonnegative(),
});
export type StatsUpdateEvent = z.infer<typeof StatsUpdateEventSchema>;

export const ErrorEventSchema = z.object({
  message: ErrorCodeSchema,
});
export type ErrorEvent = z.infer<typeof ErrorEventSchema>;

export const BanStatusResponseSchema = z
  .object({
    banned: z.boolean(),
    ban_end: z.string().datetime().optional(),
    reason: z.string().optional(),
  })
  .superRefine((value, ctx) => {
    if (value.banned && !value.ban_end) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'ban_end is required for an active ban',
      });
    }
  });
export type BanStatusResponse = z.infer<typeof BanStatusResponseSchema>;
