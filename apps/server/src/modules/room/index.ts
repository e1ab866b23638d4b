export { createRoomService, type RoomService } from './service';
export { createTranscriptCache, type TranscriptCache } from './transcripts';
