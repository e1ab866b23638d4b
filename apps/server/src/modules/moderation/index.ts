export { registerModerationRoutes } from './routes';
export { createModerationService, type ModerationService } from './service';
export { createBanService, banDurationSeconds, type BanService } from './bans';
export { createMemoryModerationStore, type ModerationStore } from './store';
export { MongoModerationStore } from './mongo';
export { createFileTranscriptSink, type TranscriptSink } from './sink';
