import { z } from 'zod';
import { loadEnv } from './load_env';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  HOST: z.string().default('0.0.0.0'),
  CORS_ORIGIN: z.string().default('*'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  TRUST_PROXY: booleanFlag,
  MONGO_URI: z.string().default(''),
  TRANSCRIPT_DIR: z.string().default('logs_report'),
  REPORT_THRESHOLD: z.coerce.number().int().positive().default(10),
  BAN_DURATION_SECONDS: z.coerce.number().int().positive().default(1800),
  BAN_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  STALE_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  STALE_SESSION_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
  TRANSCRIPT_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(3_600_000),
  TRANSCRIPT_RETENTION_MS: z.coerce.number().int().positive().default(3_600_000),
  TRANSCRIPT_MAX_ROOMS: z.coerce.number().int().positive().default(1000),
});

export type AppConfig = {
  port: number;
  host: string;
  corsOrigin: string;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  trustProxy: boolean;
  mongoUri: string;
  transcriptDir: string;
  reportThreshold: number;
  banDurationSeconds: number;
  banSweepIntervalMs: number;
  staleSweepIntervalMs: number;
  staleSessionTimeoutMs: number;
  transcriptSweepIntervalMs: number;
  transcriptRetentionMs: number;
  transcriptMaxRooms: number;
};

export const parseConfig = (source: NodeJS.ProcessEnv): AppConfig => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    console.error('Invalid environment variables', parsed.error.format());
    throw new Error('INVALID_ENVIRONMENT');
  }

  const env = parsed.data;
  return {
    port: env.PORT,
    host: env.HOST,
    corsOrigin: env.CORS_ORIGIN,
    logLevel: env.LOG_LEVEL,
    trustProxy: env.TRUST_PROXY,
    mongoUri: env.MONGO_URI,
    transcriptDir: env.TRANSCRIPT_DIR,
    reportThreshold: env.REPORT_THRESHOLD,
    banDurationSeconds: env.BAN_DURATION_SECONDS,
    banSweepIntervalMs: env.BAN_SWEEP_INTERVAL_MS,
    staleSweepIntervalMs: env.STALE_SWEEP_INTERVAL_MS,
    staleSessionTimeoutMs: env.STALE_SESSION_TIMEOUT_MS,
    transcriptSweepIntervalMs: env.TRANSCRIPT_SWEEP_INTERVAL_MS,
    transcriptRetentionMs: env.TRANSCRIPT_RETENTION_MS,
    transcriptMaxRooms: env.TRANSCRIPT_MAX_ROOMS,
  };
};

export const loadConfig = (): AppConfig => {
  loadEnv();
  return parseConfig(process.env);
};
