import path from 'node:path';
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv({
  path: path.resolve(process.cwd(), '.env'),
});

export const frameSources = ['ingest', 'synthetic', 'camera', 'screen'] as const;
export type FrameSourceKind = (typeof frameSources)[number];

const envSchema = z.object({
  PORT: z.coerce.number().int().nonnegative().default(8080),
  WS_HEARTBEAT_MS: z.coerce.number().int().positive().default(15_000),
  MAX_VIEWERS: z.coerce.number().int().positive().default(64),
  SESSION_QUEUE_CAPACITY: z.coerce.number().int().min(1).default(4),
  BROADCAST_POLL_MS: z.coerce.number().int().nonnegative().default(33),
  FRAME_SOURCE: z.enum(frameSources).default('ingest'),
  CAPTURE_DEVICE: z.string().optional(),
  CAPTURE_FPS: z.coerce.number().positive().max(120).default(30),
  CAPTURE_WIDTH: z.coerce.number().int().positive().default(640),
  CAPTURE_HEIGHT: z.coerce.number().int().positive().default(480),
  ENCODER_QUALITY: z.coerce.number().int().min(1).max(100).default(80),
  MAX_CONSECUTIVE_FAILURES: z.coerce.number().int().nonnegative().default(150),
  MAX_FRAME_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(8 * 1024 * 1024),
  CORS_ORIGINS: z
    .string()
    .default('http://localhost:5173,http://127.0.0.1:5173'),
  LOG_LEVEL: z.string().default('info'),
});

export type AppConfig = ReturnType<typeof parseConfig>;

export function parseConfig(env: NodeJS.ProcessEnv) {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    heartbeatMs: parsed.WS_HEARTBEAT_MS,
    maxViewers: parsed.MAX_VIEWERS,
    sessionQueueCapacity: parsed.SESSION_QUEUE_CAPACITY,
    broadcastPollMs: parsed.BROADCAST_POLL_MS,
    frameSource: parsed.FRAME_SOURCE,
    capture: {
      device: parsed.CAPTURE_DEVICE,
      fps: parsed.CAPTURE_FPS,
      width: parsed.CAPTURE_WIDTH,
      height: parsed.CAPTURE_HEIGHT,
    },
    encoderQuality: parsed.ENCODER_QUALITY,
    maxConsecutiveFailures: parsed.MAX_CONSECUTIVE_FAILURES,
    maxFrameBytes: parsed.MAX_FRAME_BYTES,
    corsOrigins: parsed.CORS_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter(Boolean),
    logLevel: parsed.LOG_LEVEL,
  };
}

export const config = parseConfig(process.env);
