import path from 'node:path';
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv({
  path: path.resolve(process.cwd(), '.env'),
});

const envSchema = z.object({
  TRACKER_HOST: z.string().min(1).default('localhost'),
  TRACKER_PORT: z.coerce.number().int().positive().max(65535).default(6555),
  TRACKER_READ_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  TRACKER_SHUTDOWN_CAP_MS: z.coerce.number().int().positive().default(10_000),
  DEMO_FRAME_COUNT: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.string().default('info'),
});

const parsed = envSchema.parse(process.env);

export const config = {
  host: parsed.TRACKER_HOST,
  port: parsed.TRACKER_PORT,
  readTimeoutMs: parsed.TRACKER_READ_TIMEOUT_MS,
  shutdownCapMs: parsed.TRACKER_SHUTDOWN_CAP_MS,
  demoFrameCount: parsed.DEMO_FRAME_COUNT,
  logLevel: parsed.LOG_LEVEL,
};
