import path from 'node:path';
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv({
  path: path.resolve(process.cwd(), '.env'),
});

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8888),
  WS_PATH: z.string().startsWith('/').default('/api/websocket'),
  WS_TOKEN: z.string().min(1).optional(),
  WS_HEARTBEAT_MS: z.coerce.number().int().positive().default(30_000),
  MAX_PAYLOAD_BYTES: z.coerce.number().int().positive().default(2048),
  WS_MAX_BUFFERED_BYTES: z.coerce.number().int().positive().default(1_048_576),
  CORS_ORIGINS: z
    .string()
    .default('http://localhost:3000,http://127.0.0.1:3000'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

const result = envSchema.safeParse(process.env);
if (!result.success) {
  const problems = result.error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join('; ');
  throw new Error(`Invalid configuration: ${problems}`);
}
const parsed = result.data;

export const config = {
  port: parsed.PORT,
  wsPath: parsed.WS_PATH,
  wsToken: parsed.WS_TOKEN,
  heartbeatMs: parsed.WS_HEARTBEAT_MS,
  maxPayloadBytes: parsed.MAX_PAYLOAD_BYTES,
  maxBufferedBytes: parsed.WS_MAX_BUFFERED_BYTES,
  corsOrigins: parsed.CORS_ORIGINS.split(',').map((origin) => origin.trim()),
  logLevel: parsed.LOG_LEVEL,
};

export type HubConfig = typeof config;
