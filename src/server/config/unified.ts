/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a frozen
 * config object that all server code should use.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { NodeEnvSchema, LogLevelSchema, LogFormatSchema, parseEnv, getEffectiveNodeEnv } from './env';

// Skip in test mode so a developer's .env cannot override test settings.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

const envResult = parseEnv(process.env);
if (!envResult.success || !envResult.data) {
  console.error('❌ Invalid environment configuration:');
  for (const error of envResult.errors ?? []) {
    console.error(`  - ${error.path || 'root'}: ${error.message}`);
  }
  process.exit(1);
}
const env = envResult.data;

const nodeEnv = getEffectiveNodeEnv(env);

const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isProduction: z.boolean(),
  isDevelopment: z.boolean(),
  isTest: z.boolean(),
  app: z.object({
    name: z.string().min(1),
    version: z.string().min(1),
  }),
  server: z.object({
    port: z.number().int().positive(),
    host: z.string().min(1),
    corsOrigin: z.string().min(1),
  }),
  table: z.object({
    moveTimeoutMs: z.number().int().positive(),
    roundAdvanceDelayMs: z.number().int().nonnegative(),
    notificationBufferSize: z.number().int().positive(),
  }),
  redis: z.object({
    url: z.string().optional(),
    password: z.string().optional(),
    stateKey: z.string().min(1),
  }),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

const preliminaryConfig = {
  nodeEnv,
  isProduction: nodeEnv === 'production',
  isDevelopment: nodeEnv === 'development',
  isTest: nodeEnv === 'test',
  app: {
    name: 'tictactoe-table',
    version: env.npm_package_version?.trim() || '1.0.0',
  },
  server: {
    port: env.PORT,
    host: env.HOST,
    corsOrigin: env.CORS_ORIGIN,
  },
  table: {
    moveTimeoutMs: env.MOVE_TIMEOUT_MS,
    roundAdvanceDelayMs: env.ROUND_ADVANCE_DELAY_MS,
    notificationBufferSize: env.STATE_NOTIFICATION_BUFFER,
  },
  redis: {
    url: env.REDIS_URL?.trim() || undefined,
    password: env.REDIS_PASSWORD || undefined,
    stateKey: env.STATE_KEY,
  },
  logging: {
    level: env.LOG_LEVEL,
    format: env.LOG_FORMAT,
    file: env.LOG_FILE?.trim() || undefined,
  },
};

export const config: AppConfig = Object.freeze(ConfigSchema.parse(preliminaryConfig));
