/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for all environment variables,
 * validates them at startup, and exports a typed env object.
 */

import { z } from 'zod';

export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

/**
 * Complete environment variable schema with validation rules and defaults.
 */
export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT & SERVER
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  /** HTTP server port */
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),

  /** Server bind address */
  HOST: z.string().default('0.0.0.0'),

  /** Application version (injected by npm) */
  npm_package_version: z.string().optional(),

  /** Allowed CORS origin */
  CORS_ORIGIN: z.string().default('*'),

  // ===================================================================
  // TABLE
  // ===================================================================

  /** Time a seated player has to move before one is placed for them (milliseconds) */
  MOVE_TIMEOUT_MS: z.coerce.number().int().min(100).default(5000),

  /** Delay before a finished board is cleared and the next round seeded (milliseconds) */
  ROUND_ADVANCE_DELAY_MS: z.coerce.number().int().min(0).default(3000),

  /** Maximum snapshots held for a slow persistence sink before the oldest are dropped */
  STATE_NOTIFICATION_BUFFER: z.coerce.number().int().positive().default(100),

  // ===================================================================
  // PERSISTENCE (REDIS MIRROR)
  // ===================================================================

  /** Redis connection URL; when set the state mirror is attached at startup */
  REDIS_URL: z.string().optional(),

  /** Redis authentication password */
  REDIS_PASSWORD: z.string().optional(),

  /** Redis key holding the mirrored game state */
  STATE_KEY: z.string().min(1).default('tictactoe:game'),

  // ===================================================================
  // LOGGING
  // ===================================================================

  /** Application log level */
  LOG_LEVEL: LogLevelSchema.default('info'),

  /** Log output format */
  LOG_FORMAT: LogFormatSchema.default('json'),

  /** Log file path (optional) */
  LOG_FILE: z.string().optional(),
});

export type RawEnv = z.infer<typeof EnvSchema>;

export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables without exiting.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  };
}

/**
 * Under Jest the effective environment is always "test", even when a .env
 * file set NODE_ENV to something else.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  if (process.env.JEST_WORKER_ID !== undefined) {
    return 'test';
  }
  return rawEnv.NODE_ENV;
}

export function isProduction(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'production';
}

export function isDevelopment(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'development';
}

export function isTest(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'test';
}
