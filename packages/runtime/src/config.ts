// Configuration from environment variables
//
// FLATLOG_ARRAY_SLOT_LIMIT      sequences longer than this become one json_text cell (default 5)
// FLATLOG_INLINE_BYTES_LIMIT    byte fields up to this length stay inline (default 0)
// FLATLOG_MAX_ROWS_PER_CHANNEL  rows buffered per channel before it fails (default 1000000)
// FLATLOG_LOG_LEVEL             debug | info | warn | error | silent (default info)
// FLATLOG_CATALOG               default catalog root for catalog commands

import { z } from 'zod';
import { ConfigError } from '@flatlog/protocol';
import { LOG_LEVELS, type LogLevel } from './logging.js';

export const DEFAULT_ARRAY_SLOT_LIMIT = 5;
export const DEFAULT_INLINE_BYTES_LIMIT = 0;
export const DEFAULT_MAX_ROWS_PER_CHANNEL = 1_000_000;

export type FlatlogConfig = {
  arraySlotLimit: number;
  inlineBytesLimit: number;
  maxRowsPerChannel: number;
  logLevel: LogLevel;
  catalogRoot?: string;
};

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']) satisfies z.ZodType<LogLevel>;

const envSchema = z.object({
  FLATLOG_ARRAY_SLOT_LIMIT: z.coerce.number().int().nonnegative().default(DEFAULT_ARRAY_SLOT_LIMIT),
  FLATLOG_INLINE_BYTES_LIMIT: z.coerce.number().int().nonnegative().default(DEFAULT_INLINE_BYTES_LIMIT),
  FLATLOG_MAX_ROWS_PER_CHANNEL: z.coerce.number().int().positive().default(DEFAULT_MAX_ROWS_PER_CHANNEL),
  FLATLOG_LOG_LEVEL: logLevelSchema.default('info'),
  FLATLOG_CATALOG: z.string().min(1).optional(),
});

/**
 * Read configuration from the environment.
 * Empty variables count as unset.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): FlatlogConfig {
  const present = Object.fromEntries(
    Object.keys(envSchema.shape).flatMap((key): [string, string][] => {
      const value = env[key]?.trim();
      return value ? [[key, value]] : [];
    })
  );

  const result = envSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return {
    arraySlotLimit: result.data.FLATLOG_ARRAY_SLOT_LIMIT,
    inlineBytesLimit: result.data.FLATLOG_INLINE_BYTES_LIMIT,
    maxRowsPerChannel: result.data.FLATLOG_MAX_ROWS_PER_CHANNEL,
    logLevel: result.data.FLATLOG_LOG_LEVEL,
    catalogRoot: result.data.FLATLOG_CATALOG,
  };
}

/**
 * Check whether a string names a log level
 */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
