import { z } from 'zod';
import type { WindowBounds } from './application/event-schema.js';

/**
 * Environment configuration.
 *
 * A worker pool (`WORKERS > 1`) must share one ledger, so it is only
 * accepted together with the Redis backend.
 */
export const ConfigSchema = z
  .object({
    HOST: z.string().default('0.0.0.0'),
    PORT: z.coerce.number().int().min(1).max(65535).default(8080),
    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),

    LEDGER_BACKEND: z.enum(['memory', 'redis']).default('memory'),
    REDIS_URL: z.string().url().default('redis://localhost:6379'),
    LEDGER_KEY_PREFIX: z.string().min(1).default('ledger'),

    WORKERS: z.coerce.number().int().min(1).max(64).default(1),

    STATS_MIN_HOURS: z.coerce.number().positive().default(0.1),
    STATS_MAX_HOURS: z.coerce.number().positive().default(168),
    STATS_DEFAULT_HOURS: z.coerce.number().positive().default(1),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.WORKERS > 1 && cfg.LEDGER_BACKEND !== 'redis') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['WORKERS'],
        message: `WORKERS=${cfg.WORKERS} requires LEDGER_BACKEND=redis; in-memory ledgers are not shared between processes`,
      });
    }
    if (cfg.STATS_MIN_HOURS > cfg.STATS_MAX_HOURS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['STATS_MIN_HOURS'],
        message: 'STATS_MIN_HOURS must not exceed STATS_MAX_HOURS',
      });
    }
    if (cfg.STATS_DEFAULT_HOURS < cfg.STATS_MIN_HOURS || cfg.STATS_DEFAULT_HOURS > cfg.STATS_MAX_HOURS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['STATS_DEFAULT_HOURS'],
        message: 'STATS_DEFAULT_HOURS must lie between STATS_MIN_HOURS and STATS_MAX_HOURS',
      });
    }
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if a variable is malformed or the combination is invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

export function windowBounds(config: AppConfig): WindowBounds {
  return {
    minHours: config.STATS_MIN_HOURS,
    maxHours: config.STATS_MAX_HOURS,
    defaultHours: config.STATS_DEFAULT_HOURS,
  };
}
