/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string.
 *   Invalid values ('prod', 'staging') are caught at startup by Zod.
 * - Booleans go through envBoolean: z.coerce.boolean() turns the string "false" into true.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const LogLevelSchema = z
  .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
  .default('info');

function envBoolean(defaultValue: boolean) {
  return z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .default(defaultValue ? 'true' : 'false')
    .transform((v) => v === 'true' || v === '1' || v === 'yes');
}

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : null));

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().default(3000),

  DATABASE_URL: z.string().min(1),
  REDIS_URL: optionalString,

  // Logging / service identity
  LOG_LEVEL: LogLevelSchema,
  SERVICE_NAME: z.string().default('clubhouse-backend'),

  // Used in outgoing e-mails
  SITE_NAME: z.string().default('Club Members'),
  SITE_URL: z.string().default(''),

  // Spond
  SPOND_API_BASE: z.string().url().default('https://api.spond.com/v1'),
  SPOND_API_TOKEN: optionalString,
  SPOND_EVENTS_LOOKBACK_DAYS: z.coerce.number().int().min(0).max(365).default(7),
  SPOND_EVENTS_LOOKAHEAD_DAYS: z.coerce.number().int().min(1).max(365).default(60),
  SPOND_SEARCH_RATE_LIMIT: z.coerce.number().int().min(1).default(60),

  // Task digest
  TASKS_DIGEST_ENABLED: envBoolean(true),
  TASKS_DIGEST_LOOKAHEAD_DAYS: z.coerce.number().int().min(0).max(90).default(7),

  // Scheduler
  SCHEDULER_TICK_SECONDS: z.coerce.number().int().min(5).max(60).default(30),
  SCHEDULER_FILE: z.string().default('config/schedule.json'),
  SCHEDULER_PREFIX: z.string().min(1).default('settings:'),

  // DEV seed bootstrap (idempotent)
  SEED_ON_START: envBoolean(false),
  SEED_MEMBERSHIPS_PATH: z.string().default('seed_memberships.json'),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;
  redisUrl: string | null;

  logLevel: LogLevel;
  serviceName: string;

  site: {
    name: string;
    url: string;
  };

  spond: {
    apiBase: string;
    apiToken: string | null;
    eventsLookbackDays: number;
    eventsLookaheadDays: number;
    searchRateLimitPerMinute: number;
  };

  tasks: {
    digestEnabled: boolean;
    digestLookaheadDays: number;
  };

  scheduler: {
    tickSeconds: number;
    scheduleFile: string;
    prefix: string;
  };

  seed: {
    enabled: boolean;
    membershipsPath: string;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    site: {
      name: parsed.SITE_NAME,
      url: parsed.SITE_URL,
    },

    spond: {
      apiBase: parsed.SPOND_API_BASE,
      apiToken: parsed.SPOND_API_TOKEN,
      eventsLookbackDays: parsed.SPOND_EVENTS_LOOKBACK_DAYS,
      eventsLookaheadDays: parsed.SPOND_EVENTS_LOOKAHEAD_DAYS,
      searchRateLimitPerMinute: parsed.SPOND_SEARCH_RATE_LIMIT,
    },

    tasks: {
      digestEnabled: parsed.TASKS_DIGEST_ENABLED,
      digestLookaheadDays: parsed.TASKS_DIGEST_LOOKAHEAD_DAYS,
    },

    scheduler: {
      tickSeconds: parsed.SCHEDULER_TICK_SECONDS,
      scheduleFile: parsed.SCHEDULER_FILE,
      prefix: parsed.SCHEDULER_PREFIX,
    },

    seed: {
      enabled: parsed.SEED_ON_START,
      membershipsPath: parsed.SEED_MEMBERSHIPS_PATH,
    },
  };
}
