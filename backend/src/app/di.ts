/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app (HTTP server, CLI and worker).
 * - Creates infra clients ONCE (db, redis, Spond API) and shares them safely.
 * - Keeps modules testable: tests pass in-memory infra through `overrides`.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. disable rate limits in test) belong HERE,
 *   not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';
import type { RecordStore } from '../shared/db/record-store';
import { KyselyRecordStore } from '../shared/db/kysely-record-store';

import { RedisCache } from '../shared/cache/redis-cache';
import { InMemCache } from '../shared/cache/inmem-cache';
import type { Cache } from '../shared/cache/cache';

import { RateLimiter } from '../shared/security/rate-limit';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { AuditRepo } from '../shared/audit/audit.repo';

import { InMemQueue } from '../shared/messaging/inmem-queue';
import type { Queue } from '../shared/messaging/queue';

import { createSeedingModule, type SeedingModule } from '../modules/seeding/seeding.module';
import { createMemberModule, type MemberModule } from '../modules/members/member.module';
import { createMembershipModule, type MembershipModule } from '../modules/memberships/membership.module';
import { createTaskModule, type TaskModule } from '../modules/tasks/task.module';
import { createSpondModule, type SpondModule } from '../modules/spond/spond.module';
import { createSpondClient } from '../modules/spond/client/http-spond-client';
import type { SpondApi } from '../modules/spond/client/spond-api';
import { createSchedulerModule, type SchedulerModule } from '../modules/scheduler/scheduler.module';
import type { Sleep } from '../modules/scheduler/flows/run-due-tasks-flow';

import { buildJobRegistry } from './jobs';

/** Infra a caller (tests, one-off scripts) may supply instead of the real clients. */
export type InfraOverrides = {
  store?: RecordStore;
  cache?: Cache;
  queue?: Queue;
  spondApi?: SpondApi | null;
  now?: () => Date;
  sleep?: Sleep;
};

export type AppDeps = {
  store: RecordStore;
  cache: Cache;
  logger: Logger;
  rateLimiter: RateLimiter;
  auditRepo: AuditRepo;

  // messaging
  queue: Queue;

  // modules
  seeding: SeedingModule;
  members: MemberModule;
  memberships: MembershipModule;
  tasks: TaskModule;
  spond: SpondModule;
  scheduler: SchedulerModule;

  // lifecycle
  close: () => Promise<void>;
};

export async function buildDeps(config: AppConfig, overrides: InfraOverrides = {}): Promise<AppDeps> {
  const db = overrides.store ? null : createDb(config.databaseUrl);
  const store: RecordStore = overrides.store ?? new KyselyRecordStore(db ?? createDb(config.databaseUrl));

  // Redis when configured; otherwise a per-process cache (fine for a single worker).
  const redis = !overrides.cache && config.redisUrl ? await RedisCache.connect(config.redisUrl) : null;
  const cache: Cache = overrides.cache ?? redis ?? new InMemCache();

  // Composition root decides when rate limiting is disabled.
  const rateLimiter = new RateLimiter(cache, {
    prefix: 'rl',
    disabled: config.nodeEnv === 'test',
  });

  const now = overrides.now;
  const auditRepo = new AuditRepo(store, now);

  // In-memory queue; swap for a mail transport adapter here.
  const queue: Queue = overrides.queue ?? new InMemQueue();

  const spondApi =
    overrides.spondApi !== undefined
      ? overrides.spondApi
      : createSpondClient({ apiBase: config.spond.apiBase, apiToken: config.spond.apiToken, logger });

  // modules (no HTTP / no business logic here)
  const seeding = createSeedingModule({ store, logger, auditRepo, now });
  const members = createMemberModule({ store, logger, now });
  const memberships = createMembershipModule({ store, logger, auditRepo });

  const tasks = createTaskModule({
    store,
    logger,
    queue,
    config: {
      enabled: config.tasks.digestEnabled,
      lookaheadDays: config.tasks.digestLookaheadDays,
      siteName: config.site.name,
      siteUrl: config.site.url,
    },
    now,
  });

  const spond = createSpondModule({
    store,
    logger,
    auditRepo,
    rateLimiter,
    spondApi,
    config: {
      eventsLookbackDays: config.spond.eventsLookbackDays,
      eventsLookaheadDays: config.spond.eventsLookaheadDays,
      searchRateLimitPerMinute: config.spond.searchRateLimitPerMinute,
    },
    now,
  });

  const scheduler = createSchedulerModule({
    store,
    logger,
    cache,
    auditRepo,
    registry: buildJobRegistry({ tasks, spond }),
    config: config.scheduler,
    now,
    sleep: overrides.sleep,
  });

  return {
    store,
    cache,
    logger,
    rateLimiter,
    auditRepo,
    queue,
    seeding,
    members,
    memberships,
    tasks,
    spond,
    scheduler,
    close: async () => {
      if (redis) await redis.close();
      if (db) await db.destroy();
    },
  };
}
