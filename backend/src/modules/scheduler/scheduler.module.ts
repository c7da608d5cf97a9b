/**
 * backend/src/modules/scheduler/scheduler.module.ts
 *
 * WHY:
 * - Encapsulates Scheduler module wiring.
 * - The job registry is passed in: the composition root decides which jobs exist.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { Logger } from '../../shared/logger/logger';
import type { RecordStore } from '../../shared/db/record-store';
import type { Cache } from '../../shared/cache/cache';
import type { AuditRepo } from '../../shared/audit/audit.repo';

import { PeriodicTaskRepo } from './dal/periodic-task.repo';
import type { Sleep } from './flows/run-due-tasks-flow';
import type { JobRegistry } from './job-registry';
import { Scheduler } from './scheduler';
import { SchedulerService } from './scheduler.service';

export type SchedulerModule = ReturnType<typeof createSchedulerModule>;

export function createSchedulerModule(deps: {
  store: RecordStore;
  logger: Logger;
  cache: Cache;
  auditRepo: AuditRepo;
  registry: JobRegistry;
  config: { prefix: string; scheduleFile: string; tickSeconds: number };
  now?: () => Date;
  sleep?: Sleep;
}) {
  const periodicTaskRepo = new PeriodicTaskRepo(deps.store);

  const schedulerService = new SchedulerService({
    store: deps.store,
    logger: deps.logger,
    cache: deps.cache,
    auditRepo: deps.auditRepo,
    periodicTaskRepo,
    registry: deps.registry,
    prefix: deps.config.prefix,
    scheduleFile: deps.config.scheduleFile,
    now: deps.now,
    sleep: deps.sleep,
  });

  function createScheduler(): Scheduler {
    return new Scheduler({
      logger: deps.logger,
      tickSeconds: deps.config.tickSeconds,
      tick: () => schedulerService.runDueTasks(),
    });
  }

  return { schedulerService, periodicTaskRepo, registry: deps.registry, createScheduler };
}
