/**
 * backend/src/modules/scheduler/scheduler.service.ts
 *
 * WHY:
 * - Entry point for schedule sync, admin toggles and the tick.
 * - Only place in this module allowed to start transactions.
 *
 * RULES:
 * - The tick runs outside a transaction: each job owns its own writes.
 * - Toggles are audited.
 */

import { setTimeout as delay } from 'node:timers/promises';

import type { Logger } from '../../shared/logger/logger';
import type { RecordStore } from '../../shared/db/record-store';
import type { Cache } from '../../shared/cache/cache';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import { AuditWriter } from '../../shared/audit/audit.writer';

import { getPeriodicTaskByName, listPeriodicTasks } from './dal/periodic-task.query-sql';
import type { PeriodicTaskRepo } from './dal/periodic-task.repo';
import { runDueTasksFlow, type Sleep } from './flows/run-due-tasks-flow';
import { syncScheduleFlow } from './flows/sync-schedule-flow';
import { readScheduleFile } from './helpers/schedule-file';
import type { JobRegistry } from './job-registry';
import { SchedulerErrors } from './scheduler.errors';
import type { PeriodicTask, SyncScheduleResult, TickResult } from './scheduler.types';

export class SchedulerService {
  constructor(
    private readonly deps: {
      store: RecordStore;
      logger: Logger;
      cache: Cache;
      auditRepo: AuditRepo;
      periodicTaskRepo: PeriodicTaskRepo;
      registry: JobRegistry;
      prefix: string;
      scheduleFile: string;
      now?: () => Date;
      sleep?: Sleep;
    },
  ) {}

  private now(): Date {
    return this.deps.now?.() ?? new Date();
  }

  async syncSchedule(opts: { file?: string } = {}): Promise<SyncScheduleResult> {
    const source = opts.file ?? this.deps.scheduleFile;
    const schedule = await readScheduleFile(source);
    const now = this.now();

    return this.deps.store.transaction((tx) =>
      syncScheduleFlow(
        { store: tx, logger: this.deps.logger, periodicTaskRepo: this.deps.periodicTaskRepo },
        { schedule, source, prefix: this.deps.prefix, now },
      ),
    );
  }

  async listTasks(): Promise<PeriodicTask[]> {
    return listPeriodicTasks(this.deps.store);
  }

  /** Accepts the stored name or the schedule-file name without the prefix. */
  async setEnabled(name: string, enabled: boolean): Promise<PeriodicTask> {
    const now = this.now();

    return this.deps.store.transaction(async (tx) => {
      const task =
        (await getPeriodicTaskByName(tx, name)) ?? (await getPeriodicTaskByName(tx, `${this.deps.prefix}${name}`));
      if (!task) throw SchedulerErrors.taskNotFound(name);

      const updated = await this.deps.periodicTaskRepo.withStore(tx).setEnabled(task.id, enabled, now);

      const audit = new AuditWriter(this.deps.auditRepo.withStore(tx));
      await audit.append('scheduler.task.toggled', { name: task.name, enabled });

      this.deps.logger.info({ msg: 'scheduler.task.toggled', flow: 'scheduler.toggle', name: task.name, enabled });
      return updated;
    });
  }

  async runDueTasks(now: Date = this.now()): Promise<TickResult> {
    return runDueTasksFlow(
      {
        store: this.deps.store,
        logger: this.deps.logger,
        cache: this.deps.cache,
        periodicTaskRepo: this.deps.periodicTaskRepo,
        registry: this.deps.registry,
        sleep: this.deps.sleep ?? ((ms) => delay(ms)),
      },
      { now },
    );
  }
}
