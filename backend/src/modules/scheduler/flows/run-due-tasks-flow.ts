/**
 * backend/src/modules/scheduler/flows/run-due-tasks-flow.ts
 *
 * WHY:
 * - One scheduler tick: find the enabled tasks that are due, claim each run slot,
 *   record the run and execute the registered job.
 *
 * RULES:
 * - The slot is claimed in the cache before anything is written, so two workers
 *   never run the same slot.
 * - The run is recorded before the job starts: a crashing job does not make the
 *   next tick run it again in the same slot.
 * - A failing job (after its retries) is logged and never stops the tick.
 * - Unknown task names and invalid schedules are logged and skipped.
 */

import type { Logger } from '../../../shared/logger/logger';
import type { RecordStore } from '../../../shared/db/record-store';
import type { Cache } from '../../../shared/cache/cache';

import { listEnabledPeriodicTasks } from '../dal/periodic-task.query-sql';
import type { PeriodicTaskRepo } from '../dal/periodic-task.repo';
import type { JobRegistry } from '../job-registry';
import { isTaskDue, runSlotKey } from '../policies/task-due.policy';
import type { JobDefinition, PeriodicTask, TickResult } from '../scheduler.types';

const SLOT_LOCK_TTL_SECONDS = 60 * 60;

export type Sleep = (ms: number) => Promise<void>;

export type RunDueTasksDeps = {
  store: RecordStore;
  logger: Logger;
  cache: Cache;
  periodicTaskRepo: PeriodicTaskRepo;
  registry: JobRegistry;
  sleep: Sleep;
};

async function runWithRetries(deps: RunDueTasksDeps, job: JobDefinition, task: PeriodicTask): Promise<unknown> {
  let attempt = 0;
  for (;;) {
    try {
      return await job.run(task.kwargs);
    } catch (err) {
      if (attempt >= job.retries) throw err;
      attempt += 1;
      deps.logger.warn({
        msg: 'scheduler.job.retry',
        flow: 'scheduler.tick',
        task: task.name,
        job: job.name,
        attempt,
        err,
      });
      await deps.sleep(job.retryDelayMs);
    }
  }
}

function checkDue(deps: RunDueTasksDeps, task: PeriodicTask, now: Date): boolean | 'invalid' {
  try {
    return isTaskDue(task, now);
  } catch (err) {
    deps.logger.error({ msg: 'scheduler.tick.invalid_schedule', flow: 'scheduler.tick', task: task.name, err });
    return 'invalid';
  }
}

export async function runDueTasksFlow(deps: RunDueTasksDeps, params: { now: Date }): Promise<TickResult> {
  const flow = 'scheduler.tick';
  const result: TickResult = { ran: [], failed: [], skipped: [] };
  const repo = deps.periodicTaskRepo.withStore(deps.store);

  for (const task of await listEnabledPeriodicTasks(deps.store)) {
    const due = checkDue(deps, task, params.now);
    if (due === 'invalid') {
      result.skipped.push(task.name);
      continue;
    }
    if (!due) continue;

    const job = deps.registry.get(task.task);
    if (!job) {
      deps.logger.warn({ msg: 'scheduler.tick.unknown_task', flow, task: task.name, job: task.task });
      result.skipped.push(task.name);
      continue;
    }

    const claimed = await deps.cache.claim(runSlotKey(task, params.now), { ttlSeconds: SLOT_LOCK_TTL_SECONDS });
    if (!claimed) {
      deps.logger.info({ msg: 'scheduler.tick.slot_taken', flow, task: task.name });
      result.skipped.push(task.name);
      continue;
    }

    await repo.markRun(task, params.now);
    deps.logger.info({ msg: 'scheduler.job.start', flow, task: task.name, job: job.name });

    try {
      const output = await runWithRetries(deps, job, task);
      deps.logger.info({ msg: 'scheduler.job.success', flow, task: task.name, job: job.name, output });
      result.ran.push(task.name);
    } catch (err) {
      deps.logger.error({ msg: 'scheduler.job.failed', flow, task: task.name, job: job.name, err });
      result.failed.push(task.name);
    }
  }

  return result;
}
