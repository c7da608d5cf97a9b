/**
 * src/app/jobs.ts
 *
 * WHY:
 * - The scheduler's job registry, assembled where every module is in reach.
 *
 * RULES:
 * - Names here are the `task` values used in config/schedule.json.
 * - Retry budgets live here, next to the job they belong to.
 */

import { JobRegistry } from '../modules/scheduler/job-registry';
import type { SpondModule } from '../modules/spond/spond.module';
import type { TaskModule } from '../modules/tasks/task.module';

export const JOB_NAMES = {
  taskDigest: 'tasks.send_daily_task_digest',
  spondMembers: 'spond.sync_members',
  spondEvents: 'spond.sync_events',
  spondTransactions: 'spond.sync_transactions',
} as const;

export function buildJobRegistry(modules: { tasks: TaskModule; spond: SpondModule }): JobRegistry {
  const { taskService } = modules.tasks;
  const { spondService } = modules.spond;

  return new JobRegistry()
    .register({
      name: JOB_NAMES.taskDigest,
      retries: 3,
      retryDelayMs: 60_000,
      run: () => taskService.sendDigest({ dryRun: false }),
    })
    .register({ name: JOB_NAMES.spondMembers, retries: 0, retryDelayMs: 0, run: () => spondService.syncMembers() })
    .register({ name: JOB_NAMES.spondEvents, retries: 0, retryDelayMs: 0, run: () => spondService.syncEvents() })
    .register({
      name: JOB_NAMES.spondTransactions,
      retries: 0,
      retryDelayMs: 0,
      run: () => spondService.syncTransactions(),
    });
}
