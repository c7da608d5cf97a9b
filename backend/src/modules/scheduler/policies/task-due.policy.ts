/**
 * backend/src/modules/scheduler/policies/task-due.policy.ts
 *
 * WHY:
 * - Decides, for one tick, whether a periodic task should run.
 *
 * RULES:
 * - Pure functions: no store, no cache, no logging.
 * - Disabled tasks never run.
 * - interval: never run, or last run at least one interval ago.
 * - crontab: the tick's minute matches and the task has not run in that minute.
 * - clocked: the clock time has passed and the task has never run.
 */

import type { IntervalPeriod } from '../../../shared/db/schema';
import { matchesCrontab, parseCrontab } from '../helpers/crontab';
import type { PeriodicTask } from '../scheduler.types';

const PERIOD_MS: Record<IntervalPeriod, number> = {
  seconds: 1_000,
  minutes: 60_000,
  hours: 3_600_000,
  days: 86_400_000,
};

const MINUTE_MS = 60_000;

export function intervalMs(task: Pick<PeriodicTask, 'interval_every' | 'interval_period'>): number | null {
  if (task.interval_every === null || task.interval_period === null) return null;
  return task.interval_every * PERIOD_MS[task.interval_period];
}

function minuteOf(date: Date): number {
  return Math.floor(date.getTime() / MINUTE_MS);
}

export function isTaskDue(task: PeriodicTask, now: Date): boolean {
  if (!task.enabled) return false;

  switch (task.schedule_type) {
    case 'interval': {
      const every = intervalMs(task);
      if (every === null) return false;
      return task.last_run_at === null || now.getTime() - task.last_run_at.getTime() >= every;
    }
    case 'crontab': {
      if (task.crontab === null) return false;
      if (!matchesCrontab(parseCrontab(task.crontab), now)) return false;
      return task.last_run_at === null || minuteOf(task.last_run_at) !== minuteOf(now);
    }
    case 'clocked':
      return task.clocked_at !== null && task.clocked_at.getTime() <= now.getTime() && task.last_run_at === null;
  }
}

/**
 * Cache key for the run slot a tick at `now` belongs to. Two workers ticking in
 * the same slot compute the same key, so only one of them wins the lock.
 */
export function runSlotKey(task: PeriodicTask, now: Date): string {
  if (task.schedule_type === 'clocked' && task.clocked_at) {
    return `scheduler:slot:${task.name}:clocked:${task.clocked_at.getTime()}`;
  }
  const every = task.schedule_type === 'interval' ? intervalMs(task) : null;
  const slot = every ? Math.floor(now.getTime() / every) : minuteOf(now);
  return `scheduler:slot:${task.name}:${slot}`;
}
