/**
 * backend/src/modules/scheduler/scheduler.types.ts
 *
 * WHY:
 * - Shapes shared by the schedule sync, the tick and the job registry.
 */

import type { Row } from '../../shared/db/record-store';
import type { JsonObject } from '../../shared/db/schema';

export type PeriodicTask = Row<'periodic_tasks'>;

/** Schedule columns written by sync_schedule; run bookkeeping is left out. */
export type DesiredPeriodicTask = Pick<
  PeriodicTask,
  | 'name'
  | 'task'
  | 'schedule_type'
  | 'interval_every'
  | 'interval_period'
  | 'crontab'
  | 'clocked_at'
  | 'one_off'
  | 'kwargs'
  | 'enabled'
>;

export type JobDefinition = {
  /** Registry key stored in periodic_tasks.task. */
  name: string;
  /** Extra attempts after the first failure. */
  retries: number;
  retryDelayMs: number;
  run: (kwargs: JsonObject) => Promise<unknown>;
};

export type SyncScheduleResult = {
  created: number;
  updated: number;
  unchanged: number;
  deleted: number;
  lines: string[];
};

export type TickResult = {
  ran: string[];
  failed: string[];
  skipped: string[];
};
