/**
 * backend/src/modules/scheduler/dal/periodic-task.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for periodic_tasks.
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - Supports withStore() for transaction binding.
 */

import type { RecordStore } from '../../../shared/db/record-store';
import type { DesiredPeriodicTask, PeriodicTask } from '../scheduler.types';

export class PeriodicTaskRepo {
  constructor(private readonly store: RecordStore) {}

  withStore(store: RecordStore): PeriodicTaskRepo {
    return new PeriodicTaskRepo(store);
  }

  async create(task: DesiredPeriodicTask, now: Date): Promise<PeriodicTask> {
    return this.store.insert('periodic_tasks', {
      ...task,
      last_run_at: null,
      total_run_count: 0,
      updated_at: now,
    });
  }

  async updateSchedule(id: string, task: DesiredPeriodicTask, now: Date): Promise<PeriodicTask> {
    return this.store.update('periodic_tasks', id, { ...task, updated_at: now });
  }

  async setEnabled(id: string, enabled: boolean, now: Date): Promise<PeriodicTask> {
    return this.store.update('periodic_tasks', id, { enabled, updated_at: now });
  }

  /** Run bookkeeping; one-off tasks switch themselves off. */
  async markRun(task: PeriodicTask, now: Date): Promise<PeriodicTask> {
    return this.store.update('periodic_tasks', task.id, {
      last_run_at: now,
      total_run_count: task.total_run_count + 1,
      enabled: task.one_off ? false : task.enabled,
      updated_at: now,
    });
  }

  async deleteById(id: string): Promise<void> {
    await this.store.delete('periodic_tasks', { id });
  }
}
