/**
 * backend/src/modules/scheduler/dal/periodic-task.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for periodic_tasks.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 */

import type { RecordStore } from '../../../shared/db/record-store';
import type { PeriodicTask } from '../scheduler.types';

export async function listPeriodicTasks(store: RecordStore): Promise<PeriodicTask[]> {
  return store.list('periodic_tasks', { orderBy: [{ column: 'name' }] });
}

export async function listEnabledPeriodicTasks(store: RecordStore): Promise<PeriodicTask[]> {
  return store.list('periodic_tasks', { where: { enabled: true }, orderBy: [{ column: 'name' }] });
}

export async function getPeriodicTaskByName(store: RecordStore, name: string): Promise<PeriodicTask | null> {
  return store.findOne('periodic_tasks', { name });
}
