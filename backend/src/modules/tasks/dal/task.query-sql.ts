/**
 * backend/src/modules/tasks/dal/task.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for tasks and staff users.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 */

import type { RecordStore } from '../../../shared/db/record-store';
import type { StaffUser, Task } from '../task.types';

export async function listOpenTasks(store: RecordStore): Promise<Task[]> {
  return store.list('tasks', { where: { status: 'open' } });
}

export async function getStaffUserById(store: RecordStore, id: string): Promise<StaffUser | null> {
  return store.findOne('staff_users', { id });
}
