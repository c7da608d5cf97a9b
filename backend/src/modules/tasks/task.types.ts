/**
 * backend/src/modules/tasks/task.types.ts
 */

import type { Row } from '../../shared/db/record-store';

export type Task = Row<'tasks'>;
export type StaffUser = Row<'staff_users'>;

export type SendTaskDigestParams = {
  dryRun: boolean;
};

export type SendTaskDigestResult = {
  dryRun: boolean;
  sent: number;
  users: number;
  skipped?: 'disabled';
  lines: string[];
};
