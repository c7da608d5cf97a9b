/**
 * backend/src/modules/tasks/policies/digest-buckets.policy.ts
 *
 * WHY:
 * - Decides which open tasks go into each assignee's digest, and in what order.
 *
 * RULES:
 * - Pure function: no store, no clock (now is passed in).
 * - Only open tasks with an assignee.
 * - Order per assignee: overdue (oldest due first), due within the lookahead
 *   (soonest first), then tasks without a due date (newest first).
 * - Tasks due after the lookahead window are left out.
 * - Assignees appear in the order their first task is placed.
 */

import type { Task } from '../task.types';

const DAY_MS = 86_400_000;

function byDueAt(a: Task, b: Task): number {
  return (a.due_at?.getTime() ?? 0) - (b.due_at?.getTime() ?? 0);
}

export function bucketDigestTasks(
  tasks: readonly Task[],
  opts: { now: Date; lookaheadDays: number },
): Map<string, Task[]> {
  const now = opts.now.getTime();
  const soon = now + opts.lookaheadDays * DAY_MS;

  const open = tasks.filter((t) => t.status === 'open' && t.assigned_to_id !== null);

  const overdue = open.filter((t) => t.due_at !== null && t.due_at.getTime() < now).sort(byDueAt);
  const dueSoon = open
    .filter((t) => t.due_at !== null && t.due_at.getTime() >= now && t.due_at.getTime() <= soon)
    .sort(byDueAt);
  const noDue = open
    .filter((t) => t.due_at === null)
    .sort((a, b) => b.created_at.getTime() - a.created_at.getTime());

  const byUser = new Map<string, Task[]>();
  for (const task of [...overdue, ...dueSoon, ...noDue]) {
    if (task.assigned_to_id === null) continue;
    const list = byUser.get(task.assigned_to_id) ?? [];
    list.push(task);
    byUser.set(task.assigned_to_id, list);
  }
  return byUser;
}
