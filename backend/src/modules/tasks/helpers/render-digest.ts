/**
 * backend/src/modules/tasks/helpers/render-digest.ts
 *
 * Plain-text digest e-mail. Subject and link format are part of what staff
 * filter on in their mail clients; keep them stable.
 */

import type { StaffUser, Task } from '../task.types';

export function digestListUrl(siteUrl: string): string {
  return `${siteUrl.replace(/\/+$/, '')}/tasks/mine/`;
}

export function digestSubject(siteName: string, taskCount: number): string {
  return `[${siteName}] You have ${taskCount} open task(s)`;
}

export function displayName(user: StaffUser): string {
  return user.full_name.trim() || user.email;
}

function formatDue(due: Date): string {
  return `${due.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

function taskLine(task: Task, now: Date): string {
  if (!task.due_at) return `- ${task.title}`;
  const overdue = task.due_at.getTime() < now.getTime() ? '[OVERDUE] ' : '';
  return `- ${overdue}${task.title} (due ${formatDue(task.due_at)})`;
}

export function renderDigestText(params: {
  user: StaffUser;
  tasks: readonly Task[];
  siteName: string;
  listUrl: string;
  now: Date;
}): string {
  return [
    `Hi ${displayName(params.user)},`,
    '',
    `You have ${params.tasks.length} open task(s) on ${params.siteName}:`,
    '',
    ...params.tasks.map((task) => taskLine(task, params.now)),
    '',
    `View your tasks: ${params.listUrl}`,
    '',
  ].join('\n');
}
