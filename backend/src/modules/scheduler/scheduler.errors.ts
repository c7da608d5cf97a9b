/**
 * backend/src/modules/scheduler/scheduler.errors.ts
 *
 * WHY:
 * - Scheduler module owns its domain semantics.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 */

import { AppError } from '../../shared/http/errors';

export const SchedulerErrors = {
  invalidCrontab(expression: string, reason: string) {
    return AppError.validationError(`Invalid crontab '${expression}': ${reason}`, { expression });
  },

  scheduleFileNotFound(path: string) {
    return AppError.notFound(`Schedule file not found: ${path}`, { path });
  },

  invalidScheduleFile(path: string, reason: string) {
    return AppError.validationError(`Invalid schedule file ${path}: ${reason}`, { path });
  },

  taskNotFound(name: string) {
    return AppError.notFound(`Periodic task '${name}' not found.`, { name });
  },
} as const;
