/**
 * backend/src/modules/tasks/task.module.ts
 *
 * WHY:
 * - Encapsulates Tasks module wiring (digest only; no HTTP routes).
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { Logger } from '../../shared/logger/logger';
import type { RecordStore } from '../../shared/db/record-store';
import type { Queue } from '../../shared/messaging/queue';

import type { TaskDigestConfig } from './flows/send-task-digest-flow';
import { TaskService } from './task.service';

export type TaskModule = ReturnType<typeof createTaskModule>;

export function createTaskModule(deps: {
  store: RecordStore;
  logger: Logger;
  queue: Queue;
  config: TaskDigestConfig;
  now?: () => Date;
}) {
  const taskService = new TaskService(deps);

  return { taskService };
}
