/**
 * backend/src/modules/tasks/task.service.ts
 *
 * WHY:
 * - Entry point for the task digest (scheduler job and CLI command).
 */

import type { Logger } from '../../shared/logger/logger';
import type { RecordStore } from '../../shared/db/record-store';
import type { Queue } from '../../shared/messaging/queue';

import { sendTaskDigestFlow, type TaskDigestConfig } from './flows/send-task-digest-flow';
import type { SendTaskDigestParams, SendTaskDigestResult } from './task.types';

export class TaskService {
  constructor(
    private readonly deps: {
      store: RecordStore;
      logger: Logger;
      queue: Queue;
      config: TaskDigestConfig;
      now?: () => Date;
    },
  ) {}

  async sendDigest(params: SendTaskDigestParams): Promise<SendTaskDigestResult> {
    return sendTaskDigestFlow(this.deps, { ...params, now: this.deps.now?.() ?? new Date() });
  }
}
