/**
 * backend/src/shared/messaging/inmem-queue.ts
 *
 * WHY:
 * - Tests need to inspect what messages a job enqueued without running
 *   real email infrastructure.
 * - drain() is the test contract: run the job, then drain and assert.
 *
 * RULES:
 * - Implements Queue only; drain() and size are for tests.
 */

import type { Queue, QueueMessage } from './queue';

export class InMemQueue implements Queue {
  private readonly messages: QueueMessage[] = [];

  enqueue(message: QueueMessage): Promise<void> {
    this.messages.push(message);
    return Promise.resolve();
  }

  /** Returns all enqueued messages and clears the queue. */
  drain(): QueueMessage[] {
    return this.messages.splice(0, this.messages.length);
  }

  get size(): number {
    return this.messages.length;
  }
}
