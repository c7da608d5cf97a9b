/**
 * backend/src/shared/messaging/queue.ts
 *
 * WHY:
 * - Decouples "I need to send an email" from "here is how emails are sent".
 * - The digest job enqueues messages; the transport is wired at the DI layer only.
 *
 * RULES:
 * - Queue interface depends on nothing else in this codebase (shared → nothing).
 * - Message types are discriminated unions on the `type` field.
 * - Messages must be JSON-serializable.
 */

// ── Message types ─────────────────────────────────────────────

export type TaskDigestEmailMessage = {
  type: 'tasks.digest-email';
  userId: string;
  to: string;
  subject: string;
  /** Plain-text body, already rendered. */
  text: string;
  taskCount: number;
};

// Union: add new message types as modules need them.
export type QueueMessage = TaskDigestEmailMessage;

// ── Queue interface ───────────────────────────────────────────

export interface Queue {
  enqueue(message: QueueMessage): Promise<void>;
}
