/**
 * backend/src/shared/audit/audit.repo.ts
 *
 * WHY:
 * - Append-only audit writer (DB persistence).
 *
 * RULES:
 * - DAL-style component: storage concerns only. No AppError.
 * - Must work with both the root store and a transaction store (withStore).
 * - Metadata is accepted as plain object and serialized here.
 */

import type { RecordStore } from '../db/record-store';
import { toJsonObject } from '../db/json';
import type { AuditEventInsert } from './audit.types';

export class AuditRepo {
  constructor(
    private readonly store: RecordStore,
    private readonly now: () => Date = () => new Date(),
  ) {}

  withStore(store: RecordStore): AuditRepo {
    return new AuditRepo(store, this.now);
  }

  async append(event: AuditEventInsert): Promise<void> {
    await this.store.insert('audit_events', {
      action: event.action,
      request_id: event.requestId,
      metadata: toJsonObject(event.metadata),
      created_at: this.now(),
    });
  }
}
