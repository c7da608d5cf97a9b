/**
 * backend/src/shared/audit/audit.writer.ts
 *
 * WHY:
 * - Flows name the action and its metadata; the request id (HTTP) is bound once.
 *   CLI commands and scheduler jobs leave it null.
 *
 * HOW TO USE:
 * - const audit = new AuditWriter(deps.auditRepo.withStore(tx), { requestId })
 * - await audit.append('spond.link.created', { playerId, linkId })
 */

import type { AuditRepo } from './audit.repo';
import type { AuditAction, AuditContext, AuditMetadata } from './audit.types';

export class AuditWriter {
  private readonly requestId: string | null;

  constructor(
    private readonly repo: AuditRepo,
    context: Partial<AuditContext> = {},
  ) {
    this.requestId = context.requestId ?? null;
  }

  async append(action: AuditAction, metadata?: AuditMetadata): Promise<void> {
    await this.repo.append({ action, requestId: this.requestId, metadata });
  }
}
