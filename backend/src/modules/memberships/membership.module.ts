/**
 * backend/src/modules/memberships/membership.module.ts
 *
 * WHY:
 * - Encapsulates Memberships module wiring (CLI only; no HTTP routes).
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { Logger } from '../../shared/logger/logger';
import type { RecordStore } from '../../shared/db/record-store';
import type { AuditRepo } from '../../shared/audit/audit.repo';

import { MembershipRepo } from './dal/membership.repo';
import { MembershipService } from './membership.service';

export type MembershipModule = ReturnType<typeof createMembershipModule>;

export function createMembershipModule(deps: { store: RecordStore; logger: Logger; auditRepo: AuditRepo }) {
  const membershipRepo = new MembershipRepo(deps.store);

  const membershipService = new MembershipService({
    store: deps.store,
    logger: deps.logger,
    auditRepo: deps.auditRepo,
    membershipRepo,
  });

  return { membershipService, membershipRepo };
}
