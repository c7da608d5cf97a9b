/**
 * backend/src/modules/memberships/membership.service.ts
 *
 * WHY:
 * - Entry point for season catalogue operations used by the CLI.
 * - Only place in this module allowed to start transactions.
 *
 * RULES:
 * - A clone is one transaction; --dry-run rolls it back after the report is built.
 */

import type { Logger } from '../../shared/logger/logger';
import type { RecordStore } from '../../shared/db/record-store';
import type { AuditRepo } from '../../shared/audit/audit.repo';

import type { MembershipRepo } from './dal/membership.repo';
import { cloneSeasonFlow } from './flows/clone-season-flow';
import type { CloneSeasonParams, CloneSeasonResult } from './membership.types';

export class MembershipService {
  constructor(
    private readonly deps: {
      store: RecordStore;
      logger: Logger;
      auditRepo: AuditRepo;
      membershipRepo: MembershipRepo;
    },
  ) {}

  async cloneSeason(params: CloneSeasonParams): Promise<CloneSeasonResult> {
    return this.deps.store.transaction((tx) => cloneSeasonFlow({ ...this.deps, store: tx }, params), {
      rollback: params.dryRun,
    });
  }
}
