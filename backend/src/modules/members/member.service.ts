/**
 * backend/src/modules/members/member.service.ts
 *
 * WHY:
 * - Entry point for member utilities used by the CLI.
 * - Only place in this module allowed to start transactions.
 */

import type { Logger } from '../../shared/logger/logger';
import type { RecordStore } from '../../shared/db/record-store';

import type { PlayerRepo } from './dal/player.repo';
import { backfillMembershipNumbersFlow } from './flows/backfill-membership-numbers-flow';
import { MemberErrors } from './member.errors';
import type { BackfillMembershipNumbersParams, BackfillMembershipNumbersResult } from './member.types';

export class MemberService {
  constructor(
    private readonly deps: {
      store: RecordStore;
      logger: Logger;
      playerRepo: PlayerRepo;
      now?: () => Date;
    },
  ) {}

  async backfillMembershipNumbers(params: BackfillMembershipNumbersParams): Promise<BackfillMembershipNumbersResult> {
    if (!Number.isInteger(params.digits) || params.digits < 1 || params.digits > 12) {
      throw MemberErrors.invalidDigits(params.digits);
    }

    const now = this.deps.now?.() ?? new Date();

    if (params.dryRun) {
      return backfillMembershipNumbersFlow(this.deps, { ...params, now });
    }

    return this.deps.store.transaction((tx) =>
      backfillMembershipNumbersFlow({ ...this.deps, store: tx }, { ...params, now }),
    );
  }
}
