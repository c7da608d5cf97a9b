/**
 * backend/src/modules/members/flows/backfill-membership-numbers-flow.ts
 *
 * WHY:
 * - Players imported before membership numbers existed have none; --force
 *   renumbers the whole club in registration order.
 *
 * RULES:
 * - `deps.store` is the transaction when writing; a dry run never writes.
 * - Force mode clears every number it is about to change before assigning new
 *   ones, so swapped numbers never collide on the unique index.
 */

import type { Logger } from '../../../shared/logger/logger';
import type { RecordStore } from '../../../shared/db/record-store';

import { listPlayersByRegistration } from '../dal/player.query-sql';
import type { PlayerRepo } from '../dal/player.repo';
import { planMembershipNumberBackfill } from '../policies/membership-number.policy';
import type { BackfillMembershipNumbersParams, BackfillMembershipNumbersResult } from '../member.types';

const DRY_RUN_SAMPLE_SIZE = 10;

export async function backfillMembershipNumbersFlow(
  deps: { store: RecordStore; logger: Logger; playerRepo: PlayerRepo },
  params: BackfillMembershipNumbersParams & { now: Date },
): Promise<BackfillMembershipNumbersResult> {
  const flow = 'members.backfill_membership_numbers';
  deps.logger.info({ msg: `${flow}.start`, flow, digits: params.digits, force: params.force, dryRun: params.dryRun });

  const players = await listPlayersByRegistration(deps.store);
  const changes = planMembershipNumberBackfill(players, { digits: params.digits, force: params.force });

  if (changes.length === 0) {
    return { changes, written: false, lines: ['Nothing to update.'] };
  }

  const lines = [`Prepared ${changes.length} player(s) for update.`];

  if (params.dryRun) {
    for (const change of changes.slice(0, DRY_RUN_SAMPLE_SIZE)) {
      lines.push(`  public_id=${change.publicId} -> membership_number=${change.to}`);
    }
    if (changes.length > DRY_RUN_SAMPLE_SIZE) {
      lines.push(`  ... and ${changes.length - DRY_RUN_SAMPLE_SIZE} more`);
    }
    lines.push('Dry run: no changes written.');
    return { changes, written: false, lines };
  }

  const repo = deps.playerRepo.withStore(deps.store);
  if (params.force) {
    for (const change of changes) {
      if (change.from !== null) await repo.setMembershipNumber(change.playerId, null, params.now);
    }
  }
  for (const change of changes) {
    await repo.setMembershipNumber(change.playerId, change.to, params.now);
  }

  lines.push(`Updated ${changes.length} player(s).`);

  deps.logger.info({ msg: `${flow}.success`, flow, updated: changes.length });

  return { changes, written: true, lines };
}
