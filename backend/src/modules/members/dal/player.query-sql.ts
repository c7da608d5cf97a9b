/**
 * backend/src/modules/members/dal/player.query-sql.ts
 *
 * WHY:
 * - Player reads shared by the backfill command and the players seed.
 *
 * RULES:
 * - Reads only. No AppError.
 * - "Registration order" is created_at, then public_id as a stable tie-break.
 */

import type { RecordStore, Row } from '../../../shared/db/record-store';
import {
  DEFAULT_MEMBERSHIP_NUMBER_DIGITS,
  formatMembershipNumber,
  highestMembershipNumber,
} from '../policies/membership-number.policy';

export async function listPlayersByRegistration(
  store: RecordStore,
  opts: { limit?: number } = {},
): Promise<Row<'players'>[]> {
  return store.list('players', {
    orderBy: [{ column: 'created_at' }, { column: 'public_id' }],
    limit: opts.limit,
  });
}

export async function getPlayerByPublicId(store: RecordStore, publicId: string): Promise<Row<'players'> | null> {
  return store.findOne('players', { public_id: publicId });
}

/** The number a newly created player gets: one past the highest numeric membership number. */
export async function nextMembershipNumber(
  store: RecordStore,
  digits = DEFAULT_MEMBERSHIP_NUMBER_DIGITS,
): Promise<string> {
  const players = await store.list('players');
  return formatMembershipNumber(highestMembershipNumber(players.map((p) => p.membership_number)) + 1, digits);
}
