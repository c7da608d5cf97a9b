/**
 * backend/src/modules/members/policies/membership-number.policy.ts
 *
 * WHY:
 * - Membership numbers are zero-padded sequence numbers ("00042") handed out in
 *   registration order. Seed import and the backfill command must agree on them.
 *
 * RULES:
 * - Pure functions only.
 * - Non-numeric legacy numbers are kept but never counted towards the maximum.
 */

import type { BackfillCandidate, MembershipNumberChange } from '../member.types';

export const DEFAULT_MEMBERSHIP_NUMBER_DIGITS = 5;

export function formatMembershipNumber(n: number, digits = DEFAULT_MEMBERSHIP_NUMBER_DIGITS): string {
  return String(n).padStart(digits, '0');
}

export function highestMembershipNumber(values: (string | null)[]): number {
  let max = 0;
  for (const value of values) {
    const trimmed = value?.trim() ?? '';
    if (/^\d+$/.test(trimmed)) max = Math.max(max, Number.parseInt(trimmed, 10));
  }
  return max;
}

/**
 * `players` must be in registration order.
 * Fill mode numbers only players without a number, continuing after the highest one.
 * Force mode renumbers everyone 1..N and skips players already on their target.
 */
export function planMembershipNumberBackfill(
  players: BackfillCandidate[],
  opts: { digits: number; force: boolean },
): MembershipNumberChange[] {
  if (opts.force) {
    return players
      .map((p, i) => ({
        playerId: p.id,
        publicId: p.public_id,
        from: p.membership_number,
        to: formatMembershipNumber(i + 1, opts.digits),
      }))
      .filter((change) => change.from !== change.to);
  }

  let next = highestMembershipNumber(players.map((p) => p.membership_number)) + 1;
  return players
    .filter((p) => !p.membership_number?.trim())
    .map((p) => ({
      playerId: p.id,
      publicId: p.public_id,
      from: p.membership_number,
      to: formatMembershipNumber(next++, opts.digits),
    }));
}
