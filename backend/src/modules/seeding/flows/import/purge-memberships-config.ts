/**
 * backend/src/modules/seeding/flows/import/purge-memberships-config.ts
 *
 * WHY:
 * - `seed_memberships --purge` guarantees the target holds exactly the document.
 *
 * RULES:
 * - Deletes children before parents.
 * - Refuses when subscriptions, players or player answers exist: they point at
 *   the rows being purged and are never part of this document.
 */

import type { TableName } from '../../../../shared/db/schema';

import { SeedErrors } from '../../seed.errors';
import type { ImportContext } from './import-context';

const BLOCKING_TABLES = ['subscriptions', 'players', 'player_answers'] as const satisfies readonly TableName[];

const PURGE_ORDER = [
  'team_membership_positions',
  'team_memberships',
  'teams',
  'dynamic_question_player_types',
  'dynamic_questions',
  'question_categories',
  'positions',
  'membership_category_player_types',
  'payment_plans',
  'match_fee_tariffs',
  'membership_products',
  'add_on_fees',
  'membership_categories',
  'player_types',
  'seasons',
] as const satisfies readonly TableName[];

export async function purgeMembershipsConfig(ctx: ImportContext): Promise<number> {
  const counts: Record<string, number> = {};
  for (const table of BLOCKING_TABLES) {
    counts[table] = await ctx.store.count(table);
  }
  if (Object.values(counts).some((n) => n > 0)) throw SeedErrors.purgeBlocked(counts);

  let removed = 0;
  for (const table of PURGE_ORDER) {
    removed += await ctx.store.delete(table);
  }

  ctx.report.note(`Purged ${removed} existing rows.`);
  return removed;
}
