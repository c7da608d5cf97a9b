/**
 * backend/src/modules/seeding/flows/import/import-context.ts
 *
 * Shared state for one import run, plus the reference lookups every step needs.
 * `store` is always the import transaction.
 */

import type { RecordStore, Row } from '../../../../shared/db/record-store';
import { syncLinkSet, type UpsertOutcome } from '../../../../shared/db/upsert';

import { SeedErrors } from '../../seed.errors';
import type { SeedReport } from '../../helpers/seed-report';

export type ImportContext = {
  store: RecordStore;
  report: SeedReport;
  now: Date;
};

/** Who is asking for a reference; used in the error message. */
export type Referrer = { entity: string; key: string };

export async function requireSeason(ctx: ImportContext, name: string, by: Referrer): Promise<Row<'seasons'>> {
  const season = await ctx.store.findOne('seasons', { name });
  if (!season) throw SeedErrors.unknownReference('Season', name, by.entity, by.key);
  return season;
}

export async function requireCategory(
  ctx: ImportContext,
  code: string,
  by: Referrer,
): Promise<Row<'membership_categories'>> {
  const category = await ctx.store.findOne('membership_categories', { code });
  if (!category) throw SeedErrors.unknownReference('MembershipCategory', code, by.entity, by.key);
  return category;
}

export async function requirePlayerTypeIds(ctx: ImportContext, names: string[], by: Referrer): Promise<string[]> {
  const ids: string[] = [];
  for (const name of names) {
    const playerType = await ctx.store.findOne('player_types', { name });
    if (!playerType) throw SeedErrors.unknownReference('PlayerType', name, by.entity, by.key);
    ids.push(playerType.id);
  }
  return ids;
}

/** A row that was otherwise unchanged still counts as updated when its links moved. */
export function withLinkChanges(outcome: UpsertOutcome, linksChanged: boolean): UpsertOutcome {
  return outcome === 'unchanged' && linksChanged ? 'updated' : outcome;
}

export async function syncCategoryPlayerTypes(
  ctx: ImportContext,
  categoryId: string,
  playerTypeIds: string[],
): Promise<boolean> {
  const current = await ctx.store.list('membership_category_player_types', { where: { category_id: categoryId } });
  return syncLinkSet(
    current.map((link) => ({ id: link.id, target: link.player_type_id })),
    playerTypeIds,
    {
      add: async (playerTypeId) => {
        await ctx.store.insert('membership_category_player_types', {
          category_id: categoryId,
          player_type_id: playerTypeId,
        });
      },
      remove: async (linkId) => {
        await ctx.store.delete('membership_category_player_types', { id: linkId });
      },
    },
  );
}

export async function syncQuestionPlayerTypes(
  ctx: ImportContext,
  questionId: string,
  playerTypeIds: string[],
): Promise<boolean> {
  const current = await ctx.store.list('dynamic_question_player_types', { where: { question_id: questionId } });
  return syncLinkSet(
    current.map((link) => ({ id: link.id, target: link.player_type_id })),
    playerTypeIds,
    {
      add: async (playerTypeId) => {
        await ctx.store.insert('dynamic_question_player_types', {
          question_id: questionId,
          player_type_id: playerTypeId,
        });
      },
      remove: async (linkId) => {
        await ctx.store.delete('dynamic_question_player_types', { id: linkId });
      },
    },
  );
}
