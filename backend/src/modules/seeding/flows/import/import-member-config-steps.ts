/**
 * backend/src/modules/seeding/flows/import/import-member-config-steps.ts
 *
 * WHY:
 * - Member configuration half of the import: positions, question categories,
 *   dynamic questions, teams and team memberships.
 *
 * RULES:
 * - Team memberships never create players: the player must already exist.
 * - A team membership is keyed by (team, player); its positions are replaced to
 *   match the document.
 */

import { syncLinkSet, upsertRow, type UpsertOutcome } from '../../../../shared/db/upsert';

import { requireNaturalKey } from '../../natural-keys';
import { SeedErrors } from '../../seed.errors';
import type { MembershipsSeedInput } from '../../seed.types';
import { requirePlayerTypeIds, syncQuestionPlayerTypes, withLinkChanges, type ImportContext } from './import-context';

type MemberConfig = MembershipsSeedInput['members'];

export async function importPositions(ctx: ImportContext, positions: MemberConfig['positions']): Promise<void> {
  for (const [index, pos] of positions.entries()) {
    const name = requireNaturalKey('Position', pos, index);
    const { outcome } = await upsertRow(ctx.store, 'positions', { match: { name }, values: { name } });
    ctx.report.record('Position', name, outcome);
  }
}

export async function importQuestionCategories(
  ctx: ImportContext,
  categories: MemberConfig['question_categories'],
): Promise<void> {
  for (const [index, qc] of categories.entries()) {
    const name = requireNaturalKey('QuestionCategory', qc, index);
    const { outcome } = await upsertRow(ctx.store, 'question_categories', {
      match: { name },
      values: { name, description: qc.description, display_order: qc.display_order },
    });
    ctx.report.record('QuestionCategory', name, outcome);
  }
}

export async function importDynamicQuestions(
  ctx: ImportContext,
  questions: MemberConfig['dynamic_questions'],
): Promise<void> {
  for (const [index, q] of questions.entries()) {
    const code = requireNaturalKey('DynamicQuestion', q, index);
    const by = { entity: 'DynamicQuestion', key: code };

    let categoryId: string | null = null;
    if (q.category) {
      const category = await ctx.store.findOne('question_categories', { name: q.category });
      if (!category) throw SeedErrors.unknownReference('QuestionCategory', q.category, by.entity, by.key);
      categoryId = category.id;
    }
    const playerTypeIds = await requirePlayerTypeIds(ctx, q.applies_to, by);

    const { row, outcome } = await upsertRow(ctx.store, 'dynamic_questions', {
      match: { code },
      values: {
        code,
        label: q.label ?? code,
        help_text: q.help_text,
        description: q.description,
        question_type: q.question_type,
        required: q.required,
        requires_detail_if_yes: q.requires_detail_if_yes,
        category_id: categoryId,
        display_order: q.display_order,
        active: q.active,
        choices_text: q.choices_text,
      },
    });
    const linksChanged = await syncQuestionPlayerTypes(ctx, row.id, playerTypeIds);

    ctx.report.record('DynamicQuestion', code, withLinkChanges(outcome, linksChanged));
  }
}

export async function importTeams(ctx: ImportContext, teams: MemberConfig['teams']): Promise<void> {
  for (const [index, t] of teams.entries()) {
    const name = requireNaturalKey('Team', t, index);
    const { outcome } = await upsertRow(ctx.store, 'teams', {
      match: { name },
      values: { name, description: t.description, active: t.active },
    });
    ctx.report.record('Team', name, outcome);
  }
}

export async function importTeamMemberships(
  ctx: ImportContext,
  memberships: MemberConfig['team_memberships'],
): Promise<void> {
  for (const tm of memberships) {
    const key = `${tm.team} <- ${tm.player_public_id}`;

    const team = await ctx.store.findOne('teams', { name: tm.team });
    if (!team) throw SeedErrors.unknownReference('Team', tm.team, 'TeamMembership', key);

    const player = await ctx.store.findOne('players', { public_id: tm.player_public_id });
    if (!player) throw SeedErrors.unknownReference('Player', tm.player_public_id, 'TeamMembership', key);

    const positionIds: string[] = [];
    for (const name of tm.positions) {
      const position = await ctx.store.findOne('positions', { name });
      if (!position) throw SeedErrors.unknownReference('Position', name, 'TeamMembership', key);
      positionIds.push(position.id);
    }

    let outcome: UpsertOutcome = 'unchanged';
    let membership = await ctx.store.findOne('team_memberships', { team_id: team.id, player_id: player.id });
    if (!membership) {
      membership = await ctx.store.insert('team_memberships', {
        team_id: team.id,
        player_id: player.id,
        assigned_at: ctx.now,
      });
      outcome = 'created';
    }

    const membershipId = membership.id;
    const current = await ctx.store.list('team_membership_positions', { where: { team_membership_id: membershipId } });
    const linksChanged = await syncLinkSet(
      current.map((link) => ({ id: link.id, target: link.position_id })),
      positionIds,
      {
        add: async (positionId) => {
          await ctx.store.insert('team_membership_positions', {
            team_membership_id: membershipId,
            position_id: positionId,
          });
        },
        remove: async (linkId) => {
          await ctx.store.delete('team_membership_positions', { id: linkId });
        },
      },
    );

    ctx.report.record('TeamMembership', key, withLinkChanges(outcome, linksChanged));
  }
}
