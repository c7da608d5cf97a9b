/**
 * backend/src/modules/seeding/flows/export/export-memberships-seed-flow.ts
 *
 * WHY:
 * - Produces the portable memberships + member-configuration document (v3).
 *
 * RULES:
 * - Foreign keys are written as natural keys (season name, category code, product
 *   sku, player type name, team name, player public id, position name).
 * - Subscriptions and player answers are never exported.
 * - Output order is deterministic so two dumps of the same data are identical.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { RecordStore } from '../../../../shared/db/record-store';

import {
  MEMBERSHIPS_SEED_VERSION,
  type MembershipsSeedDocument,
  type PlanSeed,
  type ProductSeed,
} from '../../seed.types';

function byText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function lookup<R extends { id: string }, V>(rows: R[], pick: (row: R) => V): Map<string, V> {
  return new Map(rows.map((row) => [row.id, pick(row)]));
}

function required<V>(map: Map<string, V>, id: string, what: string): V {
  const value = map.get(id);
  if (value === undefined) throw new Error(`Dangling ${what} reference ${id}`);
  return value;
}

function groupIds<R>(rows: R[], owner: (row: R) => string, target: (row: R) => string): Map<string, string[]> {
  const out = new Map<string, string[]>();
  for (const row of rows) {
    const list = out.get(owner(row)) ?? [];
    list.push(target(row));
    out.set(owner(row), list);
  }
  return out;
}

export async function exportMembershipsSeedFlow(deps: {
  store: RecordStore;
  logger: Logger;
}): Promise<MembershipsSeedDocument> {
  const { store } = deps;

  deps.logger.info({ msg: 'seeding.export_memberships.start', flow: 'seeding.export_memberships' });

  const seasons = await store.list('seasons', {
    orderBy: [{ column: 'start_date' }, { column: 'name' }],
  });
  const seasonRank = new Map(seasons.map((s, i) => [s.id, i]));
  const seasonName = lookup(seasons, (s) => s.name);
  const bySeason = <R extends { season_id: string }>(a: R, b: R) =>
    (seasonRank.get(a.season_id) ?? 0) - (seasonRank.get(b.season_id) ?? 0);

  const playerTypes = await store.list('player_types', { orderBy: [{ column: 'name' }] });
  const playerTypeName = lookup(playerTypes, (pt) => pt.name);

  const categories = await store.list('membership_categories', { orderBy: [{ column: 'code' }] });
  const categoryCode = lookup(categories, (c) => c.code);
  const categoryTypes = groupIds(
    await store.list('membership_category_player_types'),
    (l) => l.category_id,
    (l) => required(playerTypeName, l.player_type_id, 'player type'),
  );

  const products = (await store.list('membership_products', { orderBy: [{ column: 'sku' }] })).sort(bySeason);
  const productSku = lookup(products, (p) => p.sku);

  const plans = await store.list('payment_plans', {
    orderBy: [{ column: 'display_order' }, { column: 'label' }],
  });
  const plansByProduct = new Map<string, PlanSeed[]>();
  for (const plan of plans) {
    const list = plansByProduct.get(plan.product_id) ?? [];
    list.push({
      label: plan.label,
      instalment_amount_gbp: plan.instalment_amount_gbp,
      instalment_count: plan.instalment_count,
      frequency: plan.frequency,
      includes_match_fees: plan.includes_match_fees,
      active: plan.active,
      display_order: plan.display_order,
    });
    plansByProduct.set(plan.product_id, list);
  }

  const productSeeds: ProductSeed[] = products.map((p) => ({
    season: required(seasonName, p.season_id, 'season'),
    category: required(categoryCode, p.category_id, 'category'),
    name: p.name,
    sku: p.sku,
    list_price_gbp: p.list_price_gbp,
    active: p.active,
    notes: p.notes,
    requires_plan: p.requires_plan,
    pay_per_match: p.pay_per_match,
    plans: plansByProduct.get(p.id) ?? [],
  }));

  const addons = (await store.list('add_on_fees', { orderBy: [{ column: 'name' }] })).sort(bySeason);
  const fees = (await store.list('match_fee_tariffs', { orderBy: [{ column: 'name' }] })).sort(bySeason);

  const positions = await store.list('positions', { orderBy: [{ column: 'name' }] });
  const positionName = lookup(positions, (p) => p.name);

  const questionCategories = await store.list('question_categories', {
    orderBy: [{ column: 'display_order' }, { column: 'name' }],
  });
  const questionCategoryName = lookup(questionCategories, (qc) => qc.name);

  const questions = await store.list('dynamic_questions', {
    orderBy: [{ column: 'display_order' }, { column: 'code' }],
  });
  const questionTypes = groupIds(
    await store.list('dynamic_question_player_types'),
    (l) => l.question_id,
    (l) => required(playerTypeName, l.player_type_id, 'player type'),
  );

  const teams = await store.list('teams', { orderBy: [{ column: 'name' }] });
  const teamName = lookup(teams, (t) => t.name);

  const players = await store.list('players');
  const playerPublicId = lookup(players, (p) => p.public_id);

  const membershipPositions = groupIds(
    await store.list('team_membership_positions'),
    (l) => l.team_membership_id,
    (l) => required(positionName, l.position_id, 'position'),
  );

  const teamMemberships = (await store.list('team_memberships'))
    .map((tm) => ({
      team: required(teamName, tm.team_id, 'team'),
      player_public_id: required(playerPublicId, tm.player_id, 'player'),
      positions: (membershipPositions.get(tm.id) ?? []).sort(byText),
    }))
    .sort((a, b) => byText(a.team, b.team) || byText(a.player_public_id, b.player_public_id));

  const document: MembershipsSeedDocument = {
    _meta: { version: MEMBERSHIPS_SEED_VERSION, notes: 'No subscriptions or player answers exported.' },
    memberships: {
      seasons: seasons.map((s) => ({
        name: s.name,
        start: s.start_date,
        end: s.end_date,
        is_active: s.is_active,
      })),
      categories: categories.map((c) => ({
        code: c.code,
        label: c.label,
        description: c.description,
        is_selectable: c.is_selectable,
        applies_to: (categoryTypes.get(c.id) ?? []).sort(byText),
      })),
      products: productSeeds,
      addons: addons.map((a) => ({
        season: required(seasonName, a.season_id, 'season'),
        name: a.name,
        amount_gbp: a.amount_gbp,
        active: a.active,
      })),
      match_fees: fees.map((f) => ({
        season: required(seasonName, f.season_id, 'season'),
        name: f.name,
        amount_gbp: f.amount_gbp,
        category: f.category_id ? required(categoryCode, f.category_id, 'category') : null,
        product: f.product_id ? required(productSku, f.product_id, 'product') : null,
        is_default: f.is_default,
        active: f.active,
      })),
    },
    members: {
      player_types: playerTypes.map((pt) => ({ name: pt.name })),
      positions: positions.map((p) => ({ name: p.name })),
      question_categories: questionCategories.map((qc) => ({
        name: qc.name,
        description: qc.description,
        display_order: qc.display_order,
      })),
      dynamic_questions: questions.map((q) => ({
        code: q.code,
        label: q.label,
        help_text: q.help_text,
        description: q.description,
        question_type: q.question_type,
        required: q.required,
        requires_detail_if_yes: q.requires_detail_if_yes,
        category: q.category_id ? required(questionCategoryName, q.category_id, 'question category') : null,
        display_order: q.display_order,
        active: q.active,
        choices_text: q.choices_text,
        applies_to: (questionTypes.get(q.id) ?? []).sort(byText),
      })),
      teams: teams.map((t) => ({ name: t.name, description: t.description, active: t.active })),
      team_memberships: teamMemberships,
    },
  };

  deps.logger.info({
    msg: 'seeding.export_memberships.success',
    flow: 'seeding.export_memberships',
    seasons: document.memberships.seasons.length,
    products: document.memberships.products.length,
  });

  return document;
}
