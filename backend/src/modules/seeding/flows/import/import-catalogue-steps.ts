/**
 * backend/src/modules/seeding/flows/import/import-catalogue-steps.ts
 *
 * WHY:
 * - Membership catalogue half of the import: seasons, player types, categories,
 *   products with plans, add-ons and match fee tariffs.
 *
 * RULES:
 * - Steps run in dependency order; each reference is looked up in the store, so a
 *   document may point at rows that already exist in the database.
 * - An unresolvable reference aborts the import (the caller's transaction rolls back).
 */

import type { Row } from '../../../../shared/db/record-store';
import { upsertRow } from '../../../../shared/db/upsert';

import { requireNaturalKey } from '../../natural-keys';
import { SeedErrors } from '../../seed.errors';
import type { MembershipsSeedInput } from '../../seed.types';
import {
  requireCategory,
  requirePlayerTypeIds,
  requireSeason,
  syncCategoryPlayerTypes,
  withLinkChanges,
  type ImportContext,
} from './import-context';

type Catalogue = MembershipsSeedInput['memberships'];

export async function importSeasons(ctx: ImportContext, seasons: Catalogue['seasons']): Promise<void> {
  for (const [index, s] of seasons.entries()) {
    const name = requireNaturalKey('Season', s, index);
    if (s.end < s.start) throw SeedErrors.invalidSeasonDates(name, s.start, s.end);

    const { outcome } = await upsertRow(ctx.store, 'seasons', {
      match: { name },
      values: { name, start_date: s.start, end_date: s.end, is_active: s.is_active },
    });
    ctx.report.record('Season', name, outcome);
  }
}

export async function importPlayerTypes(
  ctx: ImportContext,
  playerTypes: MembershipsSeedInput['members']['player_types'],
): Promise<void> {
  for (const [index, pt] of playerTypes.entries()) {
    const name = requireNaturalKey('PlayerType', pt, index);
    const { outcome } = await upsertRow(ctx.store, 'player_types', { match: { name }, values: { name } });
    ctx.report.record('PlayerType', name, outcome);
  }
}

export async function importCategories(ctx: ImportContext, categories: Catalogue['categories']): Promise<void> {
  for (const [index, c] of categories.entries()) {
    const code = requireNaturalKey('MembershipCategory', c, index);
    const playerTypeIds = await requirePlayerTypeIds(ctx, c.applies_to, { entity: 'MembershipCategory', key: code });

    const { row, outcome } = await upsertRow(ctx.store, 'membership_categories', {
      match: { code },
      values: {
        code,
        label: c.label ?? code,
        description: c.description,
        is_selectable: c.is_selectable,
      },
    });
    const linksChanged = await syncCategoryPlayerTypes(ctx, row.id, playerTypeIds);

    ctx.report.record('MembershipCategory', code, withLinkChanges(outcome, linksChanged));
  }
}

export async function importProducts(ctx: ImportContext, products: Catalogue['products']): Promise<void> {
  for (const [index, p] of products.entries()) {
    const sku = requireNaturalKey('MembershipProduct', p, index);
    const by = { entity: 'MembershipProduct', key: sku };
    const season = await requireSeason(ctx, p.season, by);
    const category = await requireCategory(ctx, p.category, by);

    const { row: product, outcome } = await upsertRow(ctx.store, 'membership_products', {
      match: { season_id: season.id, sku },
      values: {
        season_id: season.id,
        category_id: category.id,
        name: p.name ?? sku,
        sku,
        list_price_gbp: p.list_price_gbp,
        active: p.active,
        notes: p.notes,
        requires_plan: p.requires_plan,
        pay_per_match: p.pay_per_match,
      },
    });
    ctx.report.record('MembershipProduct', `${sku} (${season.name})`, outcome);

    for (const [planIndex, plan] of p.plans.entries()) {
      const label = requireNaturalKey('PaymentPlan', plan, planIndex);
      const result = await upsertRow(ctx.store, 'payment_plans', {
        match: { product_id: product.id, label },
        values: {
          product_id: product.id,
          label,
          instalment_amount_gbp: plan.instalment_amount_gbp,
          instalment_count: plan.instalment_count,
          frequency: plan.frequency,
          includes_match_fees: plan.includes_match_fees,
          active: plan.active,
          display_order: plan.display_order,
        },
      });
      ctx.report.record('PaymentPlan', `${sku} -> ${label}`, result.outcome);
    }
  }
}

export async function importAddOns(ctx: ImportContext, addons: Catalogue['addons']): Promise<void> {
  for (const [index, a] of addons.entries()) {
    const name = requireNaturalKey('AddOnFee', a, index);
    const season = await requireSeason(ctx, a.season, { entity: 'AddOnFee', key: name });

    const { outcome } = await upsertRow(ctx.store, 'add_on_fees', {
      match: { season_id: season.id, name },
      values: { season_id: season.id, name, amount_gbp: a.amount_gbp, active: a.active },
    });
    ctx.report.record('AddOnFee', `${name} (${season.name})`, outcome);
  }
}

export async function importMatchFees(ctx: ImportContext, fees: Catalogue['match_fees']): Promise<void> {
  for (const [index, m] of fees.entries()) {
    const name = requireNaturalKey('MatchFeeTariff', m, index);
    const by = { entity: 'MatchFeeTariff', key: name };
    const season = await requireSeason(ctx, m.season, by);
    const category = m.category ? await requireCategory(ctx, m.category, by) : null;

    let product: Row<'membership_products'> | null = null;
    if (m.product) {
      product = await ctx.store.findOne('membership_products', { season_id: season.id, sku: m.product });
      if (!product) throw SeedErrors.unknownReference('MembershipProduct', m.product, by.entity, by.key);
    }

    const scope = product ? `product:${product.sku}` : category ? `category:${category.code}` : 'season';
    const match = {
      season_id: season.id,
      name,
      category_id: category?.id ?? null,
      product_id: product?.id ?? null,
    };

    const { outcome } = await upsertRow(ctx.store, 'match_fee_tariffs', {
      match,
      values: { ...match, amount_gbp: m.amount_gbp, is_default: m.is_default, active: m.active },
    });
    ctx.report.record('MatchFeeTariff', `${name} (${season.name}) [${scope}]`, outcome);
  }
}
