/**
 * backend/src/modules/memberships/flows/clone-season-flow.ts
 *
 * WHY:
 * - Rolls a season's catalogue (products, plans, add-ons, match fee tariffs) into
 *   the next season so the committee only edits prices.
 *
 * RULES:
 * - `deps.store` is the clone transaction (MembershipService opens it).
 * - Rows are matched by natural key inside the target season. Existing rows are
 *   left alone unless `overwrite` is set.
 * - Categories are global: tariffs keep their category as is.
 * - A product-scoped tariff whose product has no target counterpart is skipped
 *   with a warning line, never re-pointed.
 */

import type { Logger } from '../../../shared/logger/logger';
import type { RecordStore, Row } from '../../../shared/db/record-store';
import { upsertRow, type UpsertMode, type UpsertOutcome } from '../../../shared/db/upsert';
import type { AuditRepo } from '../../../shared/audit/audit.repo';
import { AuditWriter } from '../../../shared/audit/audit.writer';

import { selectSeasonByName } from '../dal/membership.query-sql';
import type { MembershipRepo } from '../dal/membership.repo';
import { shiftYear } from '../helpers/shift-year';
import { MembershipErrors } from '../membership.errors';
import { loadSeasonCatalogue } from '../membership.queries';
import type { CloneCounts, CloneSeasonParams, CloneSeasonResult } from '../membership.types';

function emptyCounts(): CloneCounts {
  return { created: 0, updated: 0 };
}

function tally(counts: CloneCounts, outcome: UpsertOutcome): void {
  if (outcome === 'created') counts.created += 1;
  if (outcome === 'updated') counts.updated += 1;
}

function summaryLine(label: string, counts: CloneCounts, overwrite: boolean): string {
  const updated = overwrite ? `, updated ${counts.updated}` : '';
  return `- ${label.padEnd(11)}+${counts.created}${updated}`;
}

export async function cloneSeasonFlow(
  deps: { store: RecordStore; logger: Logger; auditRepo: AuditRepo; membershipRepo: MembershipRepo },
  params: CloneSeasonParams,
): Promise<CloneSeasonResult> {
  const flow = 'memberships.clone_season';
  deps.logger.info({
    msg: `${flow}.start`,
    flow,
    from: params.from,
    to: params.to,
    dryRun: params.dryRun,
    includeInactive: params.includeInactive,
  });

  if (params.from === params.to) throw MembershipErrors.sameSeason(params.from);

  const source = await selectSeasonByName(deps.store, params.from);
  if (!source) throw MembershipErrors.sourceSeasonNotFound(params.from);

  const lines: string[] = [];
  let targetCreated = false;
  let target = await selectSeasonByName(deps.store, params.to);

  if (!target) {
    if (!params.createTarget) throw MembershipErrors.targetSeasonNotFound(params.to);

    target = await deps.membershipRepo.withStore(deps.store).createSeason({
      name: params.to,
      startDate: shiftYear(source.start_date),
      endDate: shiftYear(source.end_date),
      isActive: false,
    });
    targetCreated = true;
    lines.push(
      `Created target season '${target.name}' (${target.start_date} -> ${target.end_date}, is_active=false).`,
    );
  }

  const targetSeasonId = target.id;
  const targetName = target.name;
  lines.push(`Cloning from ${source.name} -> ${targetName}...`);

  const mode: UpsertMode = params.overwrite ? 'sync' : 'create-only';
  const catalogue = await loadSeasonCatalogue(deps.store, source);
  const counts = {
    products: emptyCounts(),
    plans: emptyCounts(),
    addons: emptyCounts(),
    matchFees: emptyCounts(),
  };
  const skipped: string[] = [];

  // Source product id -> target product, for product-scoped tariffs.
  const productMap = new Map<string, Row<'membership_products'>>();

  for (const { product, plans } of catalogue.products) {
    const { row: cloned, outcome } = await upsertRow(deps.store, 'membership_products', {
      match: { season_id: targetSeasonId, sku: product.sku },
      values: {
        season_id: targetSeasonId,
        category_id: product.category_id,
        name: product.name,
        sku: product.sku,
        list_price_gbp: product.list_price_gbp,
        active: product.active,
        notes: product.notes,
        requires_plan: product.requires_plan,
        pay_per_match: product.pay_per_match,
      },
      mode,
    });
    tally(counts.products, outcome);
    productMap.set(product.id, cloned);

    for (const plan of plans) {
      const result = await upsertRow(deps.store, 'payment_plans', {
        match: { product_id: cloned.id, label: plan.label },
        values: {
          product_id: cloned.id,
          label: plan.label,
          instalment_amount_gbp: plan.instalment_amount_gbp,
          instalment_count: plan.instalment_count,
          frequency: plan.frequency,
          includes_match_fees: plan.includes_match_fees,
          active: plan.active,
          display_order: plan.display_order,
        },
        mode,
      });
      tally(counts.plans, result.outcome);
    }
  }

  for (const addon of catalogue.addons) {
    const { outcome } = await upsertRow(deps.store, 'add_on_fees', {
      match: { season_id: targetSeasonId, name: addon.name },
      values: { season_id: targetSeasonId, name: addon.name, amount_gbp: addon.amount_gbp, active: addon.active },
      mode,
    });
    tally(counts.addons, outcome);
  }

  for (const fee of catalogue.matchFees) {
    let productId: string | null = null;

    if (fee.product_id) {
      const sourceProduct = catalogue.products.find((p) => p.product.id === fee.product_id)?.product;
      const targetProduct = productMap.get(fee.product_id);
      if (!targetProduct) {
        const sku = sourceProduct?.sku ?? fee.product_id;
        skipped.push(fee.name);
        lines.push(`Skipping match fee '${fee.name}' scoped to product '${sku}' (no target product in ${targetName}).`);
        deps.logger.warn({ msg: `${flow}.fee_skipped`, flow, fee: fee.name, sku });
        continue;
      }
      productId = targetProduct.id;
    }

    const match = {
      season_id: targetSeasonId,
      name: fee.name,
      category_id: fee.category_id,
      product_id: productId,
    };
    const { outcome } = await upsertRow(deps.store, 'match_fee_tariffs', {
      match,
      values: { ...match, amount_gbp: fee.amount_gbp, is_default: fee.is_default, active: fee.active },
      mode,
    });
    tally(counts.matchFees, outcome);
  }

  if (params.dryRun) lines.push('DRY RUN - NO CHANGES WRITTEN', '');

  lines.push(
    'Clone complete.',
    summaryLine('Products:', counts.products, params.overwrite),
    summaryLine('Plans:', counts.plans, params.overwrite),
    summaryLine('Add-ons:', counts.addons, params.overwrite),
    summaryLine('MatchFees:', counts.matchFees, params.overwrite),
  );

  if (!params.dryRun) {
    const audit = new AuditWriter(deps.auditRepo.withStore(deps.store));
    await audit.append('season.cloned', {
      from: source.name,
      to: targetName,
      targetCreated,
      overwrite: params.overwrite,
      products: counts.products,
      plans: counts.plans,
      addons: counts.addons,
      matchFees: counts.matchFees,
    });
  }

  deps.logger.info({ msg: `${flow}.success`, flow, from: source.name, to: targetName, dryRun: params.dryRun });

  return { dryRun: params.dryRun, targetCreated, ...counts, skipped, lines };
}
