/**
 * backend/src/modules/memberships/dal/membership.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for seasons and their catalogue rows.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { RecordStore, Row } from '../../../shared/db/record-store';

export async function selectSeasonByName(store: RecordStore, name: string): Promise<Row<'seasons'> | null> {
  return store.findOne('seasons', { name });
}

export async function selectSeasonProducts(store: RecordStore, seasonId: string) {
  return store.list('membership_products', { where: { season_id: seasonId }, orderBy: [{ column: 'sku' }] });
}

export async function selectProductPlans(store: RecordStore, productId: string) {
  return store.list('payment_plans', {
    where: { product_id: productId },
    orderBy: [{ column: 'display_order' }, { column: 'label' }],
  });
}

export async function selectSeasonAddOns(store: RecordStore, seasonId: string) {
  return store.list('add_on_fees', { where: { season_id: seasonId }, orderBy: [{ column: 'name' }] });
}

export async function selectSeasonMatchFees(store: RecordStore, seasonId: string) {
  return store.list('match_fee_tariffs', { where: { season_id: seasonId }, orderBy: [{ column: 'name' }] });
}
