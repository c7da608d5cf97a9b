/**
 * backend/src/modules/memberships/membership.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape rows into the SeasonCatalogue the clone flow walks.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { RecordStore, Row } from '../../shared/db/record-store';
import {
  selectProductPlans,
  selectSeasonAddOns,
  selectSeasonMatchFees,
  selectSeasonProducts,
} from './dal/membership.query-sql';
import type { SeasonCatalogue } from './membership.types';

export async function loadSeasonCatalogue(store: RecordStore, season: Row<'seasons'>): Promise<SeasonCatalogue> {
  const products = [];
  for (const product of await selectSeasonProducts(store, season.id)) {
    products.push({ product, plans: await selectProductPlans(store, product.id) });
  }

  return {
    season,
    products,
    addons: await selectSeasonAddOns(store, season.id),
    matchFees: await selectSeasonMatchFees(store, season.id),
  };
}
