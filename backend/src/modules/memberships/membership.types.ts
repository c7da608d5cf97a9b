/**
 * backend/src/modules/memberships/membership.types.ts
 *
 * WHY:
 * - Season catalogue shapes used by the clone flow.
 */

import type { Row } from '../../shared/db/record-store';

export type SeasonProduct = {
  product: Row<'membership_products'>;
  plans: Row<'payment_plans'>[];
};

/** Everything that belongs to one season, in clone processing order. */
export type SeasonCatalogue = {
  season: Row<'seasons'>;
  products: SeasonProduct[];
  addons: Row<'add_on_fees'>[];
  matchFees: Row<'match_fee_tariffs'>[];
};

export type CloneSeasonParams = {
  from: string;
  to: string;
  createTarget: boolean;
  overwrite: boolean;
  /** Accepted for explicitness; inactive rows are always cloned. */
  includeInactive: boolean;
  dryRun: boolean;
};

export type CloneCounts = {
  created: number;
  updated: number;
};

export type CloneSeasonResult = {
  dryRun: boolean;
  targetCreated: boolean;
  products: CloneCounts;
  plans: CloneCounts;
  addons: CloneCounts;
  matchFees: CloneCounts;
  skipped: string[];
  lines: string[];
};
