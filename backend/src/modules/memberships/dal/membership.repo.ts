/**
 * backend/src/modules/memberships/dal/membership.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for seasons.
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - Supports withStore() for transaction binding (same pattern as AuditRepo).
 */

import type { RecordStore, Row } from '../../../shared/db/record-store';

export class MembershipRepo {
  constructor(private readonly store: RecordStore) {}

  withStore(store: RecordStore): MembershipRepo {
    return new MembershipRepo(store);
  }

  async createSeason(params: { name: string; startDate: string; endDate: string; isActive: boolean }): Promise<
    Row<'seasons'>
  > {
    return this.store.insert('seasons', {
      name: params.name,
      start_date: params.startDate,
      end_date: params.endDate,
      is_active: params.isActive,
    });
  }
}
