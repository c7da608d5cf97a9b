/**
 * backend/src/modules/members/dal/player.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for players.
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - Supports withStore() for transaction binding (same pattern as AuditRepo).
 */

import type { RecordStore } from '../../../shared/db/record-store';

export class PlayerRepo {
  constructor(private readonly store: RecordStore) {}

  withStore(store: RecordStore): PlayerRepo {
    return new PlayerRepo(store);
  }

  async setMembershipNumber(playerId: string, membershipNumber: string | null, now: Date): Promise<void> {
    await this.store.update('players', playerId, { membership_number: membershipNumber, updated_at: now });
  }
}
