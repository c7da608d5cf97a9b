/**
 * backend/src/modules/spond/flows/sync-transactions-flow.ts
 *
 * WHY:
 * - Stores Spond payment transactions so they can be reconciled against
 *   subscriptions.
 *
 * RULES:
 * - `deps.store` is the sync transaction.
 * - Upsert by Spond transaction id; the member is resolved by Spond member id
 *   and left null when that member has not been synced yet.
 */

import type { Logger } from '../../../shared/logger/logger';
import type { RecordStore } from '../../../shared/db/record-store';
import type { JsonObject } from '../../../shared/db/schema';

import { getSpondMemberBySpondId } from '../dal/spond.query-sql';
import type { SpondRepo } from '../dal/spond.repo';
import { normalizeTransaction } from '../helpers/spond-payload';
import type { SyncTransactionsResult } from '../spond.types';

export async function syncTransactionsFlow(
  deps: { store: RecordStore; logger: Logger; spondRepo: SpondRepo },
  params: { transactions: JsonObject[]; pages: number },
): Promise<SyncTransactionsResult> {
  const flow = 'spond.sync_transactions';
  deps.logger.info({ msg: `${flow}.start`, flow, fetched: params.transactions.length, pages: params.pages });

  const repo = deps.spondRepo.withStore(deps.store);
  const counts = { created: 0, updated: 0, unchanged: 0 };

  for (const raw of params.transactions) {
    const txn = normalizeTransaction(raw);
    if (!txn) continue;

    const member = txn.spondMemberId ? await getSpondMemberBySpondId(deps.store, txn.spondMemberId) : null;
    const outcome = await repo.upsertTransaction(txn, member?.id ?? null);
    counts[outcome] += 1;
  }

  const message = `Synced transactions: +${counts.created}, updated ${counts.updated}, unchanged ${counts.unchanged}`;
  deps.logger.info({ msg: `${flow}.success`, flow, ...counts });

  return { ...counts, pages: params.pages, message };
}
