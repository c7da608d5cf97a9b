/**
 * backend/src/modules/spond/helpers/fetch-transaction-pages.ts
 *
 * Pages through /transactions until an empty page, a page without `next`, or
 * the page cap.
 */

import type { JsonObject } from '../../../shared/db/schema';
import type { SpondApi } from '../client/spond-api';

export async function fetchTransactionPages(
  api: SpondApi,
  params: { since: Date; until: Date; pageSize: number; maxPages: number },
): Promise<{ transactions: JsonObject[]; pages: number }> {
  const transactions: JsonObject[] = [];
  let pages = 0;

  for (let page = 1; page <= params.maxPages; page += 1) {
    const result = await api.listTransactions({
      since: params.since,
      until: params.until,
      page,
      pageSize: params.pageSize,
    });
    pages += 1;
    transactions.push(...result.results);

    if (result.results.length === 0 || result.next === null) break;
  }

  return { transactions, pages };
}
