/**
 * backend/src/modules/spond/client/spond-api.ts
 *
 * WHY:
 * - Sync flows depend on this port, never on HTTP. Tests pass a fake.
 *
 * RULES:
 * - Payloads are JSON objects as Spond sent them; mapping to our columns happens
 *   in helpers/spond-payload.ts.
 */

import type { JsonObject } from '../../../shared/db/schema';

export type TransactionPage = {
  results: JsonObject[];
  /** Next-page cursor/URL when the API reports one; null on the last page. */
  next: string | null;
};

export interface SpondApi {
  getGroups(): Promise<JsonObject[]>;
  getEvents(range: { start: Date; end: Date }): Promise<JsonObject[]>;
  listTransactions(params: { since?: Date; until?: Date; page: number; pageSize: number }): Promise<TransactionPage>;
}

export class SpondApiError extends Error {
  constructor(
    message: string,
    public readonly status: number | null,
    public readonly path: string,
  ) {
    super(message);
    this.name = 'SpondApiError';
  }
}
