/**
 * backend/src/modules/spond/spond.constants.ts
 */

/** Member search returns at most this many rows. */
export const SPOND_SEARCH_LIMIT = 25;
export const SPOND_SEARCH_WINDOW_SECONDS = 60;

export const SPOND_REQUEST_TIMEOUT_MS = 30_000;

export const SPOND_TRANSACTIONS = {
  pageSize: 100,
  maxPages: 50,
  /** First sync (nothing stored yet) looks this far back. */
  initialLookbackDays: 30,
} as const;
