/**
 * backend/src/shared/cache/cache.ts
 *
 * WHY:
 * - Two pieces of short-lived shared state must survive across processes: the
 *   search rate-limit counters and the scheduler's run-slot claims.
 * - Redis in deployments, a Map in tests and single-process dev.
 *
 * HOW TO USE:
 * - cache.incr(key, { ttlSeconds })  -> fixed-window counter
 * - cache.claim(key, { ttlSeconds }) -> true for exactly one caller per key and TTL
 */

export type CacheTtl = { ttlSeconds: number };

export interface Cache {
  /**
   * Increments a counter and returns the new value. The TTL is only applied when
   * the key has none, so the window starts at the first hit.
   */
  incr(key: string, opts: CacheTtl): Promise<number>;

  /** Sets the key if it does not exist. Returns whether this call set it. */
  claim(key: string, opts: CacheTtl): Promise<boolean>;
}
