/**
 * backend/src/shared/security/rate-limit.ts
 *
 * WHY:
 * - The member search endpoint is a cheap way to enumerate synced Spond members,
 *   so it is capped per client IP.
 *
 * HOW TO USE:
 * - const limiter = new RateLimiter(cache, { prefix: 'rl' })
 * - await limiter.hitOrThrow({ key: `spond-search:ip:${ip}`, limit: 60, windowSeconds: 60 })
 *
 * RULES:
 * - Fixed window: the first hit starts it, the counter resets when it expires.
 * - Count first, then compare, so concurrent hits cannot both slip under the limit.
 * - Whether limiting is on is decided by the composition root (`disabled`).
 */

import type { Cache } from '../cache/cache';

export class RateLimitError extends Error {
  constructor(
    public readonly key: string,
    public readonly limit: number,
    /** Upper bound on how long the caller has to wait; sent as Retry-After. */
    public readonly retryAfterSeconds: number,
  ) {
    super('Rate limit exceeded');
    this.name = 'RateLimitError';
  }
}

export type RateLimitHit = {
  key: string;
  limit: number;
  windowSeconds: number;
};

export class RateLimiter {
  private readonly prefix: string | null;
  private readonly disabled: boolean;

  constructor(
    private readonly cache: Cache,
    opts: { prefix?: string; disabled?: boolean } = {},
  ) {
    this.prefix = opts.prefix ?? null;
    this.disabled = opts.disabled ?? false;
  }

  async hitOrThrow(hit: RateLimitHit): Promise<void> {
    if (this.disabled) return;

    const key = this.prefix ? `${this.prefix}:${hit.key}` : hit.key;
    const count = await this.cache.incr(key, { ttlSeconds: hit.windowSeconds });

    if (count > hit.limit) throw new RateLimitError(key, hit.limit, hit.windowSeconds);
  }
}
