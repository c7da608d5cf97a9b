/**
 * backend/src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Lets tests (and local dev without REDIS_URL) run without external infra.
 * - Only safe within one process: two workers on InMemCache can both claim a slot.
 *
 * HOW TO USE:
 * - const cache = new InMemCache()
 * - Tests may pass a clock: new InMemCache(() => fixedNow.getTime())
 */

import type { Cache, CacheTtl } from './cache';

type Entry = { count: number; expiresAtMs: number };

export class InMemCache implements Cache {
  private readonly entries = new Map<string, Entry>();

  constructor(private readonly now: () => number = Date.now) {}

  private live(key: string): Entry | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAtMs <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  async incr(key: string, opts: CacheTtl): Promise<number> {
    const entry = this.live(key) ?? { count: 0, expiresAtMs: this.now() + opts.ttlSeconds * 1000 };
    entry.count += 1;
    this.entries.set(key, entry);
    return entry.count;
  }

  async claim(key: string, opts: CacheTtl): Promise<boolean> {
    if (this.live(key)) return false;
    this.entries.set(key, { count: 1, expiresAtMs: this.now() + opts.ttlSeconds * 1000 });
    return true;
  }
}
