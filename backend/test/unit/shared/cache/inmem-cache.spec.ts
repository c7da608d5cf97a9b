import { InMemCache } from '../../../../src/shared/cache/inmem-cache';

describe('InMemCache', () => {
  it('keeps the first TTL when incr is called again', async () => {
    let nowMs = 0;
    const cache = new InMemCache(() => nowMs);

    expect(await cache.incr('n', { ttlSeconds: 10 })).toBe(1);
    nowMs = 9_000;
    expect(await cache.incr('n', { ttlSeconds: 10 })).toBe(2);

    nowMs = 10_000;
    expect(await cache.incr('n', { ttlSeconds: 10 })).toBe(1);
  });

  it('lets one caller claim a key until it expires', async () => {
    let nowMs = 1_000;
    const cache = new InMemCache(() => nowMs);

    expect(await cache.claim('slot', { ttlSeconds: 10 })).toBe(true);
    expect(await cache.claim('slot', { ttlSeconds: 10 })).toBe(false);

    nowMs = 11_000;
    expect(await cache.claim('slot', { ttlSeconds: 10 })).toBe(true);
  });

  it('treats a counted key as claimed', async () => {
    const cache = new InMemCache(() => 0);
    await cache.incr('k', { ttlSeconds: 60 });

    expect(await cache.claim('k', { ttlSeconds: 60 })).toBe(false);
  });
});
