/**
 * backend/src/shared/cache/redis-cache.ts
 *
 * WHY:
 * - Redis implementation of Cache, shared by the web process and every worker.
 *
 * IMPORTANT:
 * - The client type is derived from createClient(): importing RedisClientType breaks
 *   when two copies of @redis/client end up installed.
 * - incr + expire is two round trips; a crash between them leaves a counter without
 *   TTL, which the next incr repairs.
 */

import { createClient } from 'redis';

import { logger } from '../logger/logger';
import type { Cache, CacheTtl } from './cache';

type RedisClient = ReturnType<typeof createClient>;

export class RedisCache implements Cache {
  private constructor(private readonly client: RedisClient) {}

  static async connect(redisUrl: string): Promise<RedisCache> {
    const client = createClient({ url: redisUrl });

    // Fires outside any request or flow.
    client.on('error', (err: Error) => {
      logger.error('redis.client_error', { flow: 'redis', message: err.message, stack: err.stack });
    });

    await client.connect();
    return new RedisCache(client);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  async incr(key: string, opts: CacheTtl): Promise<number> {
    const value = await this.client.incr(key);
    if ((await this.client.ttl(key)) < 0) {
      await this.client.expire(key, opts.ttlSeconds);
    }
    return value;
  }

  async claim(key: string, opts: CacheTtl): Promise<boolean> {
    const reply = await this.client.set(key, '1', { NX: true, EX: opts.ttlSeconds });
    return reply === 'OK';
  }
}
