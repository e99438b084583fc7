import { Redis } from 'ioredis';
import type { OperationOptions } from '../../types/index.js';
import type { EphemeralStore } from '../interfaces/ephemeral-store.js';
import type { Logger } from '../../logging/logger.js';
import { runQuery } from '../query.js';

/**
 * Redis-backed ephemeral store
 *
 * `setIfAbsent` is a single `SET key value PX ttl NX`, which Redis applies
 * atomically.
 */
export class RedisEphemeralStore implements EphemeralStore {
  constructor(private readonly redis: Redis) {}

  async setIfAbsent(
    key: string,
    value: string,
    ttlMs: number,
    options?: OperationOptions
  ): Promise<boolean> {
    const reply = await runQuery('ephemeral.setIfAbsent', options, () =>
      this.redis.set(key, value, 'PX', Math.max(Math.ceil(ttlMs), 1), 'NX')
    );
    return reply === 'OK';
  }

  async set(key: string, value: string, ttlMs: number, options?: OperationOptions): Promise<void> {
    await runQuery('ephemeral.set', options, () =>
      this.redis.set(key, value, 'PX', Math.max(Math.ceil(ttlMs), 1))
    );
  }

  async get(key: string, options?: OperationOptions): Promise<string | null> {
    return runQuery('ephemeral.get', options, () => this.redis.get(key));
  }

  async delete(key: string, options?: OperationOptions): Promise<void> {
    await runQuery('ephemeral.delete', options, () => this.redis.del(key));
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}

/**
 * Connect to Redis and wrap the client as an ephemeral store
 */
export function createRedisEphemeralStore(url: string, logger: Logger): RedisEphemeralStore {
  const redis = new Redis(url, {
    // Fail commands fast instead of queueing them while disconnected
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
  });

  redis.on('error', (error: unknown) => {
    logger.warn('Redis connection error', { op: 'redis.connection', error });
  });

  return new RedisEphemeralStore(redis);
}
