import { Injectable, Inject, Logger, OnModuleDestroy } from '@nestjs/common';
import Redis from 'ioredis';
import { REDIS_CLIENT } from './redis.constants';

/**
 * RedisKeyValueStore — thin get/put wrapper around an ioredis connection.
 *
 * Semantics:
 * - get() resolves to null when the key does not exist; every other
 *   failure (connection refused, auth, timeout) rejects
 * - put() overwrites unconditionally. Redis SET has no read-modify-write
 *   guard here, so callers layering a claim protocol on top inherit a
 *   check-then-write race
 */
@Injectable()
export class RedisKeyValueStore implements OnModuleDestroy {
  private readonly logger = new Logger(RedisKeyValueStore.name);

  constructor(
    @Inject(REDIS_CLIENT)
    private readonly client: Redis,
  ) {}

  async get(key: string): Promise<string | null> {
    const value = await this.client.get(key);
    this.logger.debug(`GET "${key}" → ${value === null ? 'miss' : 'hit'}`);
    return value;
  }

  async put(key: string, value: string): Promise<void> {
    await this.client.set(key, value);
    this.logger.debug(`SET "${key}" (${value.length} bytes)`);
  }

  async onModuleDestroy(): Promise<void> {
    // A lazy connection that was never used has nothing to QUIT
    if (this.client.status === 'wait') {
      this.client.disconnect();
      return;
    }
    this.logger.log('Closing Redis connection');
    await this.client.quit();
  }
}
