/**
 * @serialvault/redis
 *
 * Shared Redis key-value infrastructure.
 *
 * Exports:
 *   - RedisModule.forRoot()  — import into any NestJS module
 *   - RedisKeyValueStore     — get(key) / put(key, value)
 *   - REDIS_CLIENT           — ioredis injection token
 */
export { RedisModule } from './redis.module';
export { RedisKeyValueStore } from './redis-kv-store.service';
export { REDIS_CLIENT } from './redis.constants';
