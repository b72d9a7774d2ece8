/**
 * Injection token for the ioredis connection used as the job ledger's
 * key-value store.
 */
export const REDIS_CLIENT = 'REDIS_CLIENT';
