/** Injection token for the shared ioredis client, `null` when Redis is not configured. */
export const REDIS_CLIENT = Symbol('REDIS_CLIENT');
