export { createRedisClient } from './client';
export type { RedisClientDeps } from './client';
