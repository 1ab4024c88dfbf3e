/**
 * ioredis client factory for the failover journal.
 */

import Redis from 'ioredis';
import type { RedisOptions } from 'ioredis';
import { createLogger } from '../logging';
import type { ServiceLogger } from '../logging';

export interface RedisClientDeps {
  logger?: ServiceLogger;
  /** Injected constructor, used by tests */
  RedisImpl?: new (url: string, options: RedisOptions) => Redis;
}

export function createRedisClient(url: string, deps: RedisClientDeps = {}): Redis {
  const logger = deps.logger ?? createLogger('redis-client');
  const RedisImpl = deps.RedisImpl ?? Redis;

  const client = new RedisImpl(url, {
    retryStrategy: (times: number) => {
      if (times > 3) {
        logger.error('Redis connection failed after 3 retries');
        return null;
      }
      return Math.min(times * 100, 3000);
    },
    maxRetriesPerRequest: 3,
    enableReadyCheck: false,
    lazyConnect: true
  });

  client.on('error', (err: Error) => {
    logger.error('Redis client error', { error: err.message });
  });
  client.on('connect', () => {
    logger.info('Redis client connected');
  });

  return client;
}
