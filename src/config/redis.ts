/**
 * Redis Client Configuration
 *
 * Shared Redis client for the distributed token-bucket store.
 */

import Redis from 'ioredis';
import { config } from './index';
import { createServiceLogger } from '../observability/logger';

const log = createServiceLogger('redis');

let redisClient: Redis | null = null;

/**
 * Get or create Redis client singleton
 */
export const getRedisClient = (): Redis => {
  if (!redisClient) {
    redisClient = new Redis({
      host: config.redis.host,
      port: config.redis.port,
      password: config.redis.password,
      keyPrefix: config.redis.keyPrefix,
      connectTimeout: config.redis.connectTimeout,
      maxRetriesPerRequest: config.redis.maxRetriesPerRequest,
      retryStrategy: (times: number) => {
        if (times > 3) {
          return null;
        }
        return Math.min(times * 100, 3000);
      },
      lazyConnect: true,
    });

    redisClient.on('error', (err) => {
      log.error({ err }, 'Redis client error');
    });

    redisClient.on('connect', () => {
      log.info('Redis client connected');
    });
  }

  return redisClient;
};

export const connectRedis = async (): Promise<void> => {
  const client = getRedisClient();
  if (client.status === 'ready') {
    return;
  }
  await client.connect();
};

export const disconnectRedis = async (): Promise<void> => {
  if (redisClient) {
    await redisClient.quit();
    redisClient = null;
  }
};

/**
 * Connected, or null when Redis is not in use
 */
export const isRedisConnected = (): boolean | null => {
  if (!redisClient) return null;
  return redisClient.status === 'ready';
};
