/**
 * config/redis.ts — Redis connection via ioredis
 *
 * Used for: the views cache and the BullMQ ingestion queue.
 * Auto-reconnects with exponential backoff.
 */
import Redis, { type RedisOptions } from 'ioredis';
import { env } from './env.ts';
import { childLogger } from '../shared/logger.ts';

const log = childLogger({ module: 'redis' });

let redis: Redis | null = null;

/**
 * Get or create Redis client. Safe to call multiple times.
 */
export function getRedis(): Redis {
  if (redis) return redis;

  redis = new Redis(env.REDIS_URL, {
    keyPrefix: env.REDIS_KEY_PREFIX,
    maxRetriesPerRequest: 3,
    retryStrategy: (times: number) => {
      if (times > 10) return null; // Stop after 10 retries
      return Math.min(times * 200, 5000); // Exponential backoff, max 5s
    },
    lazyConnect: true,
    enableReadyCheck: true,
  });

  redis.on('error', (err: Error) => log.error({ err }, 'Redis connection error'));
  redis.on('ready', () => log.info('Redis ready'));

  return redis;
}

/**
 * Connection options for BullMQ, which needs its own connections without the
 * key prefix and with maxRetriesPerRequest disabled.
 */
export function queueConnection(): RedisOptions {
  const url = new URL(env.REDIS_URL);
  const db = url.pathname.length > 1 ? Number(url.pathname.slice(1)) : 0;
  return {
    host: url.hostname,
    port: url.port ? Number(url.port) : 6379,
    username: url.username ? decodeURIComponent(url.username) : undefined,
    password: url.password ? decodeURIComponent(url.password) : undefined,
    db: Number.isInteger(db) ? db : 0,
    tls: url.protocol === 'rediss:' ? {} : undefined,
    maxRetriesPerRequest: null,
  };
}

/**
 * Check Redis connectivity. Returns latency in ms.
 */
export async function pingRedis(): Promise<number> {
  const start = Date.now();
  await getRedis().ping();
  return Date.now() - start;
}

/**
 * Gracefully close Redis. Call on shutdown.
 */
export async function closeRedis(): Promise<void> {
  if (redis) {
    await redis.quit();
    redis = null;
    log.info('Redis connection closed');
  }
}
