import { Redis } from 'ioredis';
import type { Logger } from 'pino';

/**
 * Opens the ioredis connection used by the shared ledger.
 *
 * `lazyConnect` lets startup await the connection and fail fast
 * when Redis is unreachable, instead of queueing appends.
 */
export async function connectRedis(
  url: string,
  log: Logger,
): Promise<Redis> {
  const redis = new Redis(url, {
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  await redis.connect();
  log.info('Redis connected');

  return redis;
}
