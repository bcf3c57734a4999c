import type { Logger } from 'pino';
import type { EventLedger } from '../domain/index.js';
import type { AppConfig } from '../config.js';
import { InMemoryLedger } from './memory/index.js';
import { connectRedis, RedisLedger } from './redis/index.js';

/**
 * Builds the ledger selected by `LEDGER_BACKEND`.
 *
 * Called once per process at startup; the result is handed to
 * `buildApp` and owned by the Fastify instance from then on.
 */
export async function createLedger(
  config: Pick<AppConfig, 'LEDGER_BACKEND' | 'REDIS_URL' | 'LEDGER_KEY_PREFIX'>,
  log: Logger,
): Promise<EventLedger> {
  switch (config.LEDGER_BACKEND) {
    case 'memory':
      log.info('Using in-memory ledger (single process, no persistence)');
      return new InMemoryLedger();
    case 'redis': {
      const redis = await connectRedis(config.REDIS_URL, log);
      log.info({ prefix: config.LEDGER_KEY_PREFIX }, 'Using Redis ledger');
      return new RedisLedger(redis, config.LEDGER_KEY_PREFIX);
    }
  }
}
