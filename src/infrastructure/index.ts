export { default as ledgerPlugin } from './ledger-plugin.js';
export type { LedgerPluginOptions } from './ledger-plugin.js';
export { createLedger } from './ledger-factory.js';
export { InMemoryLedger } from './memory/index.js';
export { connectRedis, RedisLedger, APPEND_SCRIPT, ledgerKeys } from './redis/index.js';
export type { RedisLedgerKeys } from './redis/index.js';
