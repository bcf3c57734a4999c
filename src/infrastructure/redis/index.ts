export { connectRedis } from './client.js';
export { RedisLedger, APPEND_SCRIPT, ledgerKeys } from './redis-ledger.js';
export type { RedisLedgerKeys } from './redis-ledger.js';
