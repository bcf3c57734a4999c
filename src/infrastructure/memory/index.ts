export { InMemoryLedger } from './in-memory-ledger.js';
