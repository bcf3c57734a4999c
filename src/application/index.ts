export {
  visitSchema,
  buySchema,
  eventRecordSchema,
  createStatsQuerySchema,
  DEFAULT_WINDOW_BOUNDS,
} from './event-schema.js';
export type { VisitInput, BuyInput, StatsQuery, WindowBounds } from './event-schema.js';
export { WindowQueryEngine, countRecordsWithin } from './window-query.js';
export type { WindowQueryResult } from './window-query.js';
export { recordVisit, recordBuy, buildVisitRecord, buildBuyRecord } from './ingest.js';
export type { RequestOrigin } from './ingest.js';
export { getStats, formatUptime, uptimeSeconds } from './stats.js';
export type { StatsResult } from './stats.js';
