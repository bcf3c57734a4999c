import type { EventLedger, EventRecord } from '../domain/index.js';

const MS_PER_HOUR = 3_600_000;

export interface WindowQueryResult {
  running_total: number;
  count_within_window: number;
}

/**
 * Counts records whose timestamp lies within `hours` before `nowMs`.
 *
 * A record is included when `nowMs - timestamp <= hours * 1h`. The
 * scan is linear and compares every stored timestamp, so arrival
 * order does not matter. Records dated after `nowMs` (client clock
 * skew) have a negative elapsed time and are always included.
 */
export function countRecordsWithin(
  records: readonly EventRecord[],
  hours: number,
  nowMs: number,
): number {
  const windowMs = hours * MS_PER_HOUR;
  let count = 0;

  for (const record of records) {
    const elapsedMs = nowMs - Date.parse(record.timestamp);
    if (elapsedMs <= windowMs) count++;
  }

  return count;
}

/**
 * Answers "how many events in the last N hours" over a ledger.
 *
 * Each call takes a fresh snapshot and scans it in full; there is no
 * index. The range of `hours` is validated by callers, the engine
 * itself accepts any positive value.
 */
export class WindowQueryEngine {
  constructor(private readonly ledger: EventLedger) {}

  async countWithin(hours: number, now: Date = new Date()): Promise<number> {
    const records = await this.ledger.snapshot();
    return countRecordsWithin(records, hours, now.getTime());
  }

  /**
   * Running total and window count from one consistent ledger view,
   * so both numbers describe the same set of appends.
   */
  async query(hours: number, now: Date = new Date()): Promise<WindowQueryResult> {
    const { records, total } = await this.ledger.read();
    return {
      running_total: total,
      count_within_window: countRecordsWithin(records, hours, now.getTime()),
    };
  }
}
