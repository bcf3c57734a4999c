import type { EventLedger, EventRecord, LedgerView } from '../../domain/index.js';
import { assertValidQuantity } from '../../domain/index.js';

/**
 * Process-local ledger.
 *
 * Every method body is synchronous up to its return: there is no
 * `await` between pushing a record and incrementing the total, or
 * between reading the two. Node.js runs each of these critical
 * sections to completion on the event loop, so concurrent callers
 * always observe a fully applied append, never a torn one.
 *
 * Only valid for a single process. A worker pool needs a shared
 * backend (see RedisLedger), otherwise each worker keeps its own
 * disjoint ledger.
 */
export class InMemoryLedger implements EventLedger {
  private readonly records: EventRecord[] = [];
  private runningTotal = 0;

  constructor(initial: readonly EventRecord[] = []) {
    for (const record of initial) {
      this.commit(record);
    }
  }

  async append(record: EventRecord): Promise<number> {
    return this.commit(record);
  }

  async total(): Promise<number> {
    return this.runningTotal;
  }

  async snapshot(): Promise<readonly EventRecord[]> {
    return [...this.records];
  }

  async read(): Promise<LedgerView> {
    return { records: [...this.records], total: this.runningTotal };
  }

  async close(): Promise<void> {
    // Nothing to release.
  }

  /** Number of stored records. */
  get size(): number {
    return this.records.length;
  }

  private commit(record: EventRecord): number {
    assertValidQuantity(record.quantity);
    this.records.push(Object.freeze({ ...record }));
    this.runningTotal += record.quantity;
    return this.runningTotal;
  }
}
