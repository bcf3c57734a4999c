import type { EventRecord } from './event.js';

/** Records and running total read under a single guard. */
export interface LedgerView {
  readonly records: readonly EventRecord[];
  readonly total: number;
}

/**
 * Append-only store of event records plus a running total of their
 * quantities.
 *
 * Invariant: `total` always equals the sum of `quantity` over the
 * stored records, at every point a caller can observe. Backends
 * guarantee this by running each append (push + increment) and each
 * read as one indivisible step.
 *
 * The store keeps every record for its whole lifetime; there is no
 * eviction, so memory grows with the number of events.
 */
export interface EventLedger {
  /**
   * Appends a fully constructed record and returns the new total.
   * Rejects with `InvalidQuantityError` for a quantity that is not a
   * positive integer; such a record is never stored.
   */
  append(record: EventRecord): Promise<number>;

  /** Current running total (sum of quantities, not record count). */
  total(): Promise<number>;

  /** Copy of all records in arrival order. */
  snapshot(): Promise<readonly EventRecord[]>;

  /** Records and total taken together, consistent with each other. */
  read(): Promise<LedgerView>;

  /** Releases any connection held by the backend. */
  close(): Promise<void>;
}
