/**
 * Domain errors raised by ledger backends.
 *
 * Each carries a stable `code` so the HTTP layer can map it to a
 * status without string-matching messages.
 */

export class InvalidQuantityError extends Error {
  readonly code = 'INVALID_QUANTITY';

  constructor(readonly quantity: number) {
    super(`Quantity must be a positive integer, got ${String(quantity)}`);
    this.name = 'InvalidQuantityError';
  }
}

/** A record the backing store cannot persist in a form it reads back. */
export class InvalidRecordError extends Error {
  readonly code = 'INVALID_RECORD';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InvalidRecordError';
  }
}

/** The backing store returned something that is not a valid ledger state. */
export class LedgerReadError extends Error {
  readonly code = 'LEDGER_READ_FAILED';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LedgerReadError';
  }
}

/** Throws `InvalidQuantityError` unless `quantity` is a positive safe integer. */
export function assertValidQuantity(quantity: number): void {
  if (!Number.isSafeInteger(quantity) || quantity < 1) {
    throw new InvalidQuantityError(quantity);
  }
}
