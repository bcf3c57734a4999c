import type { BuyRecord, EventLedger, VisitRecord } from '../domain/index.js';
import type { BuyInput, VisitInput } from './event-schema.js';

/** Values the HTTP layer derives from the request itself. */
export interface RequestOrigin {
  ip_address: string;
  generated_at: Date;
}

export function buildVisitRecord(input: VisitInput, origin: RequestOrigin): VisitRecord {
  return {
    kind: 'visit',
    subject_id: input.user_id,
    page_url: input.page_url,
    ip_address: origin.ip_address,
    quantity: 1,
    timestamp: origin.generated_at.toISOString(),
  };
}

export function buildBuyRecord(input: BuyInput, origin: RequestOrigin): BuyRecord {
  return {
    kind: 'buy',
    subject_id: input.user_id,
    promotion_id: input.promotion_id,
    product_id: input.product_id,
    ip_address: origin.ip_address,
    quantity: input.product_quantity,
    timestamp: origin.generated_at.toISOString(),
  };
}

/**
 * Use case: record a page visit.
 * Returns the ledger's running total after the append.
 */
export async function recordVisit(
  ledger: EventLedger,
  input: VisitInput,
  origin: RequestOrigin,
): Promise<number> {
  return ledger.append(buildVisitRecord(input, origin));
}

/**
 * Use case: record a purchase of `product_quantity` units.
 * Returns the ledger's running total after the append.
 */
export async function recordBuy(
  ledger: EventLedger,
  input: BuyInput,
  origin: RequestOrigin,
): Promise<number> {
  return ledger.append(buildBuyRecord(input, origin));
}
