import type { BuyRecord, VisitRecord } from '../src/domain/index.js';

let counter = 0;

/** Fixed "now" for deterministic window tests. */
export const FIXED_NOW = new Date('2026-02-18T12:00:00Z');

/** ISO timestamp `minutes` before `now`. */
export function minutesBefore(now: Date, minutes: number): string {
  return new Date(now.getTime() - minutes * 60_000).toISOString();
}

/**
 * Factories for test records with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeVisit(overrides: Partial<VisitRecord> = {}): VisitRecord {
  counter++;
  return {
    kind: 'visit',
    subject_id: overrides.subject_id ?? counter,
    page_url: overrides.page_url ?? '/home',
    ip_address: overrides.ip_address ?? '203.0.113.10',
    quantity: overrides.quantity ?? 1,
    timestamp: overrides.timestamp ?? FIXED_NOW.toISOString(),
  };
}

export function makeBuy(overrides: Partial<BuyRecord> = {}): BuyRecord {
  counter++;
  return {
    kind: 'buy',
    subject_id: overrides.subject_id ?? counter,
    promotion_id: overrides.promotion_id ?? 7,
    product_id: overrides.product_id ?? 42,
    ip_address: overrides.ip_address ?? '203.0.113.10',
    quantity: overrides.quantity ?? 1,
    timestamp: overrides.timestamp ?? FIXED_NOW.toISOString(),
  };
}
