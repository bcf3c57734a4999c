import { describe, it, expect } from 'vitest';
import { buildBuyRecord, buildVisitRecord, recordBuy, recordVisit } from '../../src/application/ingest.js';
import { InMemoryLedger } from '../../src/infrastructure/memory/in-memory-ledger.js';
import { FIXED_NOW } from '../helpers.js';

const origin = { ip_address: '198.51.100.4', generated_at: FIXED_NOW };

describe('buildVisitRecord', () => {
  it('always uses a quantity of 1', () => {
    expect(buildVisitRecord({ user_id: 12, page_url: '/cart' }, origin)).toEqual({
      kind: 'visit',
      subject_id: 12,
      page_url: '/cart',
      ip_address: '198.51.100.4',
      quantity: 1,
      timestamp: '2026-02-18T12:00:00.000Z',
    });
  });
});

describe('buildBuyRecord', () => {
  it('takes its quantity from product_quantity', () => {
    const record = buildBuyRecord(
      { user_id: 'u-1', promotion_id: 3, product_id: 99, product_quantity: 5 },
      origin,
    );

    expect(record).toEqual({
      kind: 'buy',
      subject_id: 'u-1',
      promotion_id: 3,
      product_id: 99,
      ip_address: '198.51.100.4',
      quantity: 5,
      timestamp: '2026-02-18T12:00:00.000Z',
    });
  });
});

describe('recordVisit / recordBuy', () => {
  it('append to the ledger and return the running total', async () => {
    const ledger = new InMemoryLedger();

    expect(await recordVisit(ledger, { user_id: 1, page_url: '/' }, origin)).toBe(1);
    expect(
      await recordBuy(ledger, { user_id: 1, promotion_id: 2, product_id: 3, product_quantity: 4 }, origin),
    ).toBe(5);
    expect(ledger.size).toBe(2);
  });
});
