import type { Redis } from 'ioredis';
import type { EventLedger, EventRecord, LedgerView } from '../../domain/index.js';
import { assertValidQuantity, InvalidRecordError, LedgerReadError } from '../../domain/index.js';
import { eventRecordSchema } from '../../application/event-schema.js';

/**
 * RPUSH + INCRBY in one script. Redis runs scripts atomically, so no
 * other client sees the new record without its increment.
 *
 * KEYS[1] = record list, KEYS[2] = total counter
 * ARGV[1] = serialized record, ARGV[2] = quantity
 */
export const APPEND_SCRIPT = `
redis.call('RPUSH', KEYS[1], ARGV[1])
return redis.call('INCRBY', KEYS[2], ARGV[2])
`;

export interface RedisLedgerKeys {
  readonly records: string;
  readonly total: string;
}

export function ledgerKeys(prefix: string): RedisLedgerKeys {
  return {
    records: `${prefix}:records`,
    total: `${prefix}:total`,
  };
}

/**
 * Ledger shared by every worker process through one Redis instance.
 *
 * Redis is the single owner of the ledger state; workers hold no copy.
 * Appends go through `APPEND_SCRIPT`, reads through a MULTI
 * transaction, so each worker observes the same consistent sequence
 * and total.
 *
 * Records are stored as JSON in a list; like the in-memory backend,
 * nothing is ever trimmed.
 */
export class RedisLedger implements EventLedger {
  private readonly keys: RedisLedgerKeys;

  constructor(
    private readonly redis: Redis,
    prefix: string = 'ledger',
  ) {
    this.keys = ledgerKeys(prefix);
  }

  async append(record: EventRecord): Promise<number> {
    assertValidQuantity(record.quantity);

    // Anything written must pass the shape check applied on read.
    const checked = eventRecordSchema.safeParse(record);
    if (!checked.success) {
      const fields = checked.error.issues.map((issue) => issue.path.join('.')).join(', ');
      throw new InvalidRecordError(`Record cannot be stored, invalid field(s): ${fields}`, {
        cause: checked.error,
      });
    }

    const result = await this.redis.eval(
      APPEND_SCRIPT,
      2,
      this.keys.records,
      this.keys.total,
      JSON.stringify(record),
      record.quantity,
    );

    return parseTotal(result);
  }

  async total(): Promise<number> {
    return parseTotal(await this.redis.get(this.keys.total));
  }

  async snapshot(): Promise<readonly EventRecord[]> {
    const view = await this.read();
    return view.records;
  }

  async read(): Promise<LedgerView> {
    const replies = await this.redis
      .multi()
      .lrange(this.keys.records, 0, -1)
      .get(this.keys.total)
      .exec();

    if (replies === null) {
      throw new LedgerReadError('Ledger read transaction was aborted');
    }

    const [rangeReply, totalReply] = replies;
    if (rangeReply === undefined || totalReply === undefined) {
      throw new LedgerReadError(`Expected 2 transaction replies, got ${replies.length}`);
    }

    const [rangeErr, rawRecords] = rangeReply;
    if (rangeErr) throw new LedgerReadError('LRANGE failed', { cause: rangeErr });
    const [totalErr, rawTotal] = totalReply;
    if (totalErr) throw new LedgerReadError('GET failed', { cause: totalErr });

    if (!Array.isArray(rawRecords)) {
      throw new LedgerReadError('LRANGE did not return a list');
    }

    return {
      records: rawRecords.map(parseRecord),
      total: parseTotal(rawTotal),
    };
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}

/**
 * Redis returns the counter as an integer from INCRBY, as a string
 * from GET, and `null` before the first append.
 */
function parseTotal(raw: unknown): number {
  if (raw === null) return 0;
  const n = typeof raw === 'number' ? raw : Number(raw);
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new LedgerReadError(`Ledger total is not a non-negative integer: ${String(raw)}`);
  }
  return n;
}

function parseRecord(raw: unknown): EventRecord {
  if (typeof raw !== 'string') {
    throw new LedgerReadError('Ledger entry is not a string');
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err: unknown) {
    throw new LedgerReadError('Ledger entry is not valid JSON', { cause: err });
  }

  const parsed = eventRecordSchema.safeParse(json);
  if (!parsed.success) {
    throw new LedgerReadError('Ledger entry does not match the record shape', {
      cause: parsed.error,
    });
  }
  return parsed.data;
}
