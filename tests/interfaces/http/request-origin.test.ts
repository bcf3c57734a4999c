import { describe, it, expect } from 'vitest';
import {
  extractClientIp,
  extractGenerationTime,
  isPrivateIp,
} from '../../../src/interfaces/http/request-origin.js';

const RECEIVED_AT = new Date('2026-02-18T12:00:00Z');
const HALF_PAST_ELEVEN_MS = 1_771_414_200_000; // 2026-02-18T11:30:00Z

// ── isPrivateIp ──────────────────────────────────────────

describe('isPrivateIp', () => {
  it.each(['127.0.0.1', '10.1.2.3', '192.168.0.5', '172.16.0.1', '169.254.1.1', 'localhost', '::1', '0.0.0.0'])(
    'treats %s as private',
    (ip) => {
      expect(isPrivateIp(ip)).toBe(true);
    },
  );

  it.each(['203.0.113.7', '8.8.8.8', '2001:db8::1'])('treats %s as public', (ip) => {
    expect(isPrivateIp(ip)).toBe(false);
  });
});

// ── extractClientIp ──────────────────────────────────────

describe('extractClientIp', () => {
  it('takes the first public address from x-forwarded-for', () => {
    const headers = { 'x-forwarded-for': '10.0.0.1, 203.0.113.7, 198.51.100.2' };
    expect(extractClientIp(headers, '127.0.0.1')).toBe('203.0.113.7');
  });

  it('falls through to later headers when earlier ones hold only private addresses', () => {
    const headers = { 'x-forwarded-for': '10.0.0.1', 'x-real-ip': '198.51.100.9' };
    expect(extractClientIp(headers, '127.0.0.1')).toBe('198.51.100.9');
  });

  it('prefers x-forwarded-for over cf-connecting-ip', () => {
    const headers = { 'cf-connecting-ip': '198.51.100.1', 'x-forwarded-for': '203.0.113.3' };
    expect(extractClientIp(headers, undefined)).toBe('203.0.113.3');
  });

  it('uses the socket address when no header helps', () => {
    expect(extractClientIp({ 'x-real-ip': '192.168.1.1' }, '127.0.0.1')).toBe('127.0.0.1');
  });

  it('returns "unknown" with neither headers nor socket address', () => {
    expect(extractClientIp({}, undefined)).toBe('unknown');
  });

  it('joins repeated header values', () => {
    const headers = { 'x-client-ip': ['10.0.0.2', '203.0.113.50'] };
    expect(extractClientIp(headers, undefined)).toBe('203.0.113.50');
  });
});

// ── extractGenerationTime ────────────────────────────────

describe('extractGenerationTime', () => {
  it('parses an ISO-8601 client timestamp', () => {
    const at = extractGenerationTime({ 'x-timestamp': '2026-02-18T11:30:00Z' }, RECEIVED_AT);
    expect(at.getTime()).toBe(HALF_PAST_ELEVEN_MS);
  });

  it('honours an explicit offset', () => {
    const at = extractGenerationTime({ 'x-client-time': '2026-02-18T13:30:00+02:00' }, RECEIVED_AT);
    expect(at.getTime()).toBe(HALF_PAST_ELEVEN_MS);
  });

  it('parses Unix seconds', () => {
    const at = extractGenerationTime({ 'x-request-time': '1771414200' }, RECEIVED_AT);
    expect(at.getTime()).toBe(HALF_PAST_ELEVEN_MS);
  });

  it('parses Unix milliseconds', () => {
    const at = extractGenerationTime({ timestamp: '1771414200000' }, RECEIVED_AT);
    expect(at.getTime()).toBe(HALF_PAST_ELEVEN_MS);
  });

  it('skips an unparseable client header', () => {
    const headers = { 'x-timestamp': 'yesterday', 'x-client-time': '1771414200' };
    expect(extractGenerationTime(headers, RECEIVED_AT).getTime()).toBe(HALF_PAST_ELEVEN_MS);
  });

  it('reads proxy timestamps in microseconds', () => {
    const at = extractGenerationTime({ 'x-queue-start': '1771414200000000' }, RECEIVED_AT);
    expect(at.getTime()).toBe(HALF_PAST_ELEVEN_MS);
  });

  it('reads proxy timestamps in milliseconds', () => {
    const at = extractGenerationTime({ 'x-request-start': '1771414200000' }, RECEIVED_AT);
    expect(at.getTime()).toBe(HALF_PAST_ELEVEN_MS);
  });

  it('prefers client headers over proxy headers', () => {
    const headers = { 'x-request-start': '1771414200000', 'x-timestamp': '2026-02-18T11:45:00Z' };
    expect(extractGenerationTime(headers, RECEIVED_AT).toISOString()).toBe('2026-02-18T11:45:00.000Z');
  });

  it('falls back to the receive time', () => {
    expect(extractGenerationTime({ 'x-request-start': 't=abc' }, RECEIVED_AT)).toBe(RECEIVED_AT);
  });

  it('parses a date-only value as UTC midnight', () => {
    const at = extractGenerationTime({ 'x-timestamp': '2026-02-18' }, RECEIVED_AT);
    expect(at.toISOString()).toBe('2026-02-18T00:00:00.000Z');
  });

  it.each(['-1', 'Feb-18-2026', '2026/02/18 11:30', '18-02-2026T11:30'])(
    'ignores the non-ISO value %s',
    (value) => {
      expect(extractGenerationTime({ 'x-timestamp': value }, RECEIVED_AT)).toBe(RECEIVED_AT);
    },
  );

  it.each(['1e15', '+275760-09-13T00:00:00Z', '+033658-09-27T01:46:40.000Z'])(
    'ignores %s, which lies outside years 0000-9999',
    (value) => {
      expect(extractGenerationTime({ 'x-timestamp': value }, RECEIVED_AT)).toBe(RECEIVED_AT);
    },
  );

  it('ignores a proxy timestamp beyond year 9999', () => {
    expect(extractGenerationTime({ 'x-request-start': '1e19' }, RECEIVED_AT)).toBe(RECEIVED_AT);
  });
});
