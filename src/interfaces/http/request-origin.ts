import type { IncomingHttpHeaders } from 'node:http';
import { z } from 'zod';

/** Headers that may carry the real client address, most trusted first. */
const IP_HEADERS = [
  'x-forwarded-for',
  'x-real-ip',
  'cf-connecting-ip',
  'x-client-ip',
  'x-forwarded',
  'forwarded-for',
  'forwarded',
] as const;

/** Timestamps set by the client when it generated the request. */
const CLIENT_TIME_HEADERS = [
  'x-timestamp',
  'x-client-time',
  'x-request-time',
  'timestamp',
] as const;

/** Timestamps set by a proxy or load balancer on receipt. */
const PROXY_TIME_HEADERS = [
  'x-request-start',
  'x-queue-start',
  'x-request-received',
  'x-forwarded-start',
] as const;

function headerValue(headers: IncomingHttpHeaders, name: string): string | undefined {
  const raw = headers[name];
  if (raw === undefined) return undefined;
  return Array.isArray(raw) ? raw.join(',') : raw;
}

/** Loopback, RFC 1918 and link-local prefixes, plus wildcard names. */
export function isPrivateIp(ip: string): boolean {
  if (
    ip.startsWith('127.')
    || ip.startsWith('10.')
    || ip.startsWith('192.168.')
    || ip.startsWith('172.')
    || ip.startsWith('169.254.')
  ) {
    return true;
  }
  return ip === 'localhost' || ip === '::1' || ip === '0.0.0.0';
}

/**
 * Resolves the client address behind any proxies.
 *
 * Each candidate header may hold a comma-separated chain; the first
 * public address found wins. Falls back to the socket address, then
 * to `'unknown'`.
 */
export function extractClientIp(
  headers: IncomingHttpHeaders,
  socketIp: string | undefined,
): string {
  for (const name of IP_HEADERS) {
    const value = headerValue(headers, name);
    if (!value) continue;

    for (const candidate of value.split(',')) {
      const ip = candidate.trim();
      if (ip && !isPrivateIp(ip)) return ip;
    }
  }

  if (socketIp) return socketIp;
  return 'unknown';
}

/** Parses a numeric header value; `null` for anything non-finite. */
function parseNumber(value: string): number | null {
  if (value.trim() === '') return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

/** 0000-01-01T00:00:00.000Z and 9999-12-31T23:59:59.999Z. */
const MIN_DATE_MS = -62_167_219_200_000;
const MAX_DATE_MS = 253_402_300_799_999;

/** Dates outside four-digit years have no plain ISO-8601 form. */
function validDate(ms: number): Date | null {
  if (Number.isNaN(ms) || ms < MIN_DATE_MS || ms > MAX_DATE_MS) return null;
  return new Date(ms);
}

const isoDateTime = z.string().datetime({ offset: true, local: true });
const isoDate = z.string().date();

/**
 * Client timestamps: ISO-8601 when the value contains `T` or `-`,
 * otherwise Unix time in seconds, or milliseconds above 1e10.
 */
function parseClientTime(value: string): Date | null {
  if (value.includes('T') || value.includes('-')) {
    if (!isoDateTime.safeParse(value).success && !isoDate.safeParse(value).success) return null;
    return validDate(Date.parse(value));
  }

  const n = parseNumber(value);
  if (n === null) return null;
  return validDate(n > 1e10 ? n : n * 1000);
}

/**
 * Proxy timestamps are numeric: microseconds above 1e12,
 * milliseconds above 1e10, seconds otherwise.
 */
function parseProxyTime(value: string): Date | null {
  const n = parseNumber(value);
  if (n === null) return null;
  if (n > 1e12) return validDate(n / 1000);
  if (n > 1e10) return validDate(n);
  return validDate(n * 1000);
}

/**
 * Determines when a request was generated.
 *
 * Client-supplied headers take precedence over proxy headers;
 * unparseable values are skipped. Falls back to `receivedAt`.
 */
export function extractGenerationTime(
  headers: IncomingHttpHeaders,
  receivedAt: Date = new Date(),
): Date {
  for (const name of CLIENT_TIME_HEADERS) {
    const value = headerValue(headers, name);
    if (!value) continue;
    const parsed = parseClientTime(value);
    if (parsed !== null) return parsed;
  }

  for (const name of PROXY_TIME_HEADERS) {
    const value = headerValue(headers, name);
    if (!value) continue;
    const parsed = parseProxyTime(value);
    if (parsed !== null) return parsed;
  }

  return receivedAt;
}
