import { createHmac } from 'crypto';
import createDOMPurify from 'dompurify';
import type { IncomingHttpHeaders } from 'http';
import { JSDOM } from 'jsdom';

const purify = createDOMPurify(new JSDOM('').window);

export const IP_HASH_LENGTH = 8;

/**
 * HMAC-SHA256 of the address under `salt`, truncated to 8 hex characters.
 * Enough to tell submitters apart without storing their address.
 */
export function hashIpAddress(ipAddress: string | null | undefined, salt: string): string | null {
  if (ipAddress === null || ipAddress === undefined) return null;
  if (!salt) throw new Error('IP_HASH_SALT environment variable is not set');
  return createHmac('sha256', salt).update(ipAddress, 'utf8').digest('hex').slice(0, IP_HASH_LENGTH);
}

/**
 * Make user text safe to store in a sheet: markup stripped, no leading `=` (formula injection),
 * every line break turned into a single space. Non-strings pass through.
 */
export function sanitizeInput<T>(value: T): T | string {
  if (typeof value !== 'string') return value;

  let sanitized = purify.sanitize(value, { ALLOWED_TAGS: [], ALLOWED_ATTR: [], KEEP_CONTENT: true });
  if (sanitized.startsWith('=')) sanitized = sanitized.slice(1);
  return sanitized.replace(/\r\n|\r|\n/g, ' ');
}

export type Sanitizable = string | number | boolean | null | undefined | Sanitizable[] | { [key: string]: Sanitizable };

/** Apply sanitizeInput to every string inside objects and arrays. */
export function sanitizeObject<T extends Sanitizable>(value: T): T;
export function sanitizeObject(value: Sanitizable): Sanitizable {
  if (Array.isArray(value)) return value.map((item) => sanitizeObject(item));
  if (value !== null && typeof value === 'object') {
    const result: { [key: string]: Sanitizable } = {};
    for (const [key, item] of Object.entries(value)) result[key] = sanitizeObject(item);
    return result;
  }
  return sanitizeInput(value);
}

/** First X-Forwarded-For entry when behind a proxy, else the socket address. */
export function clientIp(req: { headers: IncomingHttpHeaders; socket: { remoteAddress?: string | undefined } }): string | null {
  const forwarded = req.headers['x-forwarded-for'];
  const header = Array.isArray(forwarded) ? forwarded[0] : forwarded;
  if (header) {
    const first = header.split(',')[0]?.trim();
    if (first) return first;
  }
  return req.socket.remoteAddress ?? null;
}
