import { createHmac, timingSafeEqual } from 'node:crypto';
import { queryEscape } from './query.js';
import { formatRfc3339Nano, parseRfc3339 } from './time.js';

/**
 * HMAC-SHA256 of the UTF-8 payload keyed by the secret key.
 */
export function sign(secretKey: string, payload: string): Buffer {
  return createHmac('sha256', secretKey).update(payload, 'utf8').digest();
}

export function signPayload(secretKey: string, payload: string): string {
  return sign(secretKey, payload).toString('base64');
}

/**
 * The string a signed url's signature covers:
 * `<image url>?timeExpired=<escaped RFC 3339 expiry>`. A string expiry is
 * taken as already formatted.
 */
export function signingPayload(imageUrl: string, timeExpired: Date | string): string {
  const text = typeof timeExpired === 'string' ? timeExpired : formatRfc3339Nano(timeExpired);
  return `${imageUrl}?timeExpired=${queryEscape(text)}`;
}

/**
 * Check that a signed url carries a valid signature for the given key and
 * that it has not expired at `now`.
 */
export function verifySignedUrl(signedUrl: string, secretKey: string, now: Date = new Date()): boolean {
  let parsed: URL;
  try {
    parsed = new URL(signedUrl);
  } catch {
    return false;
  }

  const imageUrl = parsed.searchParams.get('url');
  const timeExpired = parsed.searchParams.get('timeExpired');
  const signature = parsed.searchParams.get('signature');
  if (!imageUrl || !timeExpired || !signature) return false;

  const expiry = parseRfc3339(timeExpired);
  if (!expiry || expiry.getTime() <= now.getTime()) return false;

  // The payload is built from the transmitted timestamp, not a re-formatted one
  const expected = sign(secretKey, signingPayload(imageUrl, timeExpired));
  const given = Buffer.from(signature, 'base64');
  return given.length === expected.length && timingSafeEqual(given, expected);
}
