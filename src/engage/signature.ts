/**
 * Custom source SDK request signing: hex HMAC-SHA512 of the request body
 * exactly as sent, keyed with the source's API secret.
 */
import crypto from 'node:crypto';

export function computeSourceSignature(secret: string, payload: string): string {
  return crypto
    .createHmac('sha512', secret)
    .update(payload)
    .digest('hex');
}

/** Constant-time check of the signature header against the raw body. */
export function isValidSourceSignature(
  secret: string,
  payload: string,
  header: string | string[] | undefined,
): boolean {
  const received = Array.isArray(header) ? header[0] : header;
  if (!received) return false;

  const expected = Buffer.from(computeSourceSignature(secret, payload), 'utf8');
  const actual = Buffer.from(received.toLowerCase(), 'utf8');
  return actual.length === expected.length && crypto.timingSafeEqual(actual, expected);
}
