import crypto from 'crypto';
import { InputError } from '../errors.js';
import { JsonValue } from '../types/webhook.js';

/**
 * Serialize JSON with object keys sorted at every depth and no whitespace,
 * so sender and receiver hash the same bytes regardless of key order.
 */
export function canonicalJson(value: JsonValue): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }

  const keys = Object.keys(value).sort();
  const members: string[] = [];
  for (const key of keys) {
    const member = value[key];
    // JSON.stringify drops undefined members; keep that behaviour for loose payloads
    if (member === undefined) continue;
    members.push(`${JSON.stringify(key)}:${canonicalJson(member)}`);
  }
  return `{${members.join(',')}}`;
}

/**
 * Build the string that gets signed: "{timestamp}.{canonical payload}"
 */
export function buildSigningString(timestamp: string, payload: JsonValue): string {
  return `${timestamp}.${canonicalJson(payload)}`;
}

/**
 * Generate the hex HMAC-SHA256 signature of a webhook payload
 */
export function signPayload(
  secret: string | null | undefined,
  timestamp: string,
  payload: JsonValue
): string {
  if (!secret) {
    throw new InputError('Webhook secret is required for signing');
  }

  return crypto
    .createHmac('sha256', secret)
    .update(buildSigningString(timestamp, payload), 'utf8')
    .digest('hex');
}

/**
 * Verify a signature produced by signPayload.
 * Returns false for every kind of mismatch or bad input; the reason is not exposed.
 */
export function verifySignature(
  secret: string | null | undefined,
  timestamp: string,
  payload: JsonValue,
  providedSignature: string | null | undefined
): boolean {
  if (!secret || !providedSignature) {
    return false;
  }

  try {
    const expected = Buffer.from(signPayload(secret, timestamp, payload), 'utf8');
    const provided = Buffer.from(providedSignature, 'utf8');
    if (expected.length !== provided.length) {
      return false;
    }
    return crypto.timingSafeEqual(expected, provided);
  } catch {
    return false;
  }
}
