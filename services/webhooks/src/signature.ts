/**
 * Webhook request signing
 *
 * Signature scheme (receivers implement `verifySignature`):
 *   message   = `${timestamp}.${canonicalJson(payload)}`
 *   signature = 'sha256=' + hex(HMAC_SHA256(secret, message))
 * sent as X-Webhook-Signature / X-Webhook-Timestamp, timestamp in unix seconds.
 */

import { createHmac, timingSafeEqual } from 'crypto';
import type { JsonValue } from './types.js';

export const SIGNATURE_HEADER = 'X-Webhook-Signature';
export const TIMESTAMP_HEADER = 'X-Webhook-Timestamp';
export const SIGNATURE_PREFIX = 'sha256=';
export const DEFAULT_TOLERANCE_SECONDS = 300;

export interface SignatureHeaders {
  [SIGNATURE_HEADER]: string;
  [TIMESTAMP_HEADER]: string;
}

/**
 * Serialize with object keys sorted at every depth and no whitespace, so
 * semantically equal payloads produce byte-identical messages.
 *
 * Objects are written key by key: a rebuilt object would list integer-like
 * keys ("9", "10") first in numeric order.
 */
export function canonicalizePayload(payload: JsonValue): string {
  if (Array.isArray(payload)) {
    return `[${payload.map(canonicalizePayload).join(',')}]`;
  }
  if (payload !== null && typeof payload === 'object') {
    const members = Object.keys(payload)
      .sort()
      .map(key => `${JSON.stringify(key)}:${canonicalizePayload(payload[key])}`);
    return `{${members.join(',')}}`;
  }
  return JSON.stringify(payload);
}

function unixSeconds(now: Date): number {
  return Math.floor(now.getTime() / 1000);
}

function computeDigest(secret: string, timestamp: string, body: string): string {
  return createHmac('sha256', secret)
    .update(`${timestamp}.${body}`, 'utf8')
    .digest('hex');
}

export function signPayload(payload: JsonValue, secret: string, now: Date = new Date()): SignatureHeaders {
  const timestamp = String(unixSeconds(now));
  const digest = computeDigest(secret, timestamp, canonicalizePayload(payload));

  return {
    [SIGNATURE_HEADER]: `${SIGNATURE_PREFIX}${digest}`,
    [TIMESTAMP_HEADER]: timestamp,
  };
}

/**
 * Reference receiver check. `rawPayload` is the request body exactly as
 * received. Never throws.
 */
export function verifySignature(
  rawPayload: string,
  signatureHeader: string,
  timestampHeader: string,
  secret: string,
  toleranceSeconds = DEFAULT_TOLERANCE_SECONDS,
  now: Date = new Date()
): boolean {
  if (!Number.isFinite(toleranceSeconds) || toleranceSeconds < 0) {
    return false;
  }

  const trimmedTimestamp = timestampHeader.trim();
  if (!/^-?\d+$/.test(trimmedTimestamp)) {
    return false;
  }

  const timestamp = parseInt(trimmedTimestamp, 10);
  if (Math.abs(unixSeconds(now) - timestamp) > toleranceSeconds) {
    return false;
  }

  const provided = signatureHeader.startsWith(SIGNATURE_PREFIX)
    ? signatureHeader.slice(SIGNATURE_PREFIX.length)
    : signatureHeader;

  const expected = Buffer.from(computeDigest(secret, trimmedTimestamp, rawPayload), 'utf8');
  const actual = Buffer.from(provided.toLowerCase(), 'utf8');

  // timingSafeEqual needs equal lengths; compare against itself to keep the work constant
  if (actual.length !== expected.length) {
    timingSafeEqual(expected, expected);
    return false;
  }

  return timingSafeEqual(actual, expected);
}

/**
 * Case-insensitive lookup of the signature headers on an incoming request.
 */
export function extractSignatureHeaders(
  headers: Record<string, string | string[] | undefined>
): { signature: string; timestamp: string } | null {
  let signature: string | undefined;
  let timestamp: string | undefined;

  for (const [name, value] of Object.entries(headers)) {
    const first = Array.isArray(value) ? value[0] : value;
    const lower = name.toLowerCase();
    if (lower === SIGNATURE_HEADER.toLowerCase()) {
      signature = first;
    } else if (lower === TIMESTAMP_HEADER.toLowerCase()) {
      timestamp = first;
    }
  }

  if (!signature || !timestamp) {
    return null;
  }
  return { signature, timestamp };
}
