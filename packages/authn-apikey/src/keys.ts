/**
 * API key comparison
 *
 * Keys are compared through their SHA-256 digests so that the comparison
 * time depends on neither the key length nor the position of the first
 * differing byte.
 */

import { createHash, timingSafeEqual } from 'crypto';

/** Header carrying admin, upload and publish keys */
export const API_KEY_HEADER = 'x-terrareg-apikey';

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

/**
 * Constant-time equality of two keys. Empty keys never match.
 */
export function keysMatch(presented: string, expected: string): boolean {
  if (presented.length === 0 || expected.length === 0) {
    return false;
  }
  return timingSafeEqual(digest(presented), digest(expected));
}

/**
 * True if `presented` equals any configured key. Every key is compared.
 */
export function matchesAnyKey(presented: string, keys: readonly string[]): boolean {
  let matched = false;
  for (const key of keys) {
    if (keysMatch(presented, key)) {
      matched = true;
    }
  }
  return matched;
}

/**
 * Read the API key header, or null when absent or empty
 */
export function readApiKeyHeader(headers: Readonly<Record<string, string | undefined>>): string | null {
  const value = headers[API_KEY_HEADER];
  return value && value.length > 0 ? value : null;
}
