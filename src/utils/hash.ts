/**
 * Hashing utilities for configuration fingerprints and content verification
 */

import { createHash } from 'crypto';

export function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

export function sha256Short(input: string, length: number = 12): string {
  return sha256(input).substring(0, length);
}

/**
 * JSON serialization with object keys sorted at every depth, so that two
 * structurally equal values always serialize to the same string.
 */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    return '[' + value.map(stableStringify).join(',') + ']';
  }

  const entries = Object.entries(value)
    .filter(([, child]) => child !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const pairs = entries.map(([key, child]) => JSON.stringify(key) + ':' + stableStringify(child));
  return '{' + pairs.join(',') + '}';
}

export function contentHash(content: unknown): string {
  return sha256(stableStringify(content));
}
