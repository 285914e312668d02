/**
 * Content hashing for run ids and integrity fields
 */

import { createHash } from 'crypto';

export function deterministicHash(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

/** sha256 over a key-sorted serialization, so key order never changes the hash */
export function contentHash(content: unknown): string {
  return deterministicHash(stableStringify(content));
}

export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }

  if (Array.isArray(value)) {
    return '[' + value.map(stableStringify).join(',') + ']';
  }

  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const pairs = entries.map(([key, v]) => JSON.stringify(key) + ':' + stableStringify(v));
  return '{' + pairs.join(',') + '}';
}
