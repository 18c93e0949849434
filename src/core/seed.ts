/**
 * Deterministic content hashing for reproducible valuation reports
 */

import { createHash } from 'crypto';

export function deterministicHash(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

export function contentHash(content: unknown): string {
  return deterministicHash(stableStringify(content));
}

export function stableStringify(obj: unknown): string {
  if (obj === null || typeof obj !== 'object') {
    // JSON has no NaN/Infinity; keep them distinguishable from null
    if (typeof obj === 'number' && !Number.isFinite(obj)) {
      return JSON.stringify(String(obj));
    }
    return JSON.stringify(obj) ?? 'null';
  }

  if (Array.isArray(obj)) {
    return '[' + obj.map(stableStringify).join(',') + ']';
  }

  const record: Record<string, unknown> = { ...obj };
  const keys = Object.keys(record)
    .filter((key) => record[key] !== undefined)
    .sort();
  const pairs = keys.map((key) => JSON.stringify(key) + ':' + stableStringify(record[key]));
  return '{' + pairs.join(',') + '}';
}
