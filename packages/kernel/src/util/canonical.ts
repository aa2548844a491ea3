/**
 * Deterministic hashing helpers.
 */

import { createHash } from 'node:crypto';

import type { Action } from '../types/action.js';

/** Fields that carry user content and are never hashed into an audit record. */
const CONTENT_FIELDS: ReadonlySet<string> = new Set(['content', 'value', 'body']);

/**
 * SHA-256 over the canonical JSON of an action, content fields excluded.
 * Two identical requests hash identically regardless of key order.
 */
export function computeInputHash(action: Action): string {
  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(action)) {
    if (!CONTENT_FIELDS.has(key)) fields[key] = value;
  }
  return createHash('sha256').update(canonicalJson(fields)).digest('hex');
}

/** JSON with keys sorted at every level. */
export function canonicalJson(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return '[' + value.map(canonicalJson).join(',') + ']';
  }
  if (typeof value === 'object') {
    const pairs = Object.entries(value)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
    return '{' + pairs.join(',') + '}';
  }
  return 'null';
}
