/**
 * Content digests for audit payloads
 */
import { createHash } from 'crypto';

const RESULT_HASH_LENGTH = 16;

/**
 * JSON rendering with object keys sorted at every depth, so that two
 * structurally equal values always produce the same text.
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(normalize(value)) ?? 'null';
}

function normalize(value: unknown): unknown {
  if (value === undefined || typeof value === 'function' || typeof value === 'symbol') {
    return null;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map(normalize);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, entry] of entries) {
      sorted[key] = normalize(entry);
    }
    return sorted;
  }
  return value;
}

/**
 * Truncated SHA-256 of a tool result. Only this digest ever leaves the
 * process for post-invoke logging, never the content itself.
 */
export function hashContent(content: unknown): string {
  return createHash('sha256')
    .update(stableStringify(content))
    .digest('hex')
    .slice(0, RESULT_HASH_LENGTH);
}
