import { createHash } from 'crypto';

/**
 * Generate a SHA-256 hex digest of a string
 */
export function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

/**
 * Serialize a JSON-compatible value with object keys sorted at every level,
 * so that equal structures always produce the same string.
 */
export function canonicalSerialize(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'number') {
    // Infinity and NaN serialize as strings
    return Number.isFinite(value) ? JSON.stringify(value) : JSON.stringify(String(value));
  }
  if (typeof value === 'string' || typeof value === 'boolean') return JSON.stringify(value);
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalSerialize(item)).join(',')}]`;
  }
  if (typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalSerialize(v)}`).join(',')}}`;
  }
  return JSON.stringify(String(value));
}

/**
 * SHA-256 of the canonical serialization of a value
 */
export function hashCanonical(value: unknown): string {
  return sha256(canonicalSerialize(value));
}
