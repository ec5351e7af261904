import type { JsonValue } from '../types/json.js';

function normalizeNumber(value: number): number {
  if (Object.is(value, -0)) return 0;
  return value;
}

/**
 * Serialize with object keys sorted at every level, so two documents that
 * differ only in key order produce the same text.
 */
export function canonicalize(value: JsonValue): string {
  if (value === null) return 'null';
  if (typeof value === 'number') return JSON.stringify(normalizeNumber(value));
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalize(item)).join(',')}]`;
  }
  const entries = Object.keys(value)
    .sort()
    .map((key) => {
      const child = value[key];
      return `${JSON.stringify(key)}:${child === undefined ? 'null' : canonicalize(child)}`;
    });
  return `{${entries.join(',')}}`;
}

/** Structural equality, ignoring key order. */
export function jsonEquals(a: JsonValue, b: JsonValue): boolean {
  return canonicalize(a) === canonicalize(b);
}
