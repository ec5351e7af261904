/**
 * JSON value model shared by every transform.
 *
 * Specification documents arrive as parsed JSON of unknown shape. Transforms
 * walk them through these guards instead of ad-hoc runtime checks, and treat
 * any node that is not the shape they expect as an opaque leaf.
 */

export type JsonPrimitive = null | boolean | number | string;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

export function isJsonArray(value: unknown): value is JsonValue[] {
  return Array.isArray(value);
}

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Narrow parsed input (e.g. the result of JSON.parse) into a JsonValue.
 * Values JSON cannot carry (functions, undefined, symbols, bigint) collapse to null.
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null) return null;
  switch (typeof value) {
    case 'boolean':
    case 'string':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : null;
    case 'object':
      break;
    default:
      return null;
  }
  if (Array.isArray(value)) {
    return value.map((item) => toJsonValue(item));
  }
  const out: JsonObject = {};
  for (const [key, child] of Object.entries(value)) {
    if (child === undefined) continue;
    out[key] = toJsonValue(child);
  }
  return out;
}

/** Deep copy so that transforms never alias their caller's document. */
export function cloneJson<T extends JsonValue>(value: T): T {
  return structuredClone(value);
}

export function getObject(
  parent: JsonObject,
  key: string
): JsonObject | undefined {
  const child = parent[key];
  return isJsonObject(child) ? child : undefined;
}

export function getString(
  parent: JsonObject,
  key: string
): string | undefined {
  const child = parent[key];
  return typeof child === 'string' ? child : undefined;
}

export function getNumber(
  parent: JsonObject,
  key: string
): number | undefined {
  const child = parent[key];
  return typeof child === 'number' ? child : undefined;
}

export function getArray(
  parent: JsonObject,
  key: string
): JsonValue[] | undefined {
  const child = parent[key];
  return Array.isArray(child) ? child : undefined;
}

export function hasKey(node: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(node, key);
}

export const COMPOSITION_KEYWORDS = ['allOf', 'oneOf', 'anyOf'] as const;

export type CompositionKeyword = (typeof COMPOSITION_KEYWORDS)[number];
