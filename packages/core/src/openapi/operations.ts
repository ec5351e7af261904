import {
  type JsonObject,
  getObject,
  isJsonObject,
} from '../types/json.js';

export const HTTP_METHODS = [
  'get',
  'put',
  'post',
  'delete',
  'options',
  'head',
  'patch',
  'trace',
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

/** Path item keys are matched case-insensitively ('GET' counts as get). */
export function coerceHttpMethod(key: string): HttpMethod | undefined {
  const lower = key.toLowerCase();
  return HTTP_METHODS.find((method) => method === lower);
}

export interface OperationEntry {
  path: string;
  /** Method key exactly as written in the path item */
  methodKey: string;
  method: HttpMethod;
  pathItem: JsonObject;
  operation: JsonObject;
}

/**
 * Every operation object under `paths`, in document order. Path items and
 * operations that are not objects are skipped.
 */
export function listOperations(document: JsonObject): OperationEntry[] {
  const paths = getObject(document, 'paths');
  if (!paths) return [];

  const entries: OperationEntry[] = [];
  for (const [path, pathItem] of Object.entries(paths)) {
    if (!isJsonObject(pathItem)) continue;
    for (const [methodKey, operation] of Object.entries(pathItem)) {
      const method = coerceHttpMethod(methodKey);
      if (!method || !isJsonObject(operation)) continue;
      entries.push({ path, methodKey, method, pathItem, operation });
    }
  }
  return entries;
}

export function getSchemas(document: JsonObject): JsonObject | undefined {
  const components = getObject(document, 'components');
  return components ? getObject(components, 'schemas') : undefined;
}
