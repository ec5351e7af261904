/* eslint-disable complexity */
import type { ResolvedOptions } from '../types/options.js';
import {
  type JsonObject,
  cloneJson,
  getString,
  hasKey,
  isJsonObject,
  isNonEmptyString,
} from '../types/json.js';
import { getSchemas, listOperations } from '../openapi/operations.js';

const RESOURCE_ACRONYMS: Readonly<Record<string, string>> = {
  http: 'HTTP',
  tcp: 'TCP',
  udp: 'UDP',
  dns: 'DNS',
  api: 'API',
  waf: 'WAF',
  cdn: 'CDN',
  vpn: 'VPN',
  ip: 'IP',
  ssl: 'SSL',
  tls: 'TLS',
  bgp: 'BGP',
  acl: 'ACL',
  lb: 'load balancer',
  k8s: 'Kubernetes',
  aws: 'AWS',
  gcp: 'GCP',
  azure: 'Azure',
  oidc: 'OIDC',
  rbac: 'RBAC',
};

const ACTION_VERBS: Readonly<Record<string, string>> = {
  create: 'Create',
  get: 'Get',
  list: 'List',
  update: 'Update',
  replace: 'Replace',
  delete: 'Delete',
  patch: 'Patch',
};

const METHOD_VERBS: Readonly<Record<string, string>> = {
  get: 'Get',
  post: 'Create',
  put: 'Update',
  patch: 'Partially update',
  delete: 'Delete',
  head: 'Check',
  options: 'Get options for',
};

const SCHEMA_NAME_PREFIXES = ['schema', 'ioschema', 'vesio', 'ves_io'] as const;

const TYPE_LIKE_WORDS = ['type', 'spec', 'request', 'response'] as const;

export interface DescriptionValidationStats {
  operationsMissing: number;
  operationsGenerated: number;
  schemasMissing: number;
  schemasGenerated: number;
}

export interface DescriptionValidationResult {
  document: JsonObject;
  stats: DescriptionValidationStats;
}

export interface MissingOperationDescription {
  path: string;
  /** Upper-cased HTTP method */
  method: string;
  operationId: string;
}

export interface MissingSchemaDescription {
  name: string;
  type: string;
}

export interface MissingDescriptionReport {
  operations: MissingOperationDescription[];
  schemas: MissingSchemaDescription[];
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/** True when the word has letters and none of them is lower case. */
function isUpperWord(word: string): boolean {
  return /\p{L}/u.test(word) && word === word.toUpperCase();
}

/** "getUserByID" → ["get", "User", "By", "ID"] */
export function splitCamelCase(name: string): string[] {
  return name
    .replace(/([a-z])([A-Z])/g, '$1 $2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
    .split(/\s+/)
    .filter((word) => word.length > 0);
}

/** Short all-caps words (≤ 4 characters) are kept as acronyms. */
function caseWord(word: string): string {
  return isUpperWord(word) && word.length <= 4 ? word : word.toLowerCase();
}

function withPeriod(text: string): string {
  return text.endsWith('.') ? text : `${text}.`;
}

function hasDescription(node: JsonObject): boolean {
  return isNonEmptyString(node.description);
}

/** "http_loadbalancer" → "HTTP loadbalancer" */
export function formatResourceName(resource: string): string {
  return resource
    .replace(/_/g, ' ')
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => RESOURCE_ACRONYMS[word.toLowerCase()] ?? word)
    .join(' ');
}

function formatAction(action: string): string {
  return ACTION_VERBS[action.toLowerCase()] ?? capitalize(action);
}

function methodToAction(method: string): string {
  return METHOD_VERBS[method.toLowerCase()] ?? capitalize(method);
}

/**
 * Description from the HTTP method and the last path segment that is not a
 * template parameter; undefined when every segment is a parameter.
 */
export function describeFromPath(
  method: string,
  path: string
): string | undefined {
  const segments = path.replace(/\/+$/, '').split('/');
  const resource = [...segments]
    .reverse()
    .find((segment) => !segment.startsWith('{'));
  if (!resource) return undefined;
  return `${methodToAction(method)} ${formatResourceName(resource)}.`;
}

/**
 * Description from an operationId.
 *
 * Dotted ids (`ves.io.schema.namespace.API.Create`, or any id with three or
 * more segments) read as `<Action> <resource>.`, skipping an `API` segment.
 * Other ids are split on camelCase boundaries.
 */
export function describeFromOperationId(
  operationId: string,
  method: string,
  path: string
): string | undefined {
  if (!operationId) {
    return describeFromPath(method, path);
  }

  const parts = operationId.split('.');
  if (operationId.includes('ves.io.schema') || parts.length >= 3) {
    const action = parts[parts.length - 1] ?? '';
    const resourceIndex =
      parts[parts.length - 2] === 'API' ? parts.length - 3 : parts.length - 2;
    const resource = parts[resourceIndex];
    if (action && resource) {
      return `${formatAction(action)} ${formatResourceName(resource)}.`;
    }
  }

  const words = splitCamelCase(operationId);
  if (words.length === 0) {
    return describeFromPath(method, path);
  }
  const [first = '', ...rest] = words;
  return withPeriod([capitalize(first), ...rest.map(caseWord)].join(' '));
}

/** "ioschemaObjectMetaType" → "Object meta type." */
export function describeFromSchemaName(schemaName: string): string | undefined {
  let name = schemaName;
  const prefix = SCHEMA_NAME_PREFIXES.find((candidate) =>
    name.toLowerCase().startsWith(candidate)
  );
  if (prefix) {
    name = name.slice(prefix.length);
  }

  const words = splitCamelCase(name).map(caseWord);
  const [first, ...rest] = words;
  if (first === undefined) return undefined;

  let description = [capitalize(first), ...rest].join(' ');
  const lower = description.toLowerCase();
  if (!TYPE_LIKE_WORDS.some((word) => lower.includes(word))) {
    description += ' type';
  }
  return withPeriod(description);
}

/**
 * Finds operations and schemas without a usable description and, when
 * enabled, writes one derived from identifiers.
 */
export class DescriptionValidator {
  constructor(
    private readonly options: ResolvedOptions['descriptionValidation']
  ) {}

  validateAndGenerate(document: JsonObject): DescriptionValidationResult {
    const stats: DescriptionValidationStats = {
      operationsMissing: 0,
      operationsGenerated: 0,
      schemasMissing: 0,
      schemasGenerated: 0,
    };
    if (!this.options.enabled) {
      return { document, stats };
    }

    const result = cloneJson(document);
    const prefix = this.options.descriptionPrefix;

    for (const { path, methodKey, operation } of listOperations(result)) {
      if (hasDescription(operation)) continue;
      stats.operationsMissing += 1;
      if (!this.options.autoGenerateOperationDescriptions) continue;

      const generated = describeFromOperationId(
        getString(operation, 'operationId') ?? '',
        methodKey,
        path
      );
      if (generated) {
        operation.description = prefix + generated;
        stats.operationsGenerated += 1;
      }
    }

    const schemas = getSchemas(result);
    if (this.options.autoGenerateSchemaDescriptions && schemas) {
      for (const [name, schema] of Object.entries(schemas)) {
        if (!isJsonObject(schema) || hasKey(schema, '$ref')) continue;
        if (hasDescription(schema)) continue;
        stats.schemasMissing += 1;

        const generated = describeFromSchemaName(name);
        if (generated) {
          schema.description = prefix + generated;
          stats.schemasGenerated += 1;
        }
      }
    }

    return { document: result, stats };
  }

  /** Read-only report of what validateAndGenerate would fill in. */
  findMissingDescriptions(document: JsonObject): MissingDescriptionReport {
    const report: MissingDescriptionReport = { operations: [], schemas: [] };

    for (const { path, methodKey, operation } of listOperations(document)) {
      if (hasDescription(operation)) continue;
      report.operations.push({
        path,
        method: methodKey.toUpperCase(),
        operationId: getString(operation, 'operationId') ?? '',
      });
    }

    const schemas = getSchemas(document);
    if (schemas) {
      for (const [name, schema] of Object.entries(schemas)) {
        if (!isJsonObject(schema) || hasKey(schema, '$ref')) continue;
        if (hasDescription(schema)) continue;
        report.schemas.push({
          name,
          type: getString(schema, 'type') ?? 'unknown',
        });
      }
    }
    return report;
  }
}
