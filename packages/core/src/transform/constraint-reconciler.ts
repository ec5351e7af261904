/* eslint-disable complexity */
import type {
  ReconciliationMode,
  ResolvedOptions,
} from '../types/options.js';
import {
  type JsonObject,
  type JsonValue,
  COMPOSITION_KEYWORDS,
  cloneJson,
  getNumber,
  getObject,
  isJsonObject,
} from '../types/json.js';
import { canonicalize } from '../util/canonical-json.js';
import { getSchemas, listOperations } from '../openapi/operations.js';

/** x-discovered-* extension → standard schema keyword, in application order */
export const DISCOVERED_FIELD_MAPPING: ReadonlyArray<
  readonly [extension: string, field: string]
> = [
  ['x-discovered-max-length', 'maxLength'],
  ['x-discovered-min-length', 'minLength'],
  ['x-discovered-pattern', 'pattern'],
  ['x-discovered-format', 'format'],
  ['x-discovered-enum-values', 'enum'],
  ['x-discovered-enum', 'enum'],
  ['x-discovered-minimum', 'minimum'],
  ['x-discovered-maximum', 'maximum'],
  ['x-discovered-type', 'type'],
];

const MAPPED_EXTENSIONS: ReadonlySet<string> = new Set(
  DISCOVERED_FIELD_MAPPING.map(([extension]) => extension)
);

const SAMPLE_SIZE_KEY = 'x-discovered-sample-size';
const CONFIDENCE_KEY = 'x-discovered-confidence';
const DISCOVERED_PREFIX = 'x-discovered-';

export interface ReconciliationStats {
  /** Fields written from discovery data */
  reconciled: number;
  /** Nodes rejected by the sample-size or confidence gate */
  skipped: number;
  /** Unmapped x-discovered-* keys left in place, sample size and confidence included */
  preserved: number;
  /** Reconciled count per standard field */
  fields: Record<string, number>;
}

export interface ReconciliationReport {
  timestamp: string;
  mode: ReconciliationMode;
  confidenceThreshold: number;
  minSampleSize: number;
  statistics: ReconciliationStats;
}

export interface ReconcileResult {
  document: JsonObject;
  report: ReconciliationReport;
}

export interface ConstraintReconcilerDeps {
  /** Clock for x-reconciled-at and the report timestamp */
  now?: () => Date;
}

/**
 * Promotes constraints observed on the live API (`x-discovered-*`) into the
 * standard schema keywords they describe.
 *
 * Only property nodes are reconciled, and gating is per property: one
 * whose sample size is positive but below `minSampleSize`, or whose
 * confidence is below `confidenceThreshold`, is left untouched. Mapped
 * extensions are consumed whether or not they win
 * against the published value.
 */
export class ConstraintReconciler {
  private readonly now: () => Date;

  constructor(
    private readonly options: ResolvedOptions['reconciliation'],
    deps: ConstraintReconcilerDeps = {}
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  reconcile(document: JsonObject): ReconcileResult {
    const stats: ReconciliationStats = {
      reconciled: 0,
      skipped: 0,
      preserved: 0,
      fields: {},
    };
    const result = cloneJson(document);
    const timestamp = this.now().toISOString();

    if (this.options.enabled) {
      const visit = (node: JsonValue | undefined): void =>
        this.visitSchema(node, stats, timestamp);

      const schemas = getSchemas(result);
      if (schemas) {
        for (const schema of Object.values(schemas)) visit(schema);
      }

      for (const { operation } of listOperations(result)) {
        const requestBody = getObject(operation, 'requestBody');
        if (requestBody) visitMediaSchemas(requestBody, visit);

        const responses = getObject(operation, 'responses');
        if (responses) {
          for (const response of Object.values(responses)) {
            if (isJsonObject(response)) visitMediaSchemas(response, visit);
          }
        }
      }
    }

    return {
      document: result,
      report: {
        timestamp,
        mode: this.options.mode,
        confidenceThreshold: this.options.confidenceThreshold,
        minSampleSize: this.options.minSampleSize,
        statistics: stats,
      },
    };
  }

  /**
   * Reconciles the property nodes under `schema`. Nested objects, array
   * items and composition members are walked as schemas in turn; the
   * schema node itself is never reconciled.
   */
  private visitSchema(
    schema: JsonValue | undefined,
    stats: ReconciliationStats,
    timestamp: string
  ): void {
    if (!isJsonObject(schema)) return;

    const properties = getObject(schema, 'properties');
    if (properties) {
      for (const property of Object.values(properties)) {
        if (!isJsonObject(property)) continue;
        this.reconcileNode(property, stats, timestamp);
        if (property.type === 'object') {
          this.visitSchema(property, stats, timestamp);
        }
      }
    }

    if (schema.type === 'array') {
      this.visitSchema(schema.items, stats, timestamp);
    }

    for (const keyword of COMPOSITION_KEYWORDS) {
      const members = schema[keyword];
      if (!Array.isArray(members)) continue;
      for (const member of members) {
        this.visitSchema(member, stats, timestamp);
      }
    }
  }

  /** Applies discovery data to one node in place (the node belongs to our clone). */
  private reconcileNode(
    node: JsonObject,
    stats: ReconciliationStats,
    timestamp: string
  ): void {
    const sampleSize = getNumber(node, SAMPLE_SIZE_KEY) ?? 0;
    const confidence = getNumber(node, CONFIDENCE_KEY) ?? 1.0;

    if (sampleSize > 0 && sampleSize < this.options.minSampleSize) {
      stats.skipped += 1;
      return;
    }
    if (confidence < this.options.confidenceThreshold) {
      stats.skipped += 1;
      return;
    }

    let reconciledAny = false;
    for (const [extension, field] of DISCOVERED_FIELD_MAPPING) {
      const discovered = node[extension];
      if (discovered === undefined) continue;

      const published = node[field];
      if (this.shouldReconcile(field, published, discovered)) {
        if (this.options.auditEnabled && isPresent(published)) {
          node[`x-original-${field}`] = published;
        }
        node[field] = discovered;
        reconciledAny = true;
        stats.reconciled += 1;
        stats.fields[field] = (stats.fields[field] ?? 0) + 1;
      }
      delete node[extension];
    }

    for (const key of Object.keys(node)) {
      if (key.startsWith(DISCOVERED_PREFIX) && !MAPPED_EXTENSIONS.has(key)) {
        stats.preserved += 1;
      }
    }

    if (reconciledAny && this.options.auditEnabled) {
      node['x-reconciled-from-discovery'] = true;
      node['x-reconciled-at'] = timestamp;
      if (sampleSize > 0) {
        node['x-reconciled-sample-size'] = sampleSize;
      }
    }
  }

  private modeFor(field: string): ReconciliationMode {
    return this.options.fieldRules[field]?.mode ?? this.options.mode;
  }

  private shouldReconcile(
    field: string,
    published: JsonValue | undefined,
    discovered: JsonValue
  ): boolean {
    switch (this.modeFor(field)) {
      case 'add_missing':
        return !isPresent(published);
      case 'tighten':
        return !isPresent(published) || isTighter(field, published, discovered);
      case 'replace':
        return true;
    }
  }
}

function isPresent(value: JsonValue | undefined): value is JsonValue {
  return value !== undefined && value !== null;
}

/**
 * Whether `discovered` constrains strictly more than `published`.
 * Fields without an ordering (pattern, format, type) are never tighter.
 */
export function isTighter(
  field: string,
  published: JsonValue,
  discovered: JsonValue
): boolean {
  switch (field) {
    case 'maxLength':
      return (
        Number.isInteger(published) &&
        Number.isInteger(discovered) &&
        Number(discovered) < Number(published)
      );
    case 'minLength':
      return (
        Number.isInteger(published) &&
        Number.isInteger(discovered) &&
        Number(discovered) > Number(published)
      );
    case 'maximum':
      return (
        typeof published === 'number' &&
        typeof discovered === 'number' &&
        discovered < published
      );
    case 'minimum':
      return (
        typeof published === 'number' &&
        typeof discovered === 'number' &&
        discovered > published
      );
    case 'enum': {
      if (!Array.isArray(published) || !Array.isArray(discovered)) return false;
      if (discovered.length === 0 || discovered.length >= published.length) {
        return false;
      }
      const allowed = new Set(published.map((value) => canonicalize(value)));
      return discovered.every((value) => allowed.has(canonicalize(value)));
    }
    default:
      return false;
  }
}

function visitMediaSchemas(
  holder: JsonObject,
  visit: (node: JsonValue | undefined) => void
): void {
  const content = getObject(holder, 'content');
  if (!content) return;
  for (const media of Object.values(content)) {
    if (isJsonObject(media)) visit(media.schema);
  }
}
