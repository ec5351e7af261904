import type { ResolvedOptions } from '../types/options.js';
import {
  COMPOSITION_KEYWORDS,
  type JsonObject,
  cloneJson,
  getObject,
  hasKey,
  isJsonObject,
} from '../types/json.js';
import { getSchemas } from '../openapi/operations.js';
import { compilePattern } from '../util/pattern-table.js';

export interface ReadOnlyStats {
  metadataFieldsMarked: number;
  objectRefFieldsMarked: number;
  totalFieldsMarked: number;
  schemasProcessed: number;
  schemasMatched: number;
  metadataSchemasMatched: number;
  objectRefSchemasMatched: number;
  /** Marks per property name */
  fieldsByName: Record<string, number>;
}

export interface ReadOnlyResult {
  document: JsonObject;
  stats: ReadOnlyStats;
}

export interface SchemaKind {
  metadata: boolean;
  objectRef: boolean;
}

/**
 * Marks server-computed fields `readOnly: true`: the system metadata fields
 * of metadata schemas (uid, creation_timestamp, ...) and the identity fields
 * of object references. Schemas are recognised by name; a field that already
 * states `readOnly` is left alone.
 */
export class ReadOnlyEnricher {
  private readonly enabled: boolean;
  private readonly metadataFields: ReadonlySet<string>;
  private readonly objectRefFields: ReadonlySet<string>;
  private readonly metadataPatterns: readonly RegExp[];
  private readonly objectRefPatterns: readonly RegExp[];

  constructor(options: ResolvedOptions['readOnly']) {
    this.enabled = options.enabled;
    this.metadataFields = new Set(options.metadataFields);
    this.objectRefFields = new Set(options.objectRefFields);
    this.metadataPatterns = options.metadataPatterns.map((pattern) =>
      compilePattern(pattern, '', 'readOnly.metadataPatterns')
    );
    this.objectRefPatterns = options.objectRefPatterns.map((pattern) =>
      compilePattern(pattern, '', 'readOnly.objectRefPatterns')
    );
  }

  enrich(document: JsonObject): ReadOnlyResult {
    const stats: ReadOnlyStats = {
      metadataFieldsMarked: 0,
      objectRefFieldsMarked: 0,
      totalFieldsMarked: 0,
      schemasProcessed: 0,
      schemasMatched: 0,
      metadataSchemasMatched: 0,
      objectRefSchemasMatched: 0,
      fieldsByName: {},
    };
    if (!this.enabled) {
      return { document, stats };
    }

    const result = cloneJson(document);
    const schemas = getSchemas(result);
    if (schemas) {
      for (const [name, schema] of Object.entries(schemas)) {
        stats.schemasProcessed += 1;
        if (isJsonObject(schema)) {
          this.visitSchema(schema, name, stats);
        }
      }
    }
    stats.totalFieldsMarked =
      stats.metadataFieldsMarked + stats.objectRefFieldsMarked;
    return { document: result, stats };
  }

  classify(schemaName: string): SchemaKind {
    return {
      metadata: this.metadataPatterns.some((pattern) => pattern.test(schemaName)),
      objectRef: this.objectRefPatterns.some((pattern) =>
        pattern.test(schemaName)
      ),
    };
  }

  private visitSchema(
    schema: JsonObject,
    name: string,
    stats: ReadOnlyStats
  ): void {
    const kind = this.classify(name);
    if (kind.metadata || kind.objectRef) {
      stats.schemasMatched += 1;
      if (kind.metadata) stats.metadataSchemasMatched += 1;
      if (kind.objectRef) stats.objectRefSchemasMatched += 1;
    }

    const properties = getObject(schema, 'properties');
    if (properties) {
      this.visitProperties(properties, name, kind, stats);
    }

    for (const key of ['items', 'additionalProperties']) {
      const child = getObject(schema, key);
      if (child) this.visitSchema(child, `${name}.${key}`, stats);
    }

    for (const keyword of COMPOSITION_KEYWORDS) {
      const members = schema[keyword];
      if (!Array.isArray(members)) continue;
      members.forEach((member, index) => {
        if (isJsonObject(member)) {
          this.visitSchema(member, `${name}.${keyword}[${index}]`, stats);
        }
      });
    }
  }

  private visitProperties(
    properties: JsonObject,
    owner: string,
    kind: SchemaKind,
    stats: ReadOnlyStats
  ): void {
    for (const [name, property] of Object.entries(properties)) {
      if (!isJsonObject(property)) continue;

      // An object reference wins over metadata when a schema is both.
      const asObjectRef = kind.objectRef && this.objectRefFields.has(name);
      const asMetadata =
        !asObjectRef && kind.metadata && this.metadataFields.has(name);

      if ((asObjectRef || asMetadata) && !hasKey(property, 'readOnly')) {
        property.readOnly = true;
        if (asObjectRef) {
          stats.objectRefFieldsMarked += 1;
        } else {
          stats.metadataFieldsMarked += 1;
        }
        stats.fieldsByName[name] = (stats.fieldsByName[name] ?? 0) + 1;
      }

      const nested = getObject(property, 'properties');
      if (nested) {
        const path = `${owner}.${name}`;
        this.visitProperties(nested, path, this.classify(path), stats);
      }
    }
  }
}
