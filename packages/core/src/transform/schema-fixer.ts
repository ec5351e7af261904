import type { FormatImpliedType, ResolvedOptions } from '../types/options.js';
import {
  type JsonObject,
  type JsonValue,
  COMPOSITION_KEYWORDS,
  hasKey,
  isJsonObject,
} from '../types/json.js';

const FORMAT_TYPE_MAPPING: Readonly<Record<string, FormatImpliedType>> = {
  string: 'string',
  binary: 'string',
  byte: 'string',
  date: 'string',
  'date-time': 'string',
  password: 'string',
  uuid: 'string',
  email: 'string',
  uri: 'string',
  hostname: 'string',
  ipv4: 'string',
  ipv6: 'string',
  int32: 'integer',
  int64: 'integer',
  float: 'number',
  double: 'number',
};

export interface SchemaFixStats {
  fixesApplied: number;
}

export interface SchemaFixResult {
  document: JsonObject;
  stats: SchemaFixStats;
}

/**
 * Repairs schema nodes that declare a `format` without a `type`.
 *
 * A node is repaired when it has a string `format` and none of `type`,
 * `$ref`, `allOf`, `oneOf`, `anyOf`. The injected `type` becomes the node's
 * first key; nothing else changes.
 */
export class SchemaFixer {
  private readonly enabled: boolean;
  private readonly mapping: ReadonlyMap<string, FormatImpliedType>;

  constructor(options: ResolvedOptions['schemaFixes']) {
    this.enabled = options.fixFormatWithoutType;
    const merged = new Map(Object.entries(FORMAT_TYPE_MAPPING));
    for (const [format, type] of Object.entries(options.formatTypeMappings)) {
      merged.set(format.toLowerCase(), type);
    }
    this.mapping = merged;
  }

  fix(document: JsonObject): SchemaFixResult {
    const stats: SchemaFixStats = { fixesApplied: 0 };
    const fixed = this.fixNode(document, stats);
    return {
      document: isJsonObject(fixed) ? fixed : document,
      stats,
    };
  }

  /** Type implied by a format; unknown formats imply 'string'. */
  typeForFormat(format: string): FormatImpliedType {
    return this.mapping.get(format.toLowerCase()) ?? 'string';
  }

  private fixNode(node: JsonValue, stats: SchemaFixStats): JsonValue {
    if (Array.isArray(node)) {
      return node.map((item) => this.fixNode(item, stats));
    }
    if (!isJsonObject(node)) {
      return node;
    }

    const out: JsonObject = {};
    const format = node.format;
    if (this.enabled && typeof format === 'string' && needsTypeFix(node)) {
      out.type = this.typeForFormat(format);
      stats.fixesApplied += 1;
    }
    for (const [key, value] of Object.entries(node)) {
      out[key] = this.fixNode(value, stats);
    }
    return out;
  }
}

function needsTypeFix(node: JsonObject): boolean {
  if (!hasKey(node, 'format')) return false;
  if (hasKey(node, 'type') || hasKey(node, '$ref')) return false;
  return !COMPOSITION_KEYWORDS.some((keyword) => hasKey(node, keyword));
}
