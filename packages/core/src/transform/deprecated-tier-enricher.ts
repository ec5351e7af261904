import type { ResolvedOptions } from '../types/options.js';
import {
  type JsonObject,
  type JsonValue,
  cloneJson,
  getArray,
  getObject,
  getString,
  isJsonObject,
} from '../types/json.js';
import { getSchemas } from '../openapi/operations.js';
import { compilePattern } from '../util/pattern-table.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('deprecated-tiers');

export interface DeprecatedTierStats {
  schemasProcessed: number;
  schemasTransformed: number;
  valuesTransformed: number;
  descriptionsUpdated: number;
  cliExamplesFixed: number;
}

export interface DeprecatedTierResult {
  document: JsonObject;
  stats: DeprecatedTierStats;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Migrates deprecated subscription tier values (BASIC, PREMIUM) to their
 * current names in tier enums, their descriptions and example commands.
 */
export class DeprecatedTierEnricher {
  private readonly enabled: boolean;
  private readonly patterns: readonly RegExp[];
  private readonly transformations: ReadonlyMap<string, string>;
  private readonly cliReplacements: ReadonlyArray<readonly [string, string]>;

  constructor(options: ResolvedOptions['deprecatedTiers']) {
    this.enabled = options.enabled;
    // Schema names are matched from their first character.
    this.patterns = options.patterns.map((pattern) =>
      compilePattern(`^(?:${pattern})`, '', 'deprecatedTiers.patterns')
    );
    this.transformations = new Map(Object.entries(options.transformations));
    this.cliReplacements = Object.entries(options.cliReplacements);
  }

  enrich(document: JsonObject): DeprecatedTierResult {
    const stats: DeprecatedTierStats = {
      schemasProcessed: 0,
      schemasTransformed: 0,
      valuesTransformed: 0,
      descriptionsUpdated: 0,
      cliExamplesFixed: 0,
    };
    if (!this.enabled) {
      return { document, stats };
    }

    const result = cloneJson(document);
    const schemas = getSchemas(result);
    if (schemas) {
      for (const [name, schema] of Object.entries(schemas)) {
        stats.schemasProcessed += 1;
        if (!isJsonObject(schema)) continue;
        if (this.matchesTierPattern(name)) {
          this.cleanTierSchema(name, schema, stats);
        }
        this.fixCliExample(schema, stats);
      }
    }
    return { document: result, stats };
  }

  matchesTierPattern(schemaName: string): boolean {
    return this.patterns.some((pattern) => pattern.test(schemaName));
  }

  private cleanTierSchema(
    name: string,
    schema: JsonObject,
    stats: DeprecatedTierStats
  ): void {
    const values = getArray(schema, 'enum');
    if (!values || values.length === 0) return;

    const deprecated = values.filter(
      (value): value is string =>
        typeof value === 'string' && this.transformations.has(value)
    );
    if (deprecated.length === 0) return;

    log.info('transforming tier schema', {
      schema: name,
      values: deprecated.map((v) => `${v}→${this.transformations.get(v)}`),
    });
    stats.schemasTransformed += 1;

    const seen = new Set<JsonValue>();
    const rewritten: JsonValue[] = [];
    for (const value of values) {
      const replacement =
        typeof value === 'string' ? this.transformations.get(value) : undefined;
      if (replacement !== undefined) {
        stats.valuesTransformed += 1;
      }
      const next = replacement ?? value;
      if (!seen.has(next)) {
        seen.add(next);
        rewritten.push(next);
      }
    }
    schema.enum = rewritten;

    this.updateDescription(schema, stats);
  }

  private updateDescription(
    schema: JsonObject,
    stats: DeprecatedTierStats
  ): void {
    const original = getString(schema, 'description') ?? '';

    let text = original;
    for (const [deprecated, current] of this.transformations) {
      const token = escapeRegExp(deprecated);
      text = text.replace(new RegExp(`(-\\s*)${token}(:)`, 'gi'), `$1${current}$2`);
      text = text.replace(new RegExp(`\\b${token}\\b`, 'g'), current);
    }
    text = text.replace(/\s+/g, ' ').replace(/,\s*\./g, '.').trim();

    if (text !== original) {
      schema.description = text;
      stats.descriptionsUpdated += 1;
    }
  }

  private fixCliExample(schema: JsonObject, stats: DeprecatedTierStats): void {
    const minimum = getObject(schema, 'x-ves-minimum-configuration');
    if (!minimum) return;
    const command = getString(minimum, 'example_curl');
    if (!command) return;

    let next = command;
    for (const [from, to] of this.cliReplacements) {
      if (next.includes(from)) {
        next = next.split(from).join(to);
        stats.cliExamplesFixed += 1;
      }
    }
    if (next !== command) {
      minimum.example_curl = next;
    }
  }
}
