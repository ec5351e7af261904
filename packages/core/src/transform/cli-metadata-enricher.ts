import type { CompletionRule, ResolvedOptions } from '../types/options.js';
import {
  type JsonObject,
  type JsonValue,
  getArray,
  hasKey,
  isJsonObject,
} from '../types/json.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('cli-metadata');

const HELP_KEY = 'x-ves-cli-help';
const EXAMPLE_KEY = 'x-ves-cli-example';
const COMPLETION_KEY = 'x-ves-cli-completion';

export interface CliMetadataStats {
  helpAdded: number;
  examplesAdded: number;
  completionsAdded: number;
  propertiesProcessed: number;
  schemasProcessed: number;
}

export interface CliMetadataResult {
  document: JsonObject;
  stats: CliMetadataStats;
}

interface CompiledRule {
  readonly matcher: RegExp;
  readonly rule: CompletionRule;
}

/** Canned example for a completion type, or undefined when it has none. */
function exampleFor(rule: CompletionRule): string | undefined {
  switch (rule.completionType) {
    case 'key-value-pairs':
      return `key${rule.separator ?? '='}value`;
    case 'namespace-list':
      return 'default';
    case 'file-path':
      return './example.yaml';
    default:
      return undefined;
  }
}

/**
 * Attaches shell-completion hints (`x-ves-cli-*`) to schema properties whose
 * names match the configured rules. Properties that already carry help or a
 * completion hint are left as they are.
 */
export class CLIMetadataEnricher {
  private readonly enabled: boolean;
  private readonly rules: readonly CompiledRule[];

  constructor(options: ResolvedOptions['cliMetadata']) {
    this.enabled = options.enabled;
    this.rules = compileRules(options.completionPatterns);
  }

  enrichSpec(document: JsonObject): CliMetadataResult {
    const stats: CliMetadataStats = {
      helpAdded: 0,
      examplesAdded: 0,
      completionsAdded: 0,
      propertiesProcessed: 0,
      schemasProcessed: 0,
    };
    if (!this.enabled) {
      return { document, stats };
    }
    const enriched = this.enrichNode(document, stats);
    return {
      document: isJsonObject(enriched) ? enriched : document,
      stats,
    };
  }

  private enrichNode(node: JsonValue, stats: CliMetadataStats): JsonValue {
    if (Array.isArray(node)) {
      return node.map((item) => this.enrichNode(item, stats));
    }
    if (!isJsonObject(node)) {
      return node;
    }

    const out: JsonObject = {};
    for (const [key, value] of Object.entries(node)) {
      if (key === 'properties' && isJsonObject(value)) {
        out[key] = this.enrichProperties(value, stats);
      } else if (key === 'schemas' && isJsonObject(value)) {
        const schemas: JsonObject = {};
        for (const [name, schema] of Object.entries(value)) {
          stats.schemasProcessed += 1;
          schemas[name] = this.enrichNode(schema, stats);
        }
        out[key] = schemas;
      } else {
        out[key] = this.enrichNode(value, stats);
      }
    }
    return out;
  }

  private enrichProperties(
    properties: JsonObject,
    stats: CliMetadataStats
  ): JsonObject {
    const out: JsonObject = {};
    for (const [name, property] of Object.entries(properties)) {
      stats.propertiesProcessed += 1;
      const enriched = this.enrichNode(property, stats);
      out[name] = isJsonObject(enriched)
        ? this.withCliMetadata(name, enriched, stats)
        : enriched;
    }
    return out;
  }

  private withCliMetadata(
    name: string,
    property: JsonObject,
    stats: CliMetadataStats
  ): JsonObject {
    if (hasKey(property, HELP_KEY) || hasKey(property, COMPLETION_KEY)) {
      return property;
    }

    const matching = this.matchingRules(name);
    const first = matching[0];
    const result: JsonObject = { ...property };

    if (first?.help) {
      result[HELP_KEY] = first.help;
      stats.helpAdded += 1;
    }

    const example = this.exampleFor(property, matching);
    if (example !== undefined) {
      result[EXAMPLE_KEY] = example;
      stats.examplesAdded += 1;
    }

    if (first?.completionType) {
      result[COMPLETION_KEY] = first.completionType;
      stats.completionsAdded += 1;
    }
    return result;
  }

  /** Enum properties use their first value; others the first rule with a canned example. */
  private exampleFor(
    property: JsonObject,
    matching: readonly CompletionRule[]
  ): JsonValue | undefined {
    const values = getArray(property, 'enum');
    if (values && values.length > 0) {
      return values[0];
    }
    for (const rule of matching) {
      const example = exampleFor(rule);
      if (example !== undefined) return example;
    }
    return undefined;
  }

  matchingRules(propertyName: string): CompletionRule[] {
    return this.rules
      .filter(({ matcher }) => matcher.test(propertyName))
      .map(({ rule }) => rule);
  }
}

/** Rules with an empty or unparseable pattern are dropped. */
function compileRules(rules: readonly CompletionRule[]): CompiledRule[] {
  const compiled: CompiledRule[] = [];
  for (const rule of rules) {
    if (!rule.pattern) {
      log.warn('dropping completion rule without a pattern', {
        completionType: rule.completionType,
      });
      continue;
    }
    try {
      compiled.push({ matcher: new RegExp(rule.pattern), rule });
    } catch (error) {
      log.warn('dropping completion rule with an invalid pattern', {
        pattern: rule.pattern,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
  return compiled;
}
