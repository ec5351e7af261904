import type { ResolvedOptions } from '../types/options.js';
import {
  type JsonObject,
  type JsonValue,
  isJsonObject,
} from '../types/json.js';

/** Example syntaxes, tried in order; the first match supplies the value. */
const EXAMPLE_PATTERN_SOURCES = [
  '\\n*Example:\\s*`\\s*"([^"]+)"\\s*`\\n*',
  '\\n*Example:\\s*`([^`]+)`\\n*',
  '\\n*x-example:\\s*"([^"]+)"\\n*',
] as const;

const VALIDATION_PATTERN_SOURCE = '\\n*Validation Rules:\\n((?:\\s+[^\\n]+\\n?)+)';

const BULLET_LINE = /^\s+[*-]/;

interface CaseInsensitivePattern {
  /** For lookups */
  find: RegExp;
  /** For removal of every occurrence */
  all: RegExp;
}

function caseInsensitive(source: string): CaseInsensitivePattern {
  return { find: new RegExp(source, 'i'), all: new RegExp(source, 'gi') };
}

export interface DescriptionStructureStats {
  descriptionsProcessed: number;
  examplesExtracted: number;
  validationRulesExtracted: number;
}

export interface DescriptionStructureResult {
  document: JsonObject;
  stats: DescriptionStructureStats;
}

interface DescriptionParts {
  text: string;
  example?: string;
  rules?: Record<string, string>;
}

type StructureOptions = ResolvedOptions['descriptionStructure'];

/**
 * Moves "Validation Rules:" blocks and "Example:" snippets out of
 * description prose into `x-validation-rules` / `x-ves-example`, then
 * normalizes the remaining whitespace.
 *
 * Validation rules are extracted before any whitespace normalization,
 * since the block is recognized by the indentation of its lines.
 */
export class DescriptionStructureTransformer {
  private readonly examplePatterns = EXAMPLE_PATTERN_SOURCES.map(caseInsensitive);
  private readonly validationPattern = caseInsensitive(VALIDATION_PATTERN_SOURCE);
  private readonly preserveFields: ReadonlySet<string>;

  constructor(
    private readonly options: StructureOptions,
    preserveFields: readonly string[] = [],
    private readonly defaultTargetFields: readonly string[] = ['description']
  ) {
    this.preserveFields = new Set(preserveFields);
  }

  transform(
    document: JsonObject,
    targetFields: readonly string[] = this.defaultTargetFields
  ): DescriptionStructureResult {
    const stats: DescriptionStructureStats = {
      descriptionsProcessed: 0,
      examplesExtracted: 0,
      validationRulesExtracted: 0,
    };
    if (!this.options.enabled) {
      return { document, stats };
    }
    const targets = new Set(targetFields);
    const transformed = this.transformNode(document, targets, stats);
    return {
      document: isJsonObject(transformed) ? transformed : document,
      stats,
    };
  }

  private transformNode(
    node: JsonValue,
    targets: ReadonlySet<string>,
    stats: DescriptionStructureStats
  ): JsonValue {
    if (Array.isArray(node)) {
      return node.map((item) => this.transformNode(item, targets, stats));
    }
    if (!isJsonObject(node)) {
      return node;
    }

    const out: JsonObject = {};
    let example: string | undefined;
    let rules: Record<string, string> | undefined;

    for (const [key, value] of Object.entries(node)) {
      if (this.preserveFields.has(key)) {
        out[key] = value;
        continue;
      }
      if (!targets.has(key) || typeof value !== 'string') {
        out[key] = this.transformNode(value, targets, stats);
        continue;
      }
      if (key === 'description') {
        stats.descriptionsProcessed += 1;
        const parts = this.transformDescription(value, node['x-ves-example']);
        out[key] = parts.text;
        example = parts.example;
        rules = parts.rules;
      } else {
        out[key] = this.options.normalizeLeadingSpaces
          ? cleanupWhitespace(this.normalizeLeadingWhitespace(value))
          : value;
      }
    }

    if (example && !('x-ves-example' in out)) {
      out['x-ves-example'] = example;
      stats.examplesExtracted += 1;
    }
    if (rules) {
      out['x-validation-rules'] = rules;
      stats.validationRulesExtracted += 1;
    }
    return out;
  }

  /** Extraction and normalization for one description string. */
  transformDescription(
    description: string,
    existingExample?: JsonValue
  ): DescriptionParts {
    let text = description;
    let rules: Record<string, string> | undefined;
    let example: string | undefined;

    if (this.options.extractValidationRules) {
      ({ text, rules } = this.extractValidationSection(text));
    }
    if (this.options.extractExamples) {
      ({ text, example } = this.extractExampleSection(text, existingExample));
    }
    if (this.options.normalizeLeadingSpaces) {
      text = this.normalizeLeadingWhitespace(text);
    }
    return { text: cleanupWhitespace(text), example, rules };
  }

  private extractValidationSection(description: string): {
    text: string;
    rules?: Record<string, string>;
  } {
    const match = this.validationPattern.find.exec(description);
    const block = match?.[1];
    if (block === undefined) {
      return { text: description };
    }

    const rules: Record<string, string> = {};
    for (const rawLine of block.trim().split('\n')) {
      const line = rawLine.trim();
      const colon = line.indexOf(':');
      if (colon < 0) continue;
      const key = line.slice(0, colon).trim();
      if (key) {
        rules[key] = line.slice(colon + 1).trim();
      }
    }

    const found = Object.keys(rules).length > 0;
    const text =
      this.options.removeExtractedValidation && found
        ? description.replace(this.validationPattern.all, '\n')
        : description;
    return { text: text.trim(), rules: found ? rules : undefined };
  }

  private extractExampleSection(
    description: string,
    existingExample: JsonValue | undefined
  ): { text: string; example?: string } {
    let text = description;
    let example: string | undefined;
    const hasExisting = Boolean(existingExample);

    for (const pattern of this.examplePatterns) {
      const value = pattern.find.exec(text)?.[1];
      if (value === undefined) continue;
      if (!hasExisting && !example) {
        example = value.trim();
      }
      if (this.options.removeExtractedExamples) {
        text = text.replace(pattern.all, '\n');
      }
    }
    return { text: text.trim(), example };
  }

  /**
   * Trim every line, except bullet lines whose indentation is re-quantized
   * to two-space units. Blank lines stay as paragraph breaks.
   */
  normalizeLeadingWhitespace(text: string): string {
    return text
      .split('\n')
      .map((line) => {
        if (!line.trim()) return '';
        if (this.options.preserveBulletIndentation && BULLET_LINE.test(line)) {
          const stripped = line.trimStart();
          const depth = Math.floor((line.length - stripped.length) / 2);
          return '  '.repeat(depth) + stripped.trimEnd();
        }
        return line.trim();
      })
      .join('\n');
  }
}

export function cleanupWhitespace(text: string): string {
  return text
    .replace(/\n{3,}/g, '\n\n')
    .trim()
    .replace(/\. {2,}/g, '. ');
}
