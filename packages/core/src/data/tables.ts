import { readFileSync } from 'node:fs';

import { ConfigurationError } from '../types/errors.js';
import { type JsonObject, isJsonObject, toJsonValue } from '../types/json.js';

/** packages/core/data, next to src/ */
const DATA_DIR = new URL('../../data/', import.meta.url);

export interface TagDefinition {
  name: string;
  description?: string;
  patterns: string[];
}

export interface DomainDefinition {
  domain: string;
  patterns: string[];
}

function readTable(fileName: string): unknown[] {
  const url = new URL(fileName, DATA_DIR);
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(url, 'utf8'));
  } catch (error) {
    throw new ConfigurationError({
      message: `Cannot read built-in table ${fileName}`,
      context: { file: url.pathname },
      cause: error instanceof Error ? error : undefined,
    });
  }
  if (!Array.isArray(parsed)) {
    throw new ConfigurationError({
      message: `Built-in table ${fileName} must be a JSON array`,
      context: { file: url.pathname },
    });
  }
  return parsed;
}

function stringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const strings = value.filter((item): item is string => typeof item === 'string');
  return strings.length === value.length ? strings : undefined;
}

let tagDefinitions: readonly TagDefinition[] | undefined;
let domainDefinitions: readonly DomainDefinition[] | undefined;

/** Ordered tag table; 'Other' is the pattern-less fallback entry. */
export function builtinTagDefinitions(): readonly TagDefinition[] {
  tagDefinitions ??= readTable('tag-definitions.json').map((entry, index) => {
    const node = toJsonValue(entry);
    const fields: JsonObject = isJsonObject(node) ? node : {};
    const { name, description } = fields;
    const patterns = stringList(fields.patterns);
    if (typeof name !== 'string' || !patterns) {
      throw new ConfigurationError({
        message: `tag-definitions.json entry ${index} is malformed`,
        context: { configPath: `tags[${index}]` },
      });
    }
    return {
      name,
      description: typeof description === 'string' ? description : undefined,
      patterns,
    };
  });
  return tagDefinitions;
}

/** Ordered filename → domain table. */
export function builtinDomainDefinitions(): readonly DomainDefinition[] {
  domainDefinitions ??= readTable('domain-patterns.json').map(
    (entry, index) => {
      const node = toJsonValue(entry);
      const fields: JsonObject = isJsonObject(node) ? node : {};
      const { domain } = fields;
      const patterns = stringList(fields.patterns);
      if (typeof domain !== 'string' || !patterns) {
        throw new ConfigurationError({
          message: `domain-patterns.json entry ${index} is malformed`,
          context: { configPath: `domains[${index}]` },
        });
      }
      return { domain, patterns };
    }
  );
  return domainDefinitions;
}
