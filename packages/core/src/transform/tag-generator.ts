import type { ResolvedOptions } from '../types/options.js';
import {
  type JsonObject,
  type JsonValue,
  cloneJson,
  getArray,
  isJsonObject,
} from '../types/json.js';
import { listOperations } from '../openapi/operations.js';
import { PatternTable } from '../util/pattern-table.js';
import { type TagDefinition, builtinTagDefinitions } from '../data/tables.js';

export const FALLBACK_TAG = 'Other';

export interface TagGenerationStats {
  operationsTagged: number;
  tagsGenerated: number;
}

export interface TagGenerationResult {
  document: JsonObject;
  stats: TagGenerationStats;
}

/**
 * Apply config overrides to a tag table: a known name is updated in place,
 * an unknown name is appended.
 */
export function mergeTagDefinitions(
  base: readonly TagDefinition[],
  overrides: ResolvedOptions['tags']['tagDefinitions']
): TagDefinition[] {
  const merged = base.map((definition) => ({
    ...definition,
    patterns: [...definition.patterns],
  }));
  for (const [name, override] of Object.entries(overrides)) {
    const existing = merged.find((definition) => definition.name === name);
    if (existing) {
      if (override.description !== undefined) {
        existing.description = override.description;
      }
      if (override.patterns !== undefined) {
        existing.patterns = [...override.patterns];
      }
    } else {
      merged.push({
        name,
        description: override.description,
        patterns: [...(override.patterns ?? [])],
      });
    }
  }
  return merged;
}

/**
 * Tags each operation with the functional area of its path and rebuilds
 * the document's top-level `tags` list.
 *
 * A path gets the first tag, in table order, with any pattern found in the
 * path (case-insensitive); unmatched paths get 'Other'. All operations of a
 * path share its tag.
 */
export class TagGenerator {
  private readonly definitions: readonly TagDefinition[];
  private readonly descriptions: ReadonlyMap<string, string>;
  private readonly table: PatternTable;

  constructor(
    private readonly options: ResolvedOptions['tags'],
    baseDefinitions: readonly TagDefinition[] = builtinTagDefinitions()
  ) {
    this.definitions = mergeTagDefinitions(
      baseDefinitions,
      options.tagDefinitions
    );
    this.descriptions = new Map(
      this.definitions.flatMap(({ name, description }) =>
        description ? [[name, description] as const] : []
      )
    );
    this.table = new PatternTable(
      this.definitions
        .filter(({ name }) => name !== FALLBACK_TAG)
        .map(({ name, patterns }) => ({ label: name, patterns })),
      { flags: 'i', tableName: 'tags' }
    );
  }

  tagForPath(path: string): string {
    return this.table.matchOr(path, FALLBACK_TAG);
  }

  generateTags(document: JsonObject): TagGenerationResult {
    const stats: TagGenerationStats = { operationsTagged: 0, tagsGenerated: 0 };
    if (!this.options.enabled) {
      return { document, stats };
    }

    const result = cloneJson(document);
    if (this.options.assignToOperations) {
      this.assignOperationTags(result, stats);
    }
    if (this.options.generateMetadata) {
      result.tags = this.buildTagMetadata(result, stats);
    }
    return { document: result, stats };
  }

  private assignOperationTags(
    document: JsonObject,
    stats: TagGenerationStats
  ): void {
    const tagsByPath = new Map<string, string>();
    for (const { path, operation } of listOperations(document)) {
      let tag = tagsByPath.get(path);
      if (tag === undefined) {
        tag = this.tagForPath(path);
        tagsByPath.set(path, tag);
      }
      const existing = getArray(operation, 'tags') ?? [];
      if (!existing.includes(tag)) {
        operation.tags = [tag, ...existing];
        stats.operationsTagged += 1;
      }
    }
  }

  private buildTagMetadata(
    document: JsonObject,
    stats: TagGenerationStats
  ): JsonValue[] {
    const declared = new Map<string, JsonObject>();
    for (const entry of getArray(document, 'tags') ?? []) {
      if (isJsonObject(entry) && typeof entry.name === 'string' && entry.name) {
        declared.set(entry.name, entry);
      }
    }

    const names = new Set<string>(declared.keys());
    for (const { operation } of listOperations(document)) {
      for (const tag of getArray(operation, 'tags') ?? []) {
        if (typeof tag === 'string') names.add(tag);
      }
    }

    return [...names].sort().map((name) => {
      const entry: JsonObject = { ...declared.get(name), name };
      const description = this.descriptions.get(name);
      if (description) {
        entry.description = description;
        stats.tagsGenerated += 1;
      }
      return entry;
    });
  }
}
