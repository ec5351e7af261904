import type { ResolvedOptions } from '../types/options.js';
import { PatternTable } from '../util/pattern-table.js';
import { type DomainDefinition, builtinDomainDefinitions } from '../data/tables.js';

export interface CategorizationSummary {
  /** Domain → filenames, for domains with at least one file */
  categorization: Record<string, string[]>;
  uncategorized: string[];
  totalSpecs: number;
  categorized: number;
  domainsUsed: number;
}

/**
 * Maps spec filenames to functional domains with an ordered regex table.
 * Filenames are lower-cased before matching; the first domain in table
 * order with a matching pattern wins.
 */
export class DomainCategorizer {
  private readonly definitions: readonly DomainDefinition[];
  private readonly table: PatternTable;
  private readonly fallback: string;

  constructor(options: ResolvedOptions['domains']) {
    this.definitions =
      options.table.length > 0 ? options.table : builtinDomainDefinitions();
    this.fallback = options.fallback;
    this.table = new PatternTable(
      this.definitions.map(({ domain, patterns }) => ({
        label: domain,
        patterns,
      })),
      { tableName: 'domains' }
    );
  }

  categorize(filename: string): string {
    return this.table.matchOr(filename.toLowerCase(), this.fallback);
  }

  getDomainPatterns(): Record<string, string[]> {
    const patterns: Record<string, string[]> = {};
    for (const { domain, patterns: list } of this.definitions) {
      patterns[domain] = [...list];
    }
    return patterns;
  }

  getAllDomains(): string[] {
    return [...new Set(this.definitions.map(({ domain }) => domain))].sort();
  }

  summarizeCategorization(filenames: readonly string[]): CategorizationSummary {
    const categorization: Record<string, string[]> = {};
    const uncategorized: string[] = [];

    for (const filename of filenames) {
      const domain = this.categorize(filename);
      if (domain === this.fallback) {
        uncategorized.push(filename);
      }
      (categorization[domain] ??= []).push(filename);
    }

    return {
      categorization,
      uncategorized,
      totalSpecs: filenames.length,
      categorized: filenames.length - uncategorized.length,
      domainsUsed: Object.keys(categorization).length,
    };
  }
}
