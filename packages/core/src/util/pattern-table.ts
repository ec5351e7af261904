import { ConfigurationError } from '../types/errors.js';
import { ErrorCode } from '../errors/codes.js';

export interface PatternTableSource<TLabel extends string = string> {
  label: TLabel;
  patterns: readonly string[];
}

export interface PatternTableEntry<TLabel extends string = string> {
  readonly label: TLabel;
  readonly patterns: readonly RegExp[];
}

export interface CompileOptions {
  /** RegExp flags applied to every pattern (default: '') */
  flags?: string;
  /** Name used in error messages, e.g. 'tags' or 'domains' */
  tableName?: string;
}

/**
 * Compile a single pattern, reporting the table and label it came from
 * when it does not parse.
 */
export function compilePattern(
  source: string,
  flags = '',
  where = 'pattern'
): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (error) {
    throw new ConfigurationError({
      message: `Invalid regular expression in ${where}: ${source}`,
      errorCode: ErrorCode.INVALID_PATTERN,
      context: { configPath: where, value: source },
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Ordered (label, patterns) list with first-match-wins lookup.
 *
 * Order is part of the contract: when a subject matches patterns under
 * two labels, the label registered first is returned.
 */
export class PatternTable<TLabel extends string = string> {
  private readonly entries: readonly PatternTableEntry<TLabel>[];

  constructor(
    sources: readonly PatternTableSource<TLabel>[],
    options: CompileOptions = {}
  ) {
    const flags = options.flags ?? '';
    const tableName = options.tableName ?? 'pattern table';
    this.entries = Object.freeze(
      sources.map((source) =>
        Object.freeze({
          label: source.label,
          patterns: Object.freeze(
            source.patterns.map((pattern) =>
              compilePattern(pattern, flags, `${tableName}.${source.label}`)
            )
          ),
        })
      )
    );
  }

  get labels(): TLabel[] {
    return this.entries.map((entry) => entry.label);
  }

  get size(): number {
    return this.entries.length;
  }

  /** First label with any pattern found in `subject`, or undefined. */
  match(subject: string): TLabel | undefined {
    for (const entry of this.entries) {
      if (entry.patterns.some((pattern) => pattern.test(subject))) {
        return entry.label;
      }
    }
    return undefined;
  }

  matchOr<TFallback extends string>(
    subject: string,
    fallback: TFallback
  ): TLabel | TFallback {
    return this.match(subject) ?? fallback;
  }
}
