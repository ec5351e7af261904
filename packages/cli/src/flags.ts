import {
  ConfigurationError,
  ISSUE_SEVERITIES,
  type IssueSeverity,
  type RefineOptions,
  type ResolvedOptions,
} from '@specrefine/core';

/**
 * Options of `specrefine enrich`, as Commander hands them over.
 */
export interface EnrichCliOptions {
  input: string;
  output: string;
  config?: string;
  report?: string;
  workers?: string;
  failOnError?: boolean;
}

export interface ValidateCliOptions {
  config?: string;
  severity?: string;
}

export interface CategorizeCliOptions {
  config?: string;
  dir?: string;
}

export function parsePositiveInt(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError({
      message: `${flag} must be a positive integer`,
      context: { configPath: flag, value },
    });
  }
  return parsed;
}

export function parseSeverity(value: string): IssueSeverity {
  const severity = ISSUE_SEVERITIES.find((candidate) => candidate === value);
  if (!severity) {
    throw new ConfigurationError({
      message: `--severity must be one of ${ISSUE_SEVERITIES.join(', ')}`,
      context: { configPath: '--severity', value },
    });
  }
  return severity;
}

/** Flags override the matching config file values. */
export function applyEnrichFlags(
  options: Readonly<ResolvedOptions>,
  flags: EnrichCliOptions
): RefineOptions {
  return {
    ...options,
    processing: {
      ...options.processing,
      ...(flags.workers !== undefined
        ? { parallelWorkers: parsePositiveInt(flags.workers, '--workers') }
        : {}),
    },
  };
}
