import { describe, expect, it } from 'vitest';

import { ConfigurationError } from '../errors.js';
import { DEFAULT_OPTIONS, type FieldRule, resolveOptions } from '../options.js';

describe('resolveOptions', () => {
  it('returns the defaults for empty input', () => {
    expect(resolveOptions()).toEqual(DEFAULT_OPTIONS);
  });

  it('merges a section one level deep', () => {
    const resolved = resolveOptions({
      reconciliation: { mode: 'tighten' },
      processing: { parallelWorkers: 2 },
    });

    expect(resolved.reconciliation.mode).toBe('tighten');
    expect(resolved.reconciliation.confidenceThreshold).toBe(0.8);
    expect(resolved.processing).toEqual({
      parallelWorkers: 2,
      continueOnError: true,
      jsonIndent: 2,
    });
  });

  it('replaces list-valued keys rather than appending', () => {
    const resolved = resolveOptions({
      deprecatedTiers: { patterns: ['.*Plan$'] },
      targetFields: ['summary'],
    });

    expect(resolved.deprecatedTiers.patterns).toEqual(['.*Plan$']);
    expect(resolved.targetFields).toEqual(['summary']);
    expect(resolved.preserveFields).toEqual(DEFAULT_OPTIONS.preserveFields);
  });

  it('freezes the result deeply', () => {
    const resolved = resolveOptions();

    expect(Object.isFrozen(resolved)).toBe(true);
    expect(Object.isFrozen(resolved.cliMetadata.completionPatterns)).toBe(true);
    expect(Object.isFrozen(DEFAULT_OPTIONS)).toBe(false);
  });

  it('leaves the defaults and the caller input unfrozen and detached', () => {
    const maxLengthRule: FieldRule = { mode: 'tighten' };
    const fieldRules = { maxLength: maxLengthRule };
    const preserveFields = ['operationId'];
    const resolved = resolveOptions({
      reconciliation: { fieldRules },
      preserveFields,
    });

    expect(Object.isFrozen(fieldRules)).toBe(false);
    expect(Object.isFrozen(preserveFields)).toBe(false);
    expect(Object.isFrozen(DEFAULT_OPTIONS.cliMetadata.completionPatterns)).toBe(
      false
    );

    preserveFields.push('$ref');
    maxLengthRule.mode = 'replace';
    expect(resolved.preserveFields).toEqual(['operationId']);
    expect(resolved.reconciliation.fieldRules).toEqual({
      maxLength: { mode: 'tighten' },
    });
  });

  it.each([
    [{ reconciliation: { confidenceThreshold: 1.5 } }, 'reconciliation.confidenceThreshold'],
    [{ reconciliation: { minSampleSize: -1 } }, 'reconciliation.minSampleSize'],
    [{ processing: { parallelWorkers: 0 } }, 'processing.parallelWorkers'],
    [{ processing: { jsonIndent: 11 } }, 'processing.jsonIndent'],
    [{ domains: { fallback: '' } }, 'domains.fallback'],
    [{ operationMetadata: { maxExamples: -1 } }, 'operationMetadata.maxExamples'],
  ])('rejects %j at %s', (input, configPath) => {
    try {
      resolveOptions(input);
      expect.unreachable('resolveOptions should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.configPath).toBe(configPath);
      }
    }
  });

  it('rejects an unknown field rule mode', () => {
    expect(() =>
      resolveOptions({
        reconciliation: {
          fieldRules: JSON.parse('{"maxLength":{"mode":"loosen"}}'),
        },
      })
    ).toThrow('reconciliation.fieldRules.maxLength.mode must be one of');
  });

  it('rejects an unknown danger level', () => {
    expect(() =>
      resolveOptions({
        operationMetadata: {
          escalationPatterns: JSON.parse('[{"pattern":"DELETE","level":"severe"}]'),
        },
      })
    ).toThrow('operationMetadata.escalationPatterns.0.level must be one of');
  });
});
