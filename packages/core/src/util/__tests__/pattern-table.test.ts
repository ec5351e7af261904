import { describe, expect, it } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import { ConfigurationError } from '../../types/errors.js';
import { PatternTable, compilePattern } from '../pattern-table.js';

describe('PatternTable', () => {
  const table = new PatternTable(
    [
      { label: 'security', patterns: ['waf', 'firewall'] },
      { label: 'networking', patterns: ['network', 'firewall'] },
    ],
    { tableName: 'demo' }
  );

  it('returns the first label whose pattern matches', () => {
    expect(table.match('network_firewall')).toBe('security');
    expect(table.match('network_policy')).toBe('networking');
  });

  it('falls back when nothing matches', () => {
    expect(table.match('dns_zone')).toBeUndefined();
    expect(table.matchOr('dns_zone', 'other')).toBe('other');
  });

  it('exposes labels in registration order', () => {
    expect(table.labels).toEqual(['security', 'networking']);
    expect(table.size).toBe(2);
  });

  it('applies flags to every pattern', () => {
    const insensitive = new PatternTable(
      [{ label: 'lb', patterns: ['loadbalancer'] }],
      { flags: 'i' }
    );
    expect(insensitive.match('/http_LoadBalancer')).toBe('lb');
  });

  it('reports an invalid pattern with its table and label', () => {
    try {
      new PatternTable([{ label: 'broken', patterns: ['(unclosed'] }], {
        tableName: 'domains',
      });
      expect.unreachable('constructor should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.errorCode).toBe(ErrorCode.INVALID_PATTERN);
        expect(error.configPath).toBe('domains.broken');
        expect(error.message).toBe(
          'Invalid regular expression in domains.broken: (unclosed'
        );
      }
    }
  });

  it('compilePattern uses a generic location by default', () => {
    expect(() => compilePattern('[')).toThrow(
      'Invalid regular expression in pattern: ['
    );
  });
});
