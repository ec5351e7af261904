import { describe, expect, it } from 'vitest';

import { builtinDomainDefinitions, builtinTagDefinitions } from '../tables.js';

describe('built-in tables', () => {
  it('loads the tag table in order with Other last', () => {
    const tags = builtinTagDefinitions();

    expect(tags).toHaveLength(21);
    expect(tags[0]?.name).toBe('API Security');
    expect(tags.at(-1)).toEqual({
      name: 'Other',
      description: 'Miscellaneous operations',
      patterns: [],
    });
  });

  it('loads the domain table in order', () => {
    const domains = builtinDomainDefinitions();

    expect(domains).toHaveLength(31);
    expect(domains[0]?.domain).toBe('site_management');
    expect(domains.every(({ patterns }) => patterns.length > 0)).toBe(true);
  });

  it('caches the parsed tables', () => {
    expect(builtinTagDefinitions()).toBe(builtinTagDefinitions());
  });
});
