import { describe, expect, it } from 'vitest';

import { DEFAULT_OPTIONS } from '../../types/options.js';
import { builtinTagDefinitions } from '../../data/tables.js';
import {
  FALLBACK_TAG,
  TagGenerator,
  mergeTagDefinitions,
} from '../tag-generator.js';

const generator = new TagGenerator(DEFAULT_OPTIONS.tags);

const document = {
  paths: {
    '/api/waf/rules': { get: {}, post: { tags: ['Custom'] } },
    '/misc': { get: { tags: ['Other'] } },
  },
  tags: [{ name: 'Custom', 'x-display': 'c' }],
};

describe('TagGenerator', () => {
  it('tags paths by the first matching entry of the built-in table', () => {
    expect(generator.tagForPath('/api/x/http_loadbalancer/items')).toBe(
      'Load Balancing'
    );
    expect(generator.tagForPath('/API/WAF/rules')).toBe('Security');
    expect(generator.tagForPath('/web/unknown')).toBe(FALLBACK_TAG);
  });

  it('prefers the earlier entry when patterns of two tags match', () => {
    const custom = new TagGenerator(DEFAULT_OPTIONS.tags, [
      { name: 'Security', patterns: ['/network_firewall/'] },
      { name: 'Networking', patterns: ['/network_'] },
    ]);

    expect(custom.tagForPath('/api/network_firewall/x')).toBe('Security');
    expect(custom.tagForPath('/api/network_policy/x')).toBe('Networking');
  });

  it('prepends the path tag and rebuilds top-level metadata', () => {
    const { document: tagged, stats } = generator.generateTags(document);

    expect(tagged).toEqual({
      paths: {
        '/api/waf/rules': {
          get: { tags: ['Security'] },
          post: { tags: ['Security', 'Custom'] },
        },
        '/misc': { get: { tags: ['Other'] } },
      },
      tags: [
        { name: 'Custom', 'x-display': 'c' },
        { name: 'Other', description: 'Miscellaneous operations' },
        {
          name: 'Security',
          description: 'WAF, firewall policies, bot defense, and access control',
        },
      ],
    });
    expect(stats).toEqual({ operationsTagged: 2, tagsGenerated: 2 });
  });

  it('applies config overrides before lookup', () => {
    const custom = new TagGenerator({
      ...DEFAULT_OPTIONS.tags,
      tagDefinitions: { Custom: { description: 'Custom ops', patterns: ['/misc'] } },
    });
    const { document: tagged } = custom.generateTags(document);

    expect(tagged.paths).toEqual({
      '/api/waf/rules': {
        get: { tags: ['Security'] },
        post: { tags: ['Security', 'Custom'] },
      },
      '/misc': { get: { tags: ['Custom', 'Other'] } },
    });
    expect(tagged.tags).toContainEqual({
      name: 'Custom',
      'x-display': 'c',
      description: 'Custom ops',
    });
  });

  it('honours the assignment and metadata switches', () => {
    const metadataOnly = new TagGenerator({
      ...DEFAULT_OPTIONS.tags,
      assignToOperations: false,
    });
    expect(metadataOnly.generateTags(document).stats.operationsTagged).toBe(0);

    const assignOnly = new TagGenerator({
      ...DEFAULT_OPTIONS.tags,
      generateMetadata: false,
    });
    expect(assignOnly.generateTags(document).document.tags).toEqual(document.tags);

    const disabled = new TagGenerator({ ...DEFAULT_OPTIONS.tags, enabled: false });
    expect(disabled.generateTags(document).document).toBe(document);
  });

  it('is idempotent', () => {
    const once = generator.generateTags(document).document;
    const twice = generator.generateTags(once);

    expect(twice.document).toEqual(once);
    expect(twice.stats.operationsTagged).toBe(0);
  });
});

describe('mergeTagDefinitions', () => {
  it('updates known names in place and appends new ones', () => {
    const merged = mergeTagDefinitions(builtinTagDefinitions(), {
      Billing: { patterns: ['/charges/'] },
      Edge: { description: 'Edge compute' },
    });
    const billing = merged.find((definition) => definition.name === 'Billing');

    expect(billing).toEqual({
      name: 'Billing',
      description: 'Billing, invoices, payments, and usage tracking',
      patterns: ['/charges/'],
    });
    expect(merged.at(-1)).toEqual({
      name: 'Edge',
      description: 'Edge compute',
      patterns: [],
    });
    expect(merged).toHaveLength(builtinTagDefinitions().length + 1);
  });

  it('leaves the base table unchanged', () => {
    mergeTagDefinitions(builtinTagDefinitions(), { Billing: { patterns: [] } });
    expect(
      builtinTagDefinitions().find((definition) => definition.name === 'Billing')
        ?.patterns
    ).toContain('/billing/');
  });
});
