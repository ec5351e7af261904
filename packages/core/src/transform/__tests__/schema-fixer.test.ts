import fc from 'fast-check';
import { describe, expect, it } from 'vitest';

import { DEFAULT_OPTIONS } from '../../types/options.js';
import { getSchemas } from '../../openapi/operations.js';
import { type JsonObject, isJsonObject } from '../../types/json.js';
import { SchemaFixer } from '../schema-fixer.js';

const fixer = new SchemaFixer(DEFAULT_OPTIONS.schemaFixes);

describe('SchemaFixer', () => {
  it('injects the implied type as the first key', () => {
    const { document, stats } = fixer.fix({
      components: {
        schemas: {
          Id: { format: 'int64', description: 'identifier' },
        },
      },
    });

    expect(stats.fixesApplied).toBe(1);
    const id = { type: 'integer', format: 'int64', description: 'identifier' };
    expect(document).toEqual({ components: { schemas: { Id: id } } });
    const fixed = getSchemas(document)?.Id;
    expect(Object.keys(isJsonObject(fixed) ? fixed : {})).toEqual([
      'type',
      'format',
      'description',
    ]);
  });

  it('maps unknown formats to string, case-insensitively for known ones', () => {
    const { document } = fixer.fix({
      a: { format: 'DOUBLE' },
      b: { format: 'ipv4-cidr' },
    });

    expect(document).toEqual({
      a: { type: 'number', format: 'DOUBLE' },
      b: { type: 'string', format: 'ipv4-cidr' },
    });
  });

  it.each([
    ['type', { type: 'string', format: 'uuid' }],
    ['$ref', { $ref: '#/components/schemas/X', format: 'uuid' }],
    ['allOf', { allOf: [], format: 'uuid' }],
    ['oneOf', { oneOf: [], format: 'uuid' }],
    ['anyOf', { anyOf: [], format: 'uuid' }],
  ])('leaves nodes with %s alone', (_keyword, node: JsonObject) => {
    const { document, stats } = fixer.fix({ node });

    expect(stats.fixesApplied).toBe(0);
    expect(document).toEqual({ node });
  });

  it('ignores a non-string format', () => {
    const { stats } = fixer.fix({ weird: { format: 3 } });
    expect(stats.fixesApplied).toBe(0);
  });

  it('walks arrays and nested nodes', () => {
    const { document, stats } = fixer.fix({
      parameters: [{ schema: { format: 'float' } }, { schema: { format: 'date' } }],
    });

    expect(stats.fixesApplied).toBe(2);
    expect(document).toEqual({
      parameters: [
        { schema: { type: 'number', format: 'float' } },
        { schema: { type: 'string', format: 'date' } },
      ],
    });
  });

  it('honours extra mappings and the disable switch', () => {
    const custom = new SchemaFixer({
      fixFormatWithoutType: true,
      formatTypeMappings: { Flag: 'boolean' },
    });
    expect(custom.typeForFormat('flag')).toBe('boolean');

    const disabled = new SchemaFixer({
      fixFormatWithoutType: false,
      formatTypeMappings: {},
    });
    expect(disabled.fix({ a: { format: 'int32' } }).stats.fixesApplied).toBe(0);
  });

  it('does not modify its input', () => {
    const input: JsonObject = { a: { format: 'int32' } };
    fixer.fix(input);
    expect(input).toEqual({ a: { format: 'int32' } });
  });

  it('is idempotent', () => {
    const schemaNode = fc.letrec((tie) => ({
      node: fc.record(
        {
          format: fc.constantFrom('int32', 'uuid', 'float', 'custom'),
          type: fc.constant('string'),
          description: fc.string(),
          items: tie('node'),
        },
        { requiredKeys: [] }
      ),
    })).node;

    fc.assert(
      fc.property(fc.array(schemaNode, { maxLength: 4 }), (nodes) => {
        const input: JsonObject = JSON.parse(JSON.stringify({ nodes }));
        const once = fixer.fix(input).document;
        const twice = fixer.fix(once);
        expect(twice.document).toEqual(once);
        expect(twice.stats.fixesApplied).toBe(0);
      })
    );
  });
});
