import { describe, expect, it } from 'vitest';

import * as api from '../index.js';

describe('public API', () => {
  it('exposes the pipeline entry points', () => {
    expect(typeof api.runPipeline).toBe('function');
    expect(typeof api.runCorpus).toBe('function');
    expect(typeof api.loadConfig).toBe('function');
    expect(api.STAGE_SEQUENCE).toEqual([
      'schemaFix',
      'reconcile',
      'deprecatedTiers',
      'descriptionStructure',
      'descriptionValidation',
      'cliMetadata',
      'readOnly',
      'operationMetadata',
      'tags',
    ]);
  });

  it('runs a document end to end through the exported function', () => {
    const result = api.runPipeline({
      paths: { '/api/waf/rules': { get: { operationId: 'listRules' } } },
    });

    expect(result.status).toBe('completed');
    expect(result.document.paths).toEqual({
      '/api/waf/rules': {
        get: {
          operationId: 'listRules',
          description: 'List rules.',
          'x-ves-danger-level': 'low',
          'x-ves-cli-examples': [
            {
              description: 'List all rules',
              command: 'f5xcctl waf rule list --namespace {namespace}',
              use_case: 'list_all',
            },
          ],
          tags: ['Security'],
        },
      },
    });
  });
});
