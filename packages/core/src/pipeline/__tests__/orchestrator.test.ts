import { afterEach, describe, expect, it, vi } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import { SchemaFixer } from '../../transform/schema-fixer.js';
import { TagGenerator } from '../../transform/tag-generator.js';
import type { JsonObject } from '../../types/json.js';
import { resolveOptions } from '../../types/options.js';
import { MetricsCollector } from '../../util/metrics.js';
import { Refinery, runPipeline } from '../orchestrator.js';
import { type PipelineStageName, STAGE_SEQUENCE } from '../types.js';

const NOW = new Date('2024-05-01T12:00:00.000Z');
const LB_PATH = '/api/v1/namespace/{namespace}/http_loadbalancer';

function sampleSpec(): JsonObject {
  return {
    openapi: '3.0.3',
    paths: {
      [LB_PATH]: {
        get: {
          responses: {
            '200': {
              description: 'ok',
              content: {
                'application/json': {
                  schema: { $ref: '#/components/schemas/viewsCreateSpec' },
                },
              },
            },
          },
        },
      },
    },
    components: {
      schemas: {
        schemaAddonServiceTierType: { type: 'string', enum: ['BASIC', 'STANDARD'] },
        viewsCreateSpec: {
          type: 'object',
          properties: {
            namespace: { type: 'string' },
            port: {
              format: 'int32',
              'x-discovered-maximum': 65535,
              'x-discovered-sample-size': 10,
              description: 'Port.\nExample: `8080`',
            },
          },
        },
      },
    },
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('runPipeline', () => {
  it('runs every stage in order and enriches the document', () => {
    const result = runPipeline(sampleSpec(), {
      filename: 'ves.io.schema.views.http_loadbalancer.json',
      now: () => NOW,
    });

    expect(result.status).toBe('completed');
    expect(result.changed).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.domain).toBe('virtual_server');
    expect(Object.keys(result.metrics.phases)).toEqual([...STAGE_SEQUENCE]);

    expect(result.document.paths).toEqual({
      [LB_PATH]: {
        get: {
          responses: {
            '200': {
              description: 'ok',
              content: {
                'application/json': {
                  schema: { $ref: '#/components/schemas/viewsCreateSpec' },
                },
              },
            },
          },
          description: 'Get HTTP loadbalancer.',
          'x-ves-danger-level': 'low',
          'x-ves-cli-examples': [
            {
              description: 'List all http-loadbalancers',
              command: 'f5xcctl v1 http-loadbalancer list --namespace {namespace}',
              use_case: 'list_all',
            },
          ],
          tags: ['Identity'],
        },
      },
    });
    expect(result.document.tags).toEqual([
      {
        name: 'Identity',
        description: 'Identity, access management, users, roles, and credentials',
      },
    ]);
    expect(result.document.components).toEqual({
      schemas: {
        schemaAddonServiceTierType: { type: 'string', enum: ['STANDARD'] },
        viewsCreateSpec: {
          type: 'object',
          properties: {
            namespace: {
              type: 'string',
              'x-ves-cli-help': 'Kubernetes namespace',
              'x-ves-cli-example': 'default',
              'x-ves-cli-completion': 'namespace-list',
            },
            port: {
              type: 'integer',
              format: 'int32',
              'x-discovered-sample-size': 10,
              description: 'Port.',
              maximum: 65535,
              'x-reconciled-from-discovery': true,
              'x-reconciled-at': '2024-05-01T12:00:00.000Z',
              'x-reconciled-sample-size': 10,
              'x-ves-example': '8080',
            },
          },
        },
      },
    });
  });

  it('reports the stats of each stage', () => {
    const { stages } = runPipeline(sampleSpec(), { now: () => NOW });

    for (const stage of STAGE_SEQUENCE) {
      expect(stages[stage].status).toBe('completed');
    }
    expect(stages.schemaFix.stats).toEqual({ fixesApplied: 1 });
    expect(stages.reconcile.stats?.statistics).toEqual({
      reconciled: 1,
      skipped: 0,
      preserved: 1,
      fields: { maximum: 1 },
    });
    expect(stages.deprecatedTiers.stats).toEqual({
      schemasProcessed: 2,
      schemasTransformed: 1,
      valuesTransformed: 1,
      descriptionsUpdated: 0,
      cliExamplesFixed: 0,
    });
    expect(stages.descriptionStructure.stats).toEqual({
      descriptionsProcessed: 2,
      examplesExtracted: 1,
      validationRulesExtracted: 0,
    });
    expect(stages.descriptionValidation.stats).toEqual({
      operationsMissing: 1,
      operationsGenerated: 1,
      schemasMissing: 0,
      schemasGenerated: 0,
    });
    expect(stages.cliMetadata.stats).toEqual({
      helpAdded: 1,
      examplesAdded: 1,
      completionsAdded: 1,
      propertiesProcessed: 2,
      schemasProcessed: 2,
    });
    expect(stages.readOnly.stats).toEqual({
      metadataFieldsMarked: 0,
      objectRefFieldsMarked: 0,
      totalFieldsMarked: 0,
      schemasProcessed: 2,
      schemasMatched: 0,
      metadataSchemasMatched: 0,
      objectRefSchemasMatched: 0,
      fieldsByName: {},
    });
    expect(stages.operationMetadata.stats).toEqual({
      operationsEnriched: 1,
      requiredFieldsAdded: 0,
      dangerLevelsAssigned: 1,
      examplesGenerated: 1,
      sideEffectsDocumented: 0,
    });
    expect(stages.tags.stats).toEqual({ operationsTagged: 1, tagsGenerated: 1 });
  });

  it('runs the consistency check on the enriched document', () => {
    const { consistency } = runPipeline(sampleSpec(), { now: () => NOW });

    expect(consistency.summary.totalIssues).toBe(1);
    expect(consistency.issues).toEqual([
      {
        severity: 'warning',
        category: 'operationId',
        message: 'Operation missing operationId',
        location: `paths.${LB_PATH}.get`,
        suggestion: 'Add operationId for better SDK generation',
      },
    ]);
  });

  it('never modifies its input and settles after one run', () => {
    const input = sampleSpec();
    const first = runPipeline(input, { now: () => NOW });

    expect(input).toEqual(sampleSpec());

    const second = runPipeline(first.document, { now: () => NOW });
    expect(second.changed).toBe(false);
    expect(second.document).toEqual(first.document);
  });

  it('reports disabled transforms as completed with empty stats', () => {
    const { stages } = runPipeline(sampleSpec(), {
      options: { tags: { enabled: false } },
    });

    expect(stages.tags).toMatchObject({
      status: 'completed',
      stats: { operationsTagged: 0, tagsGenerated: 0 },
    });
  });

  it('keeps going after a failed stage by default', () => {
    vi.spyOn(SchemaFixer.prototype, 'fix').mockImplementation(() => {
      throw new Error('boom');
    });

    const result = runPipeline(sampleSpec(), { now: () => NOW });

    expect(result.status).toBe('failed');
    expect(result.stages.schemaFix.status).toBe('failed');
    expect(result.stages.tags.status).toBe('completed');
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.stage).toBe('schemaFix');
    expect(result.errors[0]?.errorCode).toBe(ErrorCode.PIPELINE_STAGE_FAILED);
    expect(result.errors[0]?.message).toBe('boom');
    expect(result.stages.schemaFix.error).toBe(result.errors[0]);
  });

  it('skips the remaining stages when continueOnError is off', () => {
    vi.spyOn(SchemaFixer.prototype, 'fix').mockImplementation(() => {
      throw new Error('boom');
    });

    const input = sampleSpec();
    const result = runPipeline(input, {
      options: { processing: { continueOnError: false } },
    });

    expect(result.stages.schemaFix.status).toBe('failed');
    for (const stage of STAGE_SEQUENCE.slice(1)) {
      expect(result.stages[stage].status).toBe('skipped');
    }
    expect(result.document).toBe(input);
    expect(result.changed).toBe(false);
    expect(result.errors.map((error) => error.stage)).toEqual(['schemaFix']);
  });

  it('wraps non-Error throwables', () => {
    vi.spyOn(TagGenerator.prototype, 'generateTags').mockImplementation(() => {
      throw 'not an error';
    });

    const { errors, stages } = runPipeline(sampleSpec());

    expect(errors[0]?.message).toBe('not an error');
    expect(stages.tags.status).toBe('failed');
  });
});

describe('Refinery', () => {
  it('records stage durations on a supplied collector', () => {
    let clock = 0;
    const collector = new MetricsCollector<PipelineStageName>({
      now: () => (clock += 1),
    });
    const refinery = new Refinery(resolveOptions(), { now: () => NOW });

    const result = refinery.run(sampleSpec(), { collector });

    expect(result.metrics.totalMs).toBe(9);
    expect(result.stages.reconcile.durationMs).toBe(1);
  });

  it('is reusable across documents', () => {
    const refinery = new Refinery(resolveOptions(), { now: () => NOW });

    const first = refinery.run(sampleSpec());
    const second = refinery.run(sampleSpec());

    expect(second.document).toEqual(first.document);
    expect(refinery.categorize('aws_vpc_site.json')).toBe('site_management');
  });
});
