import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { CorpusRunReport } from '@specrefine/core';

import { formatCorpusSummary, runEnrichCommand } from '../commands/enrich.js';
import {
  runCategorizeCommand,
  runDescriptionsCommand,
  runValidateCommand,
} from '../commands/inspect.js';

let workDir: string;
let stdout: string[];

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), 'specrefine-cli-'));
  stdout = [];
  vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
    stdout.push(String(chunk));
    return true;
  });
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(workDir, { recursive: true, force: true });
});

function printed(): unknown {
  return JSON.parse(stdout.join(''));
}

async function writeSpec(name: string, spec: unknown): Promise<string> {
  const path = join(workDir, name);
  await writeFile(path, JSON.stringify(spec));
  return path;
}

describe('enrich', () => {
  beforeEach(async () => {
    const input = join(workDir, 'in');
    await mkdir(input);
    await writeFile(
      join(input, 'aws_vpc_site.json'),
      JSON.stringify({ paths: { '/x': { get: { operationId: 'getX' } } } })
    );
    await writeFile(join(input, 'broken.json'), '{');
    await writeFile(
      join(workDir, 'specrefine.yaml'),
      'processing:\n  parallelWorkers: 1\n'
    );
  });

  it('prints a summary and writes the report', async () => {
    const reportPath = join(workDir, 'report.json');
    const code = await runEnrichCommand({
      input: join(workDir, 'in'),
      output: join(workDir, 'out'),
      config: join(workDir, 'specrefine.yaml'),
      report: reportPath,
    });

    expect(code).toBe(0);
    expect(stdout.join('')).toBe(
      'Processed 2 spec(s): 1 enriched, 1 failed, 1 changed\n  failed: broken.json\n'
    );
    const report: unknown = JSON.parse(await readFile(reportPath, 'utf8'));
    expect(report).toMatchObject({
      totals: { files: 2, enriched: 1, failed: 1, changed: 1, stageErrors: 0 },
      domains: { site_management: 1, other: 1 },
    });
  });

  it('exits 1 on failures with --fail-on-error', async () => {
    const code = await runEnrichCommand({
      input: join(workDir, 'in'),
      output: join(workDir, 'out'),
      config: join(workDir, 'specrefine.yaml'),
      failOnError: true,
    });

    expect(code).toBe(1);
  });
});

describe('formatCorpusSummary', () => {
  it('lists stage failures per file', () => {
    const report: CorpusRunReport = {
      inputDir: '/in',
      outputDir: '/out',
      files: [
        {
          file: 'a.json',
          domain: 'other',
          status: 'enriched',
          changed: true,
          failedStages: ['reconcile', 'tags'],
          issues: { errors: 0, warnings: 0, info: 0 },
          durationMs: 1,
          errors: [],
        },
      ],
      totals: { files: 1, enriched: 1, failed: 0, changed: 1, stageErrors: 2 },
      domains: { other: 1 },
    };

    expect(formatCorpusSummary(report)).toBe(
      [
        'Processed 1 spec(s): 1 enriched, 0 failed, 1 changed',
        'Stage errors: 2',
        '  a.json: reconcile, tags failed',
        '',
      ].join('\n')
    );
  });
});

describe('validate', () => {
  it('prints the report and exits 1 when errors were found', async () => {
    const file = await writeSpec('dup.json', {
      paths: {
        '/a': { get: { operationId: 'x' } },
        '/b': { get: { operationId: 'x' } },
      },
    });

    const code = await runValidateCommand(file, {
      config: join(workDir, 'none.yaml'),
      severity: 'error',
    });

    expect(code).toBe(1);
    expect(printed()).toEqual({
      file,
      summary: {
        totalIssues: 1,
        errors: 1,
        warnings: 0,
        info: 0,
        byCategory: { parameter: 0, schema: 0, operationId: 1, deprecation: 0 },
      },
      issues: [
        {
          severity: 'error',
          category: 'operationId',
          message: "Duplicate operationId 'x' used in 2 operations",
          location: 'GET /a; GET /b',
          suggestion: 'Each operation must have a unique operationId',
        },
      ],
    });
  });

  it('exits 0 when only warnings were found', async () => {
    const file = await writeSpec('warn.json', { paths: { '/a': { get: {} } } });

    expect(await runValidateCommand(file, {})).toBe(0);
  });
});

describe('descriptions', () => {
  it('lists operations and schemas without a description', async () => {
    const file = await writeSpec('spec.json', {
      paths: { '/a': { post: { operationId: 'createA' } } },
      components: { schemas: { A: { type: 'object' } } },
    });

    expect(await runDescriptionsCommand(file, {})).toBe(0);
    expect(printed()).toEqual({
      file,
      operations: [{ path: '/a', method: 'POST', operationId: 'createA' }],
      schemas: [{ name: 'A', type: 'object' }],
      totals: { operations: 1, schemas: 1 },
    });
  });
});

describe('categorize', () => {
  it('categorizes the basenames of the given paths', async () => {
    expect(
      await runCategorizeCommand(['specs/aws_vpc_site.json', 'readme.json'], {})
    ).toBe(0);
    expect(printed()).toEqual({
      domains: {
        'aws_vpc_site.json': 'site_management',
        'readme.json': 'other',
      },
      summary: {
        categorization: {
          site_management: ['aws_vpc_site.json'],
          other: ['readme.json'],
        },
        uncategorized: ['readme.json'],
        totalSpecs: 2,
        categorized: 1,
        domainsUsed: 2,
      },
    });
  });

  it('reads the file list from --dir', async () => {
    await writeSpec('k8s_cluster.json', {});

    await runCategorizeCommand([], { dir: workDir });

    expect(printed()).toMatchObject({
      domains: { 'k8s_cluster.json': 'site_management' },
    });
  });
});
