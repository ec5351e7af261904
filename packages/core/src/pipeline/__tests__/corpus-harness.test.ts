import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import { ParseError } from '../../types/errors.js';
import {
  type CorpusFileResult,
  listSpecFiles,
  readSpecFile,
  runCorpus,
} from '../corpus-harness.js';

const NOW = new Date('2024-05-01T12:00:00.000Z');

const SITE_SPEC = { paths: { '/x': { get: { operationId: 'getX' } } } };

const ENRICHED_SITE_SPEC = {
  paths: {
    '/x': {
      get: {
        operationId: 'getX',
        description: 'Get X.',
        'x-ves-danger-level': 'low',
        'x-ves-cli-examples': [
          {
            description: 'List all xs',
            command: 'f5xcctl default x list --namespace {namespace}',
            use_case: 'list_all',
          },
        ],
        tags: ['Other'],
      },
    },
  },
  tags: [{ name: 'Other', description: 'Miscellaneous operations' }],
};

let workDir: string;
let inputDir: string;
let outputDir: string;

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), 'specrefine-corpus-'));
  inputDir = join(workDir, 'in');
  outputDir = join(workDir, 'out', 'nested');
  await mkdir(join(inputDir, 'subdir.json'), { recursive: true });
  await writeFile(join(inputDir, 'aws_vpc_site.json'), JSON.stringify(SITE_SPEC));
  await writeFile(join(inputDir, 'broken.json'), '{not json');
  await writeFile(join(inputDir, 'array.json'), '[1, 2]');
  await writeFile(join(inputDir, 'notes.txt'), 'ignored');
});

afterEach(async () => {
  await rm(workDir, { recursive: true, force: true });
});

describe('listSpecFiles', () => {
  it('lists only JSON files, sorted', async () => {
    expect(await listSpecFiles(inputDir)).toEqual([
      'array.json',
      'aws_vpc_site.json',
      'broken.json',
    ]);
  });
});

describe('listSpecFiles errors', () => {
  it('raises an IO error for a missing directory', async () => {
    const missing = join(workDir, 'missing');
    const error = await listSpecFiles(missing).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ParseError);
    if (error instanceof ParseError) {
      expect(error.errorCode).toBe(ErrorCode.IO_ERROR);
      expect(error.message).toBe(`Cannot read directory ${missing}`);
    }
  });
});

describe('readSpecFile', () => {
  it('parses an object document', async () => {
    expect(await readSpecFile(join(inputDir, 'aws_vpc_site.json'))).toEqual(
      SITE_SPEC
    );
  });

  it('raises an IO error for a missing file', async () => {
    const missing = join(inputDir, 'missing.json');
    const error = await readSpecFile(missing).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ParseError);
    if (error instanceof ParseError) {
      expect(error.errorCode).toBe(ErrorCode.IO_ERROR);
      expect(error.file).toBe(missing);
    }
  });

  it('rejects invalid JSON and non-object roots', async () => {
    await expect(readSpecFile(join(inputDir, 'broken.json'))).rejects.toThrow(
      `Invalid JSON in ${join(inputDir, 'broken.json')}`
    );
    await expect(readSpecFile(join(inputDir, 'array.json'))).rejects.toThrow(
      `Root of ${join(inputDir, 'array.json')} is not a JSON object`
    );
  });
});

describe('runCorpus', () => {
  it('enriches parseable files and records the others as failures', async () => {
    const seen: CorpusFileResult[] = [];
    const report = await runCorpus({
      inputDir,
      outputDir,
      now: () => NOW,
      onFile: (result) => seen.push(result),
    });

    expect(report.files.map((file) => [file.file, file.status])).toEqual([
      ['array.json', 'failed'],
      ['aws_vpc_site.json', 'enriched'],
      ['broken.json', 'failed'],
    ]);
    expect(report.totals).toEqual({
      files: 3,
      enriched: 1,
      failed: 2,
      changed: 1,
      stageErrors: 0,
    });
    expect(report.domains).toEqual({ other: 2, site_management: 1 });
    expect(seen).toHaveLength(3);

    expect(await readdir(outputDir)).toEqual(['aws_vpc_site.json']);
    const written = await readFile(join(outputDir, 'aws_vpc_site.json'), 'utf8');
    expect(written).toBe(`${JSON.stringify(ENRICHED_SITE_SPEC, null, 2)}\n`);
  });

  it('records the parse error of a failed file', async () => {
    const report = await runCorpus({ inputDir, outputDir });
    const broken = report.files.find((file) => file.file === 'broken.json');

    expect(broken).toMatchObject({
      domain: 'other',
      changed: false,
      failedStages: [],
      issues: { errors: 0, warnings: 0, info: 0 },
    });
    expect(broken?.errors).toHaveLength(1);
    expect(broken?.errors[0]).toMatchObject({
      name: 'ParseError',
      errorCode: ErrorCode.PARSE_ERROR,
      message: `Invalid JSON in ${join(inputDir, 'broken.json')}`,
    });
    expect(broken?.errors[0]?.stack).toBeUndefined();
  });

  it('writes with the configured indentation and worker count', async () => {
    await runCorpus({
      inputDir,
      outputDir,
      now: () => NOW,
      options: { processing: { jsonIndent: 0, parallelWorkers: 1 } },
    });

    const written = await readFile(join(outputDir, 'aws_vpc_site.json'), 'utf8');
    expect(written).toBe(`${JSON.stringify(ENRICHED_SITE_SPEC)}\n`);
  });

  it('records an unwritable output as a failure and keeps going', async () => {
    await writeFile(join(inputDir, 'billing.json'), JSON.stringify(SITE_SPEC));
    await mkdir(join(outputDir, 'aws_vpc_site.json'), { recursive: true });

    const report = await runCorpus({ inputDir, outputDir, now: () => NOW });

    expect(report.totals).toEqual({
      files: 4,
      enriched: 1,
      failed: 3,
      changed: 1,
      stageErrors: 0,
    });
    const site = report.files.find((file) => file.file === 'aws_vpc_site.json');
    expect(site).toMatchObject({ status: 'failed', changed: false });
    expect(site?.errors).toHaveLength(1);
    expect(site?.errors[0]).toMatchObject({
      name: 'ParseError',
      errorCode: ErrorCode.IO_ERROR,
      message: `Cannot write ${join(outputDir, 'aws_vpc_site.json')}`,
    });

    const written = await readFile(join(outputDir, 'billing.json'), 'utf8');
    expect(written).toBe(`${JSON.stringify(ENRICHED_SITE_SPEC, null, 2)}\n`);
  });

  it('records a throwing onFile callback against its file', async () => {
    const report = await runCorpus({
      inputDir,
      outputDir,
      onFile: (result) => {
        if (result.file === 'aws_vpc_site.json') {
          throw new Error('listener broke');
        }
      },
    });

    expect(report.totals.files).toBe(3);
    const site = report.files.find((file) => file.file === 'aws_vpc_site.json');
    expect(site?.status).toBe('enriched');
    expect(site?.errors).toEqual([
      {
        name: 'InternalError',
        message: 'onFile callback failed for aws_vpc_site.json',
        errorCode: ErrorCode.INTERNAL_ERROR,
        severity: 'error',
        context: { file: 'aws_vpc_site.json' },
        cause: { name: 'Error', message: 'listener broke' },
      },
    ]);
  });

  it('handles an empty input directory', async () => {
    const emptyDir = join(workDir, 'empty');
    await mkdir(emptyDir);

    const report = await runCorpus({ inputDir: emptyDir, outputDir });

    expect(report.files).toEqual([]);
    expect(report.totals.files).toBe(0);
  });
});
