import type { Dirent } from 'node:fs';
import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { performance } from 'node:perf_hooks';

import { Refinery } from './orchestrator.js';
import type { PipelineResult, PipelineStageName } from './types.js';
import { ErrorCode } from '../errors/codes.js';
import {
  InternalError,
  ParseError,
  type SerializedError,
  toError,
} from '../types/errors.js';
import { type JsonObject, isJsonObject, toJsonValue } from '../types/json.js';
import { type RefineOptions, resolveOptions } from '../types/options.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('corpus');

export interface CorpusRunOptions {
  inputDir: string;
  outputDir: string;
  options?: RefineOptions;
  /** Clock for reconciliation timestamps */
  now?: () => Date;
  /**
   * Called once per file, in completion order. A throw is recorded in that
   * file's `errors` and does not stop the run.
   */
  onFile?: (result: CorpusFileResult) => void;
}

export type CorpusFileStatus = 'enriched' | 'failed';

export interface CorpusFileResult {
  file: string;
  domain: string;
  status: CorpusFileStatus;
  /** Whether the written document differs from the input */
  changed: boolean;
  /** Stages that threw, in order */
  failedStages: PipelineStageName[];
  issues: { errors: number; warnings: number; info: number };
  durationMs: number;
  errors: SerializedError[];
}

export interface CorpusTotals {
  files: number;
  enriched: number;
  failed: number;
  changed: number;
  stageErrors: number;
}

export interface CorpusRunReport {
  inputDir: string;
  outputDir: string;
  /** Sorted by file name */
  files: CorpusFileResult[];
  totals: CorpusTotals;
  /** Number of files per domain */
  domains: Record<string, number>;
}

/**
 * `*.json` directly under `dir`, sorted by name.
 *
 * @throws {ParseError} With IO_ERROR when the directory cannot be read
 */
export async function listSpecFiles(dir: string): Promise<string[]> {
  let dirents: Dirent[];
  try {
    dirents = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    throw new ParseError({
      message: `Cannot read directory ${dir}`,
      errorCode: ErrorCode.IO_ERROR,
      context: { file: dir },
      cause: toError(error),
    });
  }
  return dirents
    .filter((dirent) => dirent.isFile() && dirent.name.endsWith('.json'))
    .map((dirent) => dirent.name)
    .sort();
}

/**
 * Reads and parses one spec file.
 *
 * @throws {ParseError} When the file cannot be read, is not JSON, or its root is not an object
 */
export async function readSpecFile(path: string): Promise<JsonObject> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ParseError({
      message: `Cannot read ${path}`,
      errorCode: ErrorCode.IO_ERROR,
      context: { file: path },
      cause: toError(error),
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ParseError({
      message: `Invalid JSON in ${path}`,
      context: { file: path },
      cause: toError(error),
    });
  }

  const document = toJsonValue(parsed);
  if (!isJsonObject(document)) {
    throw new ParseError({
      message: `Root of ${path} is not a JSON object`,
      context: { file: path },
    });
  }
  return document;
}

function serializeDocument(document: JsonObject, indent: number): string {
  return `${JSON.stringify(document, null, indent)}\n`;
}

/** Runs `task` over `items` with at most `limit` tasks in flight. */
async function forEachBounded<T>(
  items: readonly T[],
  limit: number,
  task: (item: T) => Promise<void>
): Promise<void> {
  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const item = items[next];
      next += 1;
      if (item !== undefined) {
        await task(item);
      }
    }
  };
  const workers = Array.from(
    { length: Math.max(1, Math.min(limit, items.length)) },
    worker
  );
  await Promise.all(workers);
}

/**
 * Enriches every `*.json` spec in `inputDir` and writes the results under
 * the same names in `outputDir`.
 *
 * Files that cannot be parsed or written are recorded as failures; the
 * run continues with the remaining files.
 *
 * @throws {ConfigurationError} When `options` does not resolve
 */
export async function runCorpus(
  runOptions: CorpusRunOptions
): Promise<CorpusRunReport> {
  const options = resolveOptions(runOptions.options);
  const refinery = new Refinery(options, { now: runOptions.now });
  const inputDir = resolve(runOptions.inputDir);
  const outputDir = resolve(runOptions.outputDir);

  const fileNames = await listSpecFiles(inputDir);
  await mkdir(outputDir, { recursive: true });
  log.info('corpus run started', {
    inputDir,
    outputDir,
    files: fileNames.length,
  });

  const results = new Map<string, CorpusFileResult>();
  await forEachBounded(
    fileNames,
    options.processing.parallelWorkers,
    async (file) => {
      const result = await processFile(file);
      results.set(file, result);
      notify(result);
    }
  );

  function notify(result: CorpusFileResult): void {
    try {
      runOptions.onFile?.(result);
    } catch (error) {
      const failure = new InternalError({
        message: `onFile callback failed for ${result.file}`,
        context: { file: result.file },
        cause: toError(error),
      });
      log.error('onFile callback failed', { file: result.file, error });
      result.errors.push(failure.toJSON('prod'));
    }
  }

  async function processFile(file: string): Promise<CorpusFileResult> {
    const startedAt = performance.now();
    const domain = refinery.categorize(file);
    let document: JsonObject;
    try {
      document = await readSpecFile(join(inputDir, file));
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      log.warn('skipping unreadable spec', { file, message: error.message });
      return {
        file,
        domain,
        status: 'failed',
        changed: false,
        failedStages: [],
        issues: { errors: 0, warnings: 0, info: 0 },
        durationMs: performance.now() - startedAt,
        errors: [error.toJSON('prod')],
      };
    }

    const pipeline: PipelineResult = refinery.run(document, { filename: file });
    const { summary } = pipeline.consistency;
    const result: CorpusFileResult = {
      file,
      domain,
      status: 'enriched',
      changed: pipeline.changed,
      failedStages: pipeline.errors.map((error) => error.stage),
      issues: {
        errors: summary.errors,
        warnings: summary.warnings,
        info: summary.info,
      },
      durationMs: 0,
      errors: pipeline.errors.map((error) => error.toJSON('prod')),
    };

    const target = join(outputDir, file);
    try {
      await writeFile(
        target,
        serializeDocument(pipeline.document, options.processing.jsonIndent),
        'utf8'
      );
    } catch (error) {
      const failure = new ParseError({
        message: `Cannot write ${target}`,
        errorCode: ErrorCode.IO_ERROR,
        context: { file: target },
        cause: toError(error),
      });
      log.warn('could not write enriched spec', {
        file,
        message: failure.message,
      });
      result.status = 'failed';
      result.changed = false;
      result.errors.push(failure.toJSON('prod'));
    }

    result.durationMs = performance.now() - startedAt;
    return result;
  }

  const files = fileNames.flatMap((file) => {
    const result = results.get(file);
    return result ? [result] : [];
  });
  const report: CorpusRunReport = {
    inputDir,
    outputDir,
    files,
    totals: {
      files: files.length,
      enriched: files.filter((file) => file.status === 'enriched').length,
      failed: files.filter((file) => file.status === 'failed').length,
      changed: files.filter((file) => file.changed).length,
      stageErrors: files.reduce(
        (sum, file) => sum + file.failedStages.length,
        0
      ),
    },
    domains: {},
  };
  for (const file of files) {
    report.domains[file.domain] = (report.domains[file.domain] ?? 0) + 1;
  }

  log.info('corpus run finished', { ...report.totals });
  return report;
}
