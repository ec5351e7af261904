import { SchemaFixer } from '../transform/schema-fixer.js';
import { ConstraintReconciler } from '../transform/constraint-reconciler.js';
import { DeprecatedTierEnricher } from '../transform/deprecated-tier-enricher.js';
import { DescriptionStructureTransformer } from '../transform/description-structure.js';
import { DescriptionValidator } from '../transform/description-validator.js';
import { CLIMetadataEnricher } from '../transform/cli-metadata-enricher.js';
import { ReadOnlyEnricher } from '../transform/readonly-enricher.js';
import { OperationMetadataEnricher } from '../transform/operation-metadata-enricher.js';
import { TagGenerator } from '../transform/tag-generator.js';
import { ConsistencyValidator } from '../validator/consistency-validator.js';
import { DomainCategorizer } from '../categorize/domain-categorizer.js';
import { MetricsCollector } from '../util/metrics.js';
import { jsonEquals } from '../util/canonical-json.js';
import { createLogger } from '../util/logger.js';
import { type ResolvedOptions, resolveOptions } from '../types/options.js';
import type { JsonObject } from '../types/json.js';
import {
  type PipelineOptions,
  type PipelineResult,
  type PipelineStageName,
  type PipelineStageStats,
  type PipelineStages,
  PipelineStageError,
  STAGE_SEQUENCE,
} from './types.js';

const log = createLogger('pipeline');

interface StageOutput<TStats> {
  document: JsonObject;
  stats: TStats;
}

type StageRunners = {
  [K in PipelineStageName]: (
    document: JsonObject
  ) => StageOutput<PipelineStageStats[K]>;
};

export interface RefineryDeps {
  /** Clock for reconciliation timestamps */
  now?: () => Date;
}

export interface RunOptions {
  filename?: string;
  collector?: MetricsCollector<PipelineStageName>;
}

function createInitialStages(): PipelineStages {
  return {
    schemaFix: { status: 'pending' },
    reconcile: { status: 'pending' },
    deprecatedTiers: { status: 'pending' },
    descriptionStructure: { status: 'pending' },
    descriptionValidation: { status: 'pending' },
    cliMetadata: { status: 'pending' },
    readOnly: { status: 'pending' },
    operationMetadata: { status: 'pending' },
    tags: { status: 'pending' },
  };
}

function toPipelineStageError(
  stage: PipelineStageName,
  throwable: unknown
): PipelineStageError {
  if (throwable instanceof PipelineStageError) {
    return throwable;
  }
  if (throwable instanceof Error) {
    return new PipelineStageError(stage, throwable.message, throwable);
  }
  return new PipelineStageError(stage, String(throwable));
}

function markRemainingStagesAsSkipped(
  stages: PipelineStages,
  failedStage: PipelineStageName
): void {
  const failedIndex = STAGE_SEQUENCE.indexOf(failedStage);
  for (const stageName of STAGE_SEQUENCE.slice(failedIndex + 1)) {
    const stage = stages[stageName];
    if (stage.status === 'pending') {
      stage.status = 'skipped';
    }
  }
}

/**
 * The transform chain, built once from resolved options and reusable across
 * documents. Components hold only immutable configuration.
 */
export class Refinery {
  private readonly runners: StageRunners;
  private readonly consistencyOptions: ResolvedOptions['consistencyValidation'];
  private readonly categorizer: DomainCategorizer;
  private readonly continueOnError: boolean;

  constructor(
    readonly options: Readonly<ResolvedOptions>,
    deps: RefineryDeps = {}
  ) {
    const fixer = new SchemaFixer(options.schemaFixes);
    const reconciler = new ConstraintReconciler(options.reconciliation, {
      now: deps.now,
    });
    const tiers = new DeprecatedTierEnricher(options.deprecatedTiers);
    const structure = new DescriptionStructureTransformer(
      options.descriptionStructure,
      options.preserveFields,
      options.targetFields
    );
    const descriptions = new DescriptionValidator(options.descriptionValidation);
    const cli = new CLIMetadataEnricher(options.cliMetadata);
    const readOnly = new ReadOnlyEnricher(options.readOnly);
    const operations = new OperationMetadataEnricher(options.operationMetadata);
    const tags = new TagGenerator(options.tags);

    this.runners = {
      schemaFix: (document) => fixer.fix(document),
      reconcile: (document) => {
        const { document: reconciled, report } = reconciler.reconcile(document);
        return { document: reconciled, stats: report };
      },
      deprecatedTiers: (document) => tiers.enrich(document),
      descriptionStructure: (document) => structure.transform(document),
      descriptionValidation: (document) =>
        descriptions.validateAndGenerate(document),
      cliMetadata: (document) => cli.enrichSpec(document),
      readOnly: (document) => readOnly.enrich(document),
      operationMetadata: (document) => operations.enrich(document),
      tags: (document) => tags.generateTags(document),
    };
    this.consistencyOptions = options.consistencyValidation;
    this.categorizer = new DomainCategorizer(options.domains);
    this.continueOnError = options.processing.continueOnError;
  }

  categorize(filename: string): string {
    return this.categorizer.categorize(filename);
  }

  run(input: JsonObject, runOptions: RunOptions = {}): PipelineResult {
    const metrics =
      runOptions.collector ?? new MetricsCollector<PipelineStageName>();
    const stages = createInitialStages();
    const errors: PipelineStageError[] = [];
    let document = input;

    for (const stage of STAGE_SEQUENCE) {
      const outcome = this.runStage(stage, document, stages, metrics);
      if (outcome instanceof PipelineStageError) {
        errors.push(outcome);
        log.warn('stage failed', {
          stage,
          file: runOptions.filename,
          message: outcome.message,
        });
        if (!this.continueOnError) {
          markRemainingStagesAsSkipped(stages, stage);
          break;
        }
      } else {
        document = outcome;
      }
    }

    // A fresh validator per run: it keeps the issues of its last run.
    const validator = new ConsistencyValidator(this.consistencyOptions);
    validator.validate(document);

    return {
      status: errors.length > 0 ? 'failed' : 'completed',
      document,
      changed: !jsonEquals(input, document),
      stages,
      consistency: validator.getReport(),
      domain:
        runOptions.filename === undefined
          ? undefined
          : this.categorize(runOptions.filename),
      metrics: metrics.snapshotMetrics(),
      errors,
    };
  }

  private runStage<K extends PipelineStageName>(
    stage: K,
    document: JsonObject,
    stages: PipelineStages,
    metrics: MetricsCollector<PipelineStageName>
  ): JsonObject | PipelineStageError {
    const report = stages[stage];
    metrics.begin(stage);
    try {
      const output = this.runners[stage](document);
      report.status = 'completed';
      report.stats = output.stats;
      return output.document;
    } catch (error) {
      const stageError = toPipelineStageError(stage, error);
      report.status = 'failed';
      report.error = stageError;
      return stageError;
    } finally {
      report.durationMs = metrics.end(stage);
    }
  }
}

/**
 * Runs every transform over one document in the fixed order, then the
 * consistency check, and the domain categorizer when a filename is given.
 *
 * The input document is never modified.
 *
 * @throws {ConfigurationError} When `options` does not resolve
 */
export function runPipeline(
  document: JsonObject,
  pipelineOptions: PipelineOptions = {}
): PipelineResult {
  const refinery = new Refinery(resolveOptions(pipelineOptions.options), {
    now: pipelineOptions.now,
  });
  return refinery.run(document, {
    filename: pipelineOptions.filename,
    collector: pipelineOptions.collector,
  });
}
