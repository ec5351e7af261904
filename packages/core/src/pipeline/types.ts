import type { SchemaFixStats } from '../transform/schema-fixer.js';
import type { ReconciliationReport } from '../transform/constraint-reconciler.js';
import type { DeprecatedTierStats } from '../transform/deprecated-tier-enricher.js';
import type { DescriptionStructureStats } from '../transform/description-structure.js';
import type { DescriptionValidationStats } from '../transform/description-validator.js';
import type { CliMetadataStats } from '../transform/cli-metadata-enricher.js';
import type { ReadOnlyStats } from '../transform/readonly-enricher.js';
import type { OperationMetadataStats } from '../transform/operation-metadata-enricher.js';
import type { TagGenerationStats } from '../transform/tag-generator.js';
import type { ConsistencyReport } from '../validator/consistency-validator.js';
import type { MetricsCollector, MetricsSnapshot } from '../util/metrics.js';
import type { JsonObject } from '../types/json.js';
import type { RefineOptions } from '../types/options.js';
import { ErrorCode } from '../errors/codes.js';
import { RefineryError } from '../types/errors.js';

/** Stats produced by each transform stage, keyed by stage name. */
export interface PipelineStageStats {
  schemaFix: SchemaFixStats;
  reconcile: ReconciliationReport;
  deprecatedTiers: DeprecatedTierStats;
  descriptionStructure: DescriptionStructureStats;
  descriptionValidation: DescriptionValidationStats;
  cliMetadata: CliMetadataStats;
  readOnly: ReadOnlyStats;
  operationMetadata: OperationMetadataStats;
  tags: TagGenerationStats;
}

export type PipelineStageName = keyof PipelineStageStats;

/** Fixed execution order; later stages rely on what earlier ones establish. */
export const STAGE_SEQUENCE = [
  'schemaFix',
  'reconcile',
  'deprecatedTiers',
  'descriptionStructure',
  'descriptionValidation',
  'cliMetadata',
  'readOnly',
  'operationMetadata',
  'tags',
] as const satisfies readonly PipelineStageName[];

export type PipelineStageStatus =
  | 'pending'
  | 'completed'
  | 'failed'
  | 'skipped';

export type PipelineStatus = 'completed' | 'failed';

export class PipelineStageError extends RefineryError {
  public readonly stage: PipelineStageName;

  constructor(stage: PipelineStageName, message: string, cause?: Error) {
    super({
      message,
      errorCode: ErrorCode.PIPELINE_STAGE_FAILED,
      context: { stage },
      cause,
    });
    this.stage = stage;
  }
}

export interface PipelineStageReport<TStats> {
  status: PipelineStageStatus;
  stats?: TStats;
  durationMs?: number;
  error?: PipelineStageError;
}

export type PipelineStages = {
  [K in PipelineStageName]: PipelineStageReport<PipelineStageStats[K]>;
};

export interface PipelineOptions {
  /** Merged over the defaults; resolved options pass through unchanged */
  options?: RefineOptions;
  /** Enables domain categorization of the document */
  filename?: string;
  collector?: MetricsCollector<PipelineStageName>;
  /** Clock for reconciliation timestamps */
  now?: () => Date;
}

export interface PipelineResult {
  status: PipelineStatus;
  document: JsonObject;
  /** Whether the output differs from the input (canonical JSON comparison) */
  changed: boolean;
  stages: PipelineStages;
  consistency: ConsistencyReport;
  /** Present when a filename was given */
  domain?: string;
  metrics: MetricsSnapshot<PipelineStageName>;
  errors: PipelineStageError[];
}
