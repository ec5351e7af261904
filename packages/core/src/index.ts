/**
 * specrefine core: enrichment transforms for OpenAPI documents, the
 * pipeline that chains them and the corpus runner.
 */

// Transforms
export {
  SchemaFixer,
  type SchemaFixStats,
  type SchemaFixResult,
} from './transform/schema-fixer.js';
export {
  ConstraintReconciler,
  DISCOVERED_FIELD_MAPPING,
  isTighter,
  type ReconciliationReport,
  type ReconciliationStats,
  type ReconcileResult,
  type ConstraintReconcilerDeps,
} from './transform/constraint-reconciler.js';
export {
  DeprecatedTierEnricher,
  type DeprecatedTierStats,
  type DeprecatedTierResult,
} from './transform/deprecated-tier-enricher.js';
export {
  DescriptionStructureTransformer,
  cleanupWhitespace,
  type DescriptionStructureStats,
  type DescriptionStructureResult,
} from './transform/description-structure.js';
export {
  DescriptionValidator,
  describeFromOperationId,
  describeFromPath,
  describeFromSchemaName,
  formatResourceName,
  splitCamelCase,
  type DescriptionValidationStats,
  type DescriptionValidationResult,
  type MissingDescriptionReport,
  type MissingOperationDescription,
  type MissingSchemaDescription,
} from './transform/description-validator.js';
export {
  CLIMetadataEnricher,
  type CliMetadataStats,
  type CliMetadataResult,
} from './transform/cli-metadata-enricher.js';
export {
  ReadOnlyEnricher,
  type ReadOnlyStats,
  type ReadOnlyResult,
} from './transform/readonly-enricher.js';
export {
  OperationMetadataEnricher,
  domainOf,
  resourceTypeOf,
  type CliExample,
  type OperationMetadataStats,
  type OperationMetadataResult,
} from './transform/operation-metadata-enricher.js';
export {
  TagGenerator,
  FALLBACK_TAG,
  mergeTagDefinitions,
  type TagGenerationStats,
  type TagGenerationResult,
} from './transform/tag-generator.js';

// Analysis
export {
  ConsistencyValidator,
  type ConsistencyIssue,
  type ConsistencyReport,
  type ConsistencyStats,
  type IssueCategory,
} from './validator/consistency-validator.js';
export {
  DomainCategorizer,
  type CategorizationSummary,
} from './categorize/domain-categorizer.js';
export {
  builtinDomainDefinitions,
  builtinTagDefinitions,
  type DomainDefinition,
  type TagDefinition,
} from './data/tables.js';

// Pipeline
export { Refinery, runPipeline, type RunOptions } from './pipeline/orchestrator.js';
export {
  PipelineStageError,
  STAGE_SEQUENCE,
  type PipelineOptions,
  type PipelineResult,
  type PipelineStageName,
  type PipelineStageReport,
  type PipelineStageStats,
  type PipelineStageStatus,
  type PipelineStages,
  type PipelineStatus,
} from './pipeline/types.js';
export {
  listSpecFiles,
  readSpecFile,
  runCorpus,
  type CorpusFileResult,
  type CorpusRunOptions,
  type CorpusRunReport,
  type CorpusTotals,
} from './pipeline/corpus-harness.js';

// Configuration
export {
  CONFIG_FILENAMES,
  findConfigFile,
  loadConfig,
  loadConfigOrDefaults,
  toRefineOptions,
} from './config/loader.js';
export {
  DANGER_LEVELS,
  DEFAULT_OPTIONS,
  ISSUE_SEVERITIES,
  RECONCILIATION_MODES,
  resolveOptions,
  type DangerLevel,
  type IssueSeverity,
  type ReconciliationMode,
  type RefineOptions,
  type ResolvedOptions,
} from './types/options.js';

// Errors, results, JSON model
export { ErrorCode, EXIT_CODES, getExitCode, type Severity } from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';
export {
  ConfigurationError,
  InternalError,
  ParseError,
  RefineryError,
  isRefineryError,
  toError,
  type ErrorContext,
  type SerializedError,
} from './types/errors.js';
export { Err, Ok, err, ok, isErr, isOk, type Result } from './types/result.js';
export {
  cloneJson,
  isJsonObject,
  toJsonValue,
  type JsonObject,
  type JsonValue,
} from './types/json.js';

// Utilities
export { createLogger, setLogLevel, Logger, type LogLevel } from './util/logger.js';
export { MetricsCollector, type MetricsSnapshot } from './util/metrics.js';
export { canonicalize, jsonEquals } from './util/canonical-json.js';
