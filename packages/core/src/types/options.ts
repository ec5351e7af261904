/* eslint-disable max-lines */
/**
 * Configuration options for the refinement pipeline.
 *
 * Every section is optional in user input; `resolveOptions` fills in the
 * defaults below and rejects values outside their allowed range. Resolved
 * options are frozen and handed to each component's constructor.
 */

import { ConfigurationError } from './errors.js';

export type ReconciliationMode = 'replace' | 'add_missing' | 'tighten';

export const RECONCILIATION_MODES: readonly ReconciliationMode[] = [
  'replace',
  'add_missing',
  'tighten',
];

export type IssueSeverity = 'info' | 'warning' | 'error';

export const ISSUE_SEVERITIES: readonly IssueSeverity[] = [
  'info',
  'warning',
  'error',
];

/** JSON Schema primitive types a `format` can imply */
export type FormatImpliedType = 'string' | 'integer' | 'number' | 'boolean';

export interface SchemaFixOptions {
  /** Inject `type` into nodes that carry only a `format` (default: true) */
  fixFormatWithoutType?: boolean;
  /** Extra format → type entries, merged over the built-in table (default: {}) */
  formatTypeMappings?: Record<string, FormatImpliedType>;
}

export interface FieldRule {
  /** Mode for this standard field, overriding the global mode */
  mode?: ReconciliationMode;
}

export interface ReconciliationOptions {
  /** (default: true) */
  enabled?: boolean;
  /** Global reconciliation mode (default: 'replace') */
  mode?: ReconciliationMode;
  /** Nodes with a lower x-discovered-confidence are skipped (default: 0.8) */
  confidenceThreshold?: number;
  /** Nodes with a positive sample size below this are skipped (default: 5) */
  minSampleSize?: number;
  /** Per standard field overrides, keyed by field name (default: {}) */
  fieldRules?: Record<string, FieldRule>;
  /** Write x-original-* and x-reconciled-* markers (default: true) */
  auditEnabled?: boolean;
}

export interface DeprecatedTierOptions {
  /** (default: true) */
  enabled?: boolean;
  /** Deprecated value → current value (default: BASIC→STANDARD, PREMIUM→ADVANCED) */
  transformations?: Record<string, string>;
  /** Schema name patterns, matched from the start of the name */
  patterns?: string[];
  /** Literal substring replacements applied to example commands, in order */
  cliReplacements?: Record<string, string>;
}

export interface DescriptionStructureOptions {
  /** (default: true) */
  enabled?: boolean;
  /** (default: true) */
  normalizeLeadingSpaces?: boolean;
  /** Re-quantize bullet indentation to two-space units (default: true) */
  preserveBulletIndentation?: boolean;
  /** (default: true) */
  extractExamples?: boolean;
  /** (default: true) */
  removeExtractedExamples?: boolean;
  /** (default: true) */
  extractValidationRules?: boolean;
  /** (default: true) */
  removeExtractedValidation?: boolean;
}

export interface DescriptionValidationOptions {
  /** (default: true) */
  enabled?: boolean;
  /** (default: true) */
  autoGenerateOperationDescriptions?: boolean;
  /** (default: false) */
  autoGenerateSchemaDescriptions?: boolean;
  /** Prepended to every generated description (default: '') */
  descriptionPrefix?: string;
}

export interface CompletionRule {
  /** Regular expression tested against the property name */
  pattern: string;
  completionType: string;
  help?: string;
  /** Key/value separator for key-value-pairs examples (default: '=') */
  separator?: string;
}

export interface CliMetadataOptions {
  /** (default: true) */
  enabled?: boolean;
  /** Ordered rules; the first rule whose pattern matches wins */
  completionPatterns?: CompletionRule[];
}

export interface ReadOnlyOptions {
  /** (default: true) */
  enabled?: boolean;
  /** Fields marked in metadata schemas (default: uid, creation_timestamp, ...) */
  metadataFields?: string[];
  /** Fields marked in object reference schemas (default: tenant, uid, kind) */
  objectRefFields?: string[];
  /** Schema name patterns, searched anywhere in the name */
  metadataPatterns?: string[];
  objectRefPatterns?: string[];
}

export type DangerLevel = 'low' | 'medium' | 'high';

export const DANGER_LEVELS: readonly DangerLevel[] = ['low', 'medium', 'high'];

export interface EscalationRule {
  /** Searched in `"METHOD path"`, e.g. `DELETE /api/.../namespaces/{name}` */
  pattern: string;
  level: DangerLevel;
}

export interface OperationMetadataOptions {
  /** (default: true) */
  enabled?: boolean;
  /** Command named in generated CLI examples (default: 'f5xcctl') */
  cliName?: string;
  /** Upper-case method → base danger level; unknown methods are 'medium' */
  methodLevels?: Record<string, DangerLevel>;
  /** Ordered; the first match decides the level */
  escalationPatterns?: EscalationRule[];
  /** Parameter names that raise the level one step (case-insensitive) */
  dangerousParameters?: string[];
  /** Required fields added to every POST (default: metadata.name, metadata.namespace) */
  standardCreateFields?: string[];
  /** (default: 3) */
  maxExamples?: number;
}

export interface TagDefinitionOverride {
  description?: string;
  patterns?: string[];
}

export interface TagOptions {
  /** (default: true) */
  enabled?: boolean;
  /** Rebuild the top-level `tags` array (default: true) */
  generateMetadata?: boolean;
  /** Prepend the matched tag to each operation (default: true) */
  assignToOperations?: boolean;
  /**
   * Merged into the built-in table: known names are updated in place,
   * new names are appended before lookup (default: {})
   */
  tagDefinitions?: Record<string, TagDefinitionOverride>;
}

export interface ConsistencyValidationOptions {
  /** (default: true) */
  validateParameters?: boolean;
  /** (default: true) */
  validateSchemas?: boolean;
  /** (default: true) */
  validateOperationIds?: boolean;
  /** Lowest severity returned from validate() (default: 'warning') */
  severityThreshold?: IssueSeverity;
}

export interface DomainPatternEntry {
  domain: string;
  patterns: string[];
}

export interface DomainOptions {
  /** Domain returned when no pattern matches (default: 'other') */
  fallback?: string;
  /** Replaces the built-in domain table when non-empty (default: []) */
  table?: DomainPatternEntry[];
}

export interface ProcessingOptions {
  /** Files processed concurrently by the corpus runner (default: 4) */
  parallelWorkers?: number;
  /** Keep going after a stage throws (default: true) */
  continueOnError?: boolean;
  /** Indentation of written documents (default: 2) */
  jsonIndent?: number;
}

export interface RefineOptions {
  schemaFixes?: SchemaFixOptions;
  reconciliation?: ReconciliationOptions;
  deprecatedTiers?: DeprecatedTierOptions;
  descriptionStructure?: DescriptionStructureOptions;
  descriptionValidation?: DescriptionValidationOptions;
  cliMetadata?: CliMetadataOptions;
  readOnly?: ReadOnlyOptions;
  operationMetadata?: OperationMetadataOptions;
  tags?: TagOptions;
  consistencyValidation?: ConsistencyValidationOptions;
  domains?: DomainOptions;
  processing?: ProcessingOptions;
  /** Keys copied untouched by the description transformer */
  preserveFields?: string[];
  /** Keys the description transformer treats as prose */
  targetFields?: string[];
}

export interface ResolvedOptions {
  schemaFixes: Required<SchemaFixOptions>;
  reconciliation: Required<ReconciliationOptions>;
  deprecatedTiers: Required<DeprecatedTierOptions>;
  descriptionStructure: Required<DescriptionStructureOptions>;
  descriptionValidation: Required<DescriptionValidationOptions>;
  cliMetadata: Required<CliMetadataOptions>;
  readOnly: Required<ReadOnlyOptions>;
  operationMetadata: Required<OperationMetadataOptions>;
  tags: Required<TagOptions>;
  consistencyValidation: Required<ConsistencyValidationOptions>;
  domains: Required<DomainOptions>;
  processing: Required<ProcessingOptions>;
  preserveFields: string[];
  targetFields: string[];
}

export const DEFAULT_OPTIONS: ResolvedOptions = {
  schemaFixes: {
    fixFormatWithoutType: true,
    formatTypeMappings: {},
  },
  reconciliation: {
    enabled: true,
    mode: 'replace',
    confidenceThreshold: 0.8,
    minSampleSize: 5,
    fieldRules: {},
    auditEnabled: true,
  },
  deprecatedTiers: {
    enabled: true,
    transformations: { BASIC: 'STANDARD', PREMIUM: 'ADVANCED' },
    patterns: ['.*AddonServiceTierType$', '.*TierType$'],
    cliReplacements: {
      subscription_basic_tier: 'subscription_standard_tier',
      subscription_premium_tier: 'subscription_advanced_tier',
      basic_tier: 'standard_tier',
      premium_tier: 'advanced_tier',
      BASIC: 'STANDARD',
      PREMIUM: 'ADVANCED',
    },
  },
  descriptionStructure: {
    enabled: true,
    normalizeLeadingSpaces: true,
    preserveBulletIndentation: true,
    extractExamples: true,
    removeExtractedExamples: true,
    extractValidationRules: true,
    removeExtractedValidation: true,
  },
  descriptionValidation: {
    enabled: true,
    autoGenerateOperationDescriptions: true,
    autoGenerateSchemaDescriptions: false,
    descriptionPrefix: '',
  },
  cliMetadata: {
    enabled: true,
    completionPatterns: [
      {
        pattern: '\\bnamespace$',
        completionType: 'namespace-list',
        help: 'Kubernetes namespace',
      },
      {
        pattern: '\\blabels$',
        completionType: 'key-value-pairs',
        help: 'Metadata labels',
        separator: '=',
      },
      {
        pattern: '\\btags$',
        completionType: 'key-value-pairs',
        help: 'Resource tags',
        separator: '=',
      },
      {
        pattern: '\\b(file|path)$',
        completionType: 'file-path',
        help: 'File path reference',
      },
    ],
  },
  readOnly: {
    enabled: true,
    metadataFields: [
      'tenant',
      'uid',
      'kind',
      'creation_timestamp',
      'modification_timestamp',
      'creator_id',
      'creator_class',
      'object_index',
      'owner_view',
    ],
    objectRefFields: ['tenant', 'uid', 'kind'],
    metadataPatterns: ['ObjectMetaType', '.*MetadataType$', 'SystemMetadata'],
    objectRefPatterns: ['ObjectRefType', '.*ObjectRef$', '.*Ref$'],
  },
  operationMetadata: {
    enabled: true,
    cliName: 'f5xcctl',
    methodLevels: {
      GET: 'low',
      HEAD: 'low',
      OPTIONS: 'low',
      POST: 'medium',
      PUT: 'medium',
      PATCH: 'medium',
      DELETE: 'high',
    },
    escalationPatterns: [
      { pattern: 'DELETE.*/namespace', level: 'high' },
      { pattern: 'DELETE.*/(security|firewall|policy)', level: 'high' },
      { pattern: 'POST.*/(system|global)_', level: 'medium' },
    ],
    dangerousParameters: ['force', 'cascade', 'delete_options'],
    standardCreateFields: ['metadata.name', 'metadata.namespace'],
    maxExamples: 3,
  },
  tags: {
    enabled: true,
    generateMetadata: true,
    assignToOperations: true,
    tagDefinitions: {},
  },
  consistencyValidation: {
    validateParameters: true,
    validateSchemas: true,
    validateOperationIds: true,
    severityThreshold: 'warning',
  },
  domains: {
    fallback: 'other',
    table: [],
  },
  processing: {
    parallelWorkers: 4,
    continueOnError: true,
    jsonIndent: 2,
  },
  preserveFields: ['operationId', '$ref', 'x-ves-proto-rpc', 'x-ves-proto-service'],
  targetFields: ['description'],
};

/**
 * Resolves partial user options into a complete, frozen configuration.
 *
 * Sections are merged one level deep: a user section replaces only the keys
 * it names. List-valued keys (patterns, rules) replace the default list.
 *
 * @throws {ConfigurationError} When a value is outside its allowed range
 */
export function resolveOptions(
  userOptions: RefineOptions = {}
): Readonly<ResolvedOptions> {
  const resolved: ResolvedOptions = {
    schemaFixes: {
      ...DEFAULT_OPTIONS.schemaFixes,
      ...userOptions.schemaFixes,
    },
    reconciliation: {
      ...DEFAULT_OPTIONS.reconciliation,
      ...userOptions.reconciliation,
    },
    deprecatedTiers: {
      ...DEFAULT_OPTIONS.deprecatedTiers,
      ...userOptions.deprecatedTiers,
    },
    descriptionStructure: {
      ...DEFAULT_OPTIONS.descriptionStructure,
      ...userOptions.descriptionStructure,
    },
    descriptionValidation: {
      ...DEFAULT_OPTIONS.descriptionValidation,
      ...userOptions.descriptionValidation,
    },
    cliMetadata: {
      ...DEFAULT_OPTIONS.cliMetadata,
      ...userOptions.cliMetadata,
    },
    readOnly: { ...DEFAULT_OPTIONS.readOnly, ...userOptions.readOnly },
    operationMetadata: {
      ...DEFAULT_OPTIONS.operationMetadata,
      ...userOptions.operationMetadata,
    },
    tags: { ...DEFAULT_OPTIONS.tags, ...userOptions.tags },
    consistencyValidation: {
      ...DEFAULT_OPTIONS.consistencyValidation,
      ...userOptions.consistencyValidation,
    },
    domains: { ...DEFAULT_OPTIONS.domains, ...userOptions.domains },
    processing: { ...DEFAULT_OPTIONS.processing, ...userOptions.processing },
    preserveFields: userOptions.preserveFields ?? [
      ...DEFAULT_OPTIONS.preserveFields,
    ],
    targetFields: userOptions.targetFields ?? [...DEFAULT_OPTIONS.targetFields],
  };

  validateOptions(resolved);
  // The merge is per section; nested values still belong to the caller or
  // to DEFAULT_OPTIONS until copied.
  return deepFreeze(structuredClone(resolved));
}

function invalid(configPath: string, message: string, value: unknown): never {
  throw new ConfigurationError({
    message: `${configPath} ${message}`,
    context: { configPath, value },
  });
}

/**
 * Range and enum checks that the shape check in the config loader
 * does not express.
 */
function validateOptions(options: ResolvedOptions): void {
  const { reconciliation, consistencyValidation, operationMetadata, processing } =
    options;

  if (
    !(reconciliation.confidenceThreshold >= 0) ||
    reconciliation.confidenceThreshold > 1
  ) {
    invalid(
      'reconciliation.confidenceThreshold',
      'must be between 0 and 1',
      reconciliation.confidenceThreshold
    );
  }
  if (
    !Number.isInteger(reconciliation.minSampleSize) ||
    reconciliation.minSampleSize < 0
  ) {
    invalid(
      'reconciliation.minSampleSize',
      'must be a non-negative integer',
      reconciliation.minSampleSize
    );
  }
  if (!RECONCILIATION_MODES.includes(reconciliation.mode)) {
    invalid(
      'reconciliation.mode',
      `must be one of ${RECONCILIATION_MODES.join(', ')}`,
      reconciliation.mode
    );
  }
  for (const [field, rule] of Object.entries(reconciliation.fieldRules)) {
    if (rule.mode !== undefined && !RECONCILIATION_MODES.includes(rule.mode)) {
      invalid(
        `reconciliation.fieldRules.${field}.mode`,
        `must be one of ${RECONCILIATION_MODES.join(', ')}`,
        rule.mode
      );
    }
  }

  for (const [method, level] of Object.entries(operationMetadata.methodLevels)) {
    if (!DANGER_LEVELS.includes(level)) {
      invalid(
        `operationMetadata.methodLevels.${method}`,
        `must be one of ${DANGER_LEVELS.join(', ')}`,
        level
      );
    }
  }
  operationMetadata.escalationPatterns.forEach((rule, index) => {
    if (!DANGER_LEVELS.includes(rule.level)) {
      invalid(
        `operationMetadata.escalationPatterns.${index}.level`,
        `must be one of ${DANGER_LEVELS.join(', ')}`,
        rule.level
      );
    }
  });
  if (
    !Number.isInteger(operationMetadata.maxExamples) ||
    operationMetadata.maxExamples < 0
  ) {
    invalid(
      'operationMetadata.maxExamples',
      'must be a non-negative integer',
      operationMetadata.maxExamples
    );
  }

  if (!ISSUE_SEVERITIES.includes(consistencyValidation.severityThreshold)) {
    invalid(
      'consistencyValidation.severityThreshold',
      `must be one of ${ISSUE_SEVERITIES.join(', ')}`,
      consistencyValidation.severityThreshold
    );
  }

  if (
    !Number.isInteger(processing.parallelWorkers) ||
    processing.parallelWorkers < 1
  ) {
    invalid(
      'processing.parallelWorkers',
      'must be a positive integer',
      processing.parallelWorkers
    );
  }
  if (
    !Number.isInteger(processing.jsonIndent) ||
    processing.jsonIndent < 0 ||
    processing.jsonIndent > 10
  ) {
    invalid(
      'processing.jsonIndent',
      'must be an integer between 0 and 10',
      processing.jsonIndent
    );
  }

  if (options.domains.fallback.length === 0) {
    invalid('domains.fallback', 'must not be empty', options.domains.fallback);
  }
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
