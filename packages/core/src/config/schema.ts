/**
 * Shape of each configuration file section, checked with Ajv before
 * `resolveOptions` applies defaults and range checks. Unknown keys are
 * allowed everywhere.
 */

import type { SchemaObject } from 'ajv';

import {
  DANGER_LEVELS,
  ISSUE_SEVERITIES,
  RECONCILIATION_MODES,
} from '../types/options.js';

const stringList: SchemaObject = { type: 'array', items: { type: 'string' } };

const stringMap: SchemaObject = {
  type: 'object',
  additionalProperties: { type: 'string' },
};

const reconciliationMode: SchemaObject = { enum: [...RECONCILIATION_MODES] };

const dangerLevel: SchemaObject = { enum: [...DANGER_LEVELS] };

export const SECTION_SCHEMAS = {
  schemaFixes: {
    type: 'object',
    properties: {
      fixFormatWithoutType: { type: 'boolean' },
      formatTypeMappings: {
        type: 'object',
        additionalProperties: {
          enum: ['string', 'integer', 'number', 'boolean'],
        },
      },
    },
  },
  reconciliation: {
    type: 'object',
    properties: {
      enabled: { type: 'boolean' },
      mode: reconciliationMode,
      confidenceThreshold: { type: 'number' },
      minSampleSize: { type: 'integer' },
      fieldRules: {
        type: 'object',
        additionalProperties: {
          type: 'object',
          properties: { mode: reconciliationMode },
        },
      },
      auditEnabled: { type: 'boolean' },
    },
  },
  deprecatedTiers: {
    type: 'object',
    properties: {
      enabled: { type: 'boolean' },
      transformations: stringMap,
      patterns: stringList,
      cliReplacements: stringMap,
    },
  },
  descriptionStructure: {
    type: 'object',
    properties: {
      enabled: { type: 'boolean' },
      normalizeLeadingSpaces: { type: 'boolean' },
      preserveBulletIndentation: { type: 'boolean' },
      extractExamples: { type: 'boolean' },
      removeExtractedExamples: { type: 'boolean' },
      extractValidationRules: { type: 'boolean' },
      removeExtractedValidation: { type: 'boolean' },
    },
  },
  descriptionValidation: {
    type: 'object',
    properties: {
      enabled: { type: 'boolean' },
      autoGenerateOperationDescriptions: { type: 'boolean' },
      autoGenerateSchemaDescriptions: { type: 'boolean' },
      descriptionPrefix: { type: 'string' },
    },
  },
  cliMetadata: {
    type: 'object',
    properties: {
      enabled: { type: 'boolean' },
      completionPatterns: {
        type: 'array',
        items: {
          type: 'object',
          required: ['pattern', 'completionType'],
          properties: {
            pattern: { type: 'string' },
            completionType: { type: 'string' },
            help: { type: 'string' },
            separator: { type: 'string' },
          },
        },
      },
    },
  },
  readOnly: {
    type: 'object',
    properties: {
      enabled: { type: 'boolean' },
      metadataFields: stringList,
      objectRefFields: stringList,
      metadataPatterns: stringList,
      objectRefPatterns: stringList,
    },
  },
  operationMetadata: {
    type: 'object',
    properties: {
      enabled: { type: 'boolean' },
      cliName: { type: 'string' },
      methodLevels: { type: 'object', additionalProperties: dangerLevel },
      escalationPatterns: {
        type: 'array',
        items: {
          type: 'object',
          required: ['pattern', 'level'],
          properties: { pattern: { type: 'string' }, level: dangerLevel },
        },
      },
      dangerousParameters: stringList,
      standardCreateFields: stringList,
      maxExamples: { type: 'integer' },
    },
  },
  tags: {
    type: 'object',
    properties: {
      enabled: { type: 'boolean' },
      generateMetadata: { type: 'boolean' },
      assignToOperations: { type: 'boolean' },
      tagDefinitions: {
        type: 'object',
        additionalProperties: {
          type: 'object',
          properties: {
            description: { type: 'string' },
            patterns: stringList,
          },
        },
      },
    },
  },
  consistencyValidation: {
    type: 'object',
    properties: {
      validateParameters: { type: 'boolean' },
      validateSchemas: { type: 'boolean' },
      validateOperationIds: { type: 'boolean' },
      severityThreshold: { enum: [...ISSUE_SEVERITIES] },
    },
  },
  domains: {
    type: 'object',
    properties: {
      fallback: { type: 'string' },
      table: {
        type: 'array',
        items: {
          type: 'object',
          required: ['domain', 'patterns'],
          properties: { domain: { type: 'string' }, patterns: stringList },
        },
      },
    },
  },
  processing: {
    type: 'object',
    properties: {
      parallelWorkers: { type: 'integer' },
      continueOnError: { type: 'boolean' },
      jsonIndent: { type: 'integer' },
    },
  },
  preserveFields: stringList,
  targetFields: stringList,
} satisfies Record<string, SchemaObject>;

export type ConfigSection = keyof typeof SECTION_SCHEMAS;
