/* eslint-disable max-lines-per-function */
import type { IssueSeverity, ResolvedOptions } from '../types/options.js';
import {
  type JsonObject,
  getArray,
  getObject,
  getString,
  isJsonObject,
} from '../types/json.js';
import { getSchemas, listOperations } from '../openapi/operations.js';

export type IssueCategory =
  | 'parameter'
  | 'schema'
  | 'operationId'
  | 'deprecation';

export interface ConsistencyIssue {
  severity: IssueSeverity;
  category: IssueCategory;
  message: string;
  /** Dotted location (`paths./x.get`), `components.schemas.X` or 'global' */
  location: string;
  suggestion?: string;
}

export interface ConsistencyStats {
  totalIssues: number;
  errors: number;
  warnings: number;
  info: number;
  byCategory: Record<IssueCategory, number>;
}

export interface ConsistencyReport {
  summary: ConsistencyStats;
  issues: ConsistencyIssue[];
}

const SEVERITY_LEVELS = {
  info: 0,
  warning: 1,
  error: 2,
} as const satisfies Record<IssueSeverity, number>;

/** Suffix families, checked in order; the first hit classifies the name. */
const SCHEMA_SUFFIXES: readonly RegExp[] = [
  /(Request|Input|Create|Update|Payload)$/,
  /(Response|Output|Result|Reply)$/,
  /(Type|Spec|Config|Settings|Options)$/,
];

/** Path-name synonyms paired with query-name synonyms for the same concept. */
const KNOWN_NAME_CONFLICTS: readonly (readonly [
  ReadonlySet<string>,
  ReadonlySet<string>,
])[] = [
  [new Set(['namespace', 'metadata.namespace']), new Set(['namespace', 'ns'])],
  [new Set(['name', 'metadata.name']), new Set(['name', 'object_name'])],
];

const SCHEMA_COUNT_FOR_SUFFIX_REPORT = 100;
const OPERATION_COUNT_FOR_DEPRECATION_REPORT = 50;
const DUPLICATE_LOCATIONS_SHOWN = 3;

type OperationIdStyle = 'dot.notation' | 'snake_case' | 'camelCase' | 'other';

function operationIdStyle(operationId: string): OperationIdStyle {
  if (operationId.includes('.')) return 'dot.notation';
  if (operationId.includes('_')) return 'snake_case';
  const first = operationId.charAt(0);
  if (first !== first.toUpperCase() && /[A-Z]/.test(operationId.slice(1))) {
    return 'camelCase';
  }
  return 'other';
}

/** "content-type" → "Content-Type" */
function titleCase(name: string): string {
  return name
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match, before: string, letter: string) =>
      before + letter.toUpperCase()
    );
}

function quoteAll(names: Iterable<string>): string {
  return [...names]
    .sort()
    .map((name) => `'${name}'`)
    .join(', ');
}

function intersect(
  names: ReadonlySet<string>,
  candidates: ReadonlySet<string>
): string[] {
  return [...candidates].filter((candidate) => names.has(candidate));
}

/**
 * Reports naming and structural inconsistencies in an OpenAPI document.
 * Never modifies the document.
 *
 * `validate()` returns issues at or above the severity threshold, while
 * `getStats()` counts every issue found by the last run.
 */
export class ConsistencyValidator {
  private issues: ConsistencyIssue[] = [];

  constructor(
    private readonly options: ResolvedOptions['consistencyValidation']
  ) {}

  validate(document: JsonObject): ConsistencyIssue[] {
    this.issues = [];

    if (this.options.validateParameters) {
      this.checkParameterNaming(document);
    }
    if (this.options.validateSchemas) {
      this.checkSchemaNaming(document);
    }
    if (this.options.validateOperationIds) {
      this.checkOperationIdStyles(document);
    }
    this.checkDeprecationMarkers(document);
    this.checkDuplicateOperationIds(document);

    return this.filterBySeverity();
  }

  getStats(): ConsistencyStats {
    const stats: ConsistencyStats = {
      totalIssues: this.issues.length,
      errors: 0,
      warnings: 0,
      info: 0,
      byCategory: { parameter: 0, schema: 0, operationId: 0, deprecation: 0 },
    };
    for (const issue of this.issues) {
      if (issue.severity === 'error') stats.errors += 1;
      else if (issue.severity === 'warning') stats.warnings += 1;
      else stats.info += 1;
      stats.byCategory[issue.category] += 1;
    }
    return stats;
  }

  getReport(): ConsistencyReport {
    return { summary: this.getStats(), issues: this.filterBySeverity() };
  }

  private addIssue(issue: ConsistencyIssue): void {
    this.issues.push(issue);
  }

  private filterBySeverity(): ConsistencyIssue[] {
    const threshold = SEVERITY_LEVELS[this.options.severityThreshold];
    return this.issues.filter(
      (issue) => SEVERITY_LEVELS[issue.severity] >= threshold
    );
  }

  private checkParameterNaming(document: JsonObject): void {
    const namesByLocation = new Map<string, Set<string>>();

    for (const [path, pathItem] of Object.entries(
      getObject(document, 'paths') ?? {}
    )) {
      if (!isJsonObject(pathItem)) continue;
      for (const parameter of getArray(pathItem, 'parameters') ?? []) {
        if (isJsonObject(parameter)) {
          this.validateParameter(parameter, `paths.${path}`);
        }
      }
    }

    for (const { path, methodKey, operation } of listOperations(document)) {
      for (const parameter of getArray(operation, 'parameters') ?? []) {
        if (!isJsonObject(parameter)) continue;
        this.validateParameter(parameter, `paths.${path}.${methodKey}`);
        const location = getString(parameter, 'in') ?? '';
        let names = namesByLocation.get(location);
        if (!names) {
          names = new Set();
          namesByLocation.set(location, names);
        }
        names.add(getString(parameter, 'name') ?? '');
      }
    }

    this.checkParameterConflicts(namesByLocation);
  }

  private validateParameter(parameter: JsonObject, location: string): void {
    if ('$ref' in parameter) return;

    const name = getString(parameter, 'name') ?? '';
    if (!name) {
      this.addIssue({
        severity: 'error',
        category: 'parameter',
        message: "Parameter missing 'name' field",
        location,
      });
      return;
    }

    switch (getString(parameter, 'in')) {
      case 'path':
        if (name.includes('{') || name.includes('}')) {
          this.addIssue({
            severity: 'warning',
            category: 'parameter',
            message: `Path parameter '${name}' contains braces`,
            location,
            suggestion: `Use '${name.replace(/^[{}]+|[{}]+$/g, '')}' without braces in parameter definition`,
          });
        }
        break;
      case 'query':
        if (name.includes('.') && name.includes('_')) {
          this.addIssue({
            severity: 'info',
            category: 'parameter',
            message: `Query parameter '${name}' mixes dot and underscore notation`,
            location,
            suggestion: 'Consider using consistent notation',
          });
        }
        break;
      case 'header':
        if (!/^[A-Z]/.test(name) && !name.startsWith('x-')) {
          this.addIssue({
            severity: 'info',
            category: 'parameter',
            message: `Header parameter '${name}' should start with uppercase`,
            location,
            suggestion: `Consider using '${titleCase(name)}'`,
          });
        }
        break;
      default:
        break;
    }
  }

  private checkParameterConflicts(
    namesByLocation: ReadonlyMap<string, ReadonlySet<string>>
  ): void {
    const pathNames = namesByLocation.get('path') ?? new Set<string>();
    const queryNames = namesByLocation.get('query') ?? new Set<string>();

    for (const [pathVariants, queryVariants] of KNOWN_NAME_CONFLICTS) {
      const pathMatch = intersect(pathNames, pathVariants);
      const queryMatch = intersect(queryNames, queryVariants);
      if (pathMatch.length > 0 && queryMatch.length > 0) {
        this.addIssue({
          severity: 'warning',
          category: 'parameter',
          message: `Inconsistent parameter naming: path uses ${quoteAll(pathMatch)} but query uses ${quoteAll(queryMatch)}`,
          location: 'global',
          suggestion:
            'Consider standardizing parameter names across path and query parameters',
        });
      }
    }
  }

  private checkSchemaNaming(document: JsonObject): void {
    const schemas = getSchemas(document) ?? {};
    const total = Object.keys(schemas).length;
    let withoutSuffix = 0;

    for (const [name, schema] of Object.entries(schemas)) {
      if (!isJsonObject(schema)) continue;

      if (!SCHEMA_SUFFIXES.some((suffix) => suffix.test(name))) {
        withoutSuffix += 1;
      }

      if (
        name.includes('_') &&
        /[A-Z]/.test(name.slice(1)) &&
        !name.startsWith('ves_io_') &&
        !name.startsWith('schema')
      ) {
        this.addIssue({
          severity: 'info',
          category: 'schema',
          message: `Schema '${name}' mixes snake_case and CamelCase`,
          location: `components.schemas.${name}`,
          suggestion: 'Consider using consistent naming convention',
        });
      }
    }

    if (total > SCHEMA_COUNT_FOR_SUFFIX_REPORT && withoutSuffix > total * 0.5) {
      this.addIssue({
        severity: 'info',
        category: 'schema',
        message: `${withoutSuffix}/${total} schemas lack type suffix (Type, Request, Response, etc.)`,
        location: 'components.schemas',
        suggestion: 'Consider adding descriptive suffixes for clarity',
      });
    }
  }

  private checkOperationIdStyles(document: JsonObject): void {
    const styles = new Map<OperationIdStyle, number>();

    for (const { path, methodKey, operation } of listOperations(document)) {
      const operationId = getString(operation, 'operationId') ?? '';
      if (!operationId) {
        this.addIssue({
          severity: 'warning',
          category: 'operationId',
          message: 'Operation missing operationId',
          location: `paths.${path}.${methodKey}`,
          suggestion: 'Add operationId for better SDK generation',
        });
        continue;
      }
      const style = operationIdStyle(operationId);
      styles.set(style, (styles.get(style) ?? 0) + 1);
    }

    if (styles.size > 1) {
      const summary = [...styles]
        .map(([style, count]) => `${style}: ${count}`)
        .join(', ');
      this.addIssue({
        severity: 'info',
        category: 'operationId',
        message: `Mixed operationId patterns detected: ${summary}`,
        location: 'global',
        suggestion: 'Consider standardizing operationId naming pattern',
      });
    }
  }

  private checkDeprecationMarkers(document: JsonObject): void {
    const operations = listOperations(document);
    const deprecated = operations.filter(
      ({ operation }) => operation.deprecated === true
    ).length;

    if (
      deprecated === 0 &&
      operations.length > OPERATION_COUNT_FOR_DEPRECATION_REPORT
    ) {
      this.addIssue({
        severity: 'info',
        category: 'deprecation',
        message: `No deprecated operations found among ${operations.length} operations`,
        location: 'global',
        suggestion:
          'Consider adding deprecated: true for operations being phased out',
      });
    }
  }

  private checkDuplicateOperationIds(document: JsonObject): void {
    const locationsById = new Map<string, string[]>();
    for (const { path, methodKey, operation } of listOperations(document)) {
      const operationId = getString(operation, 'operationId');
      if (!operationId) continue;
      const locations = locationsById.get(operationId) ?? [];
      locations.push(`${methodKey.toUpperCase()} ${path}`);
      locationsById.set(operationId, locations);
    }

    for (const [operationId, locations] of locationsById) {
      if (locations.length < 2) continue;
      const shown = locations.slice(0, DUPLICATE_LOCATIONS_SHOWN).join('; ');
      this.addIssue({
        severity: 'error',
        category: 'operationId',
        message: `Duplicate operationId '${operationId}' used in ${locations.length} operations`,
        location:
          locations.length > DUPLICATE_LOCATIONS_SHOWN ? `${shown}...` : shown,
        suggestion: 'Each operation must have a unique operationId',
      });
    }
  }
}
