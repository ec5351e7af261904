import type { DangerLevel, ResolvedOptions } from '../types/options.js';
import {
  type JsonObject,
  type JsonValue,
  cloneJson,
  getArray,
  getObject,
  getString,
  isJsonObject,
} from '../types/json.js';
import { type OperationEntry, listOperations } from '../openapi/operations.js';
import { compilePattern } from '../util/pattern-table.js';

const REQUIRED_FIELDS_KEY = 'x-ves-required-fields';
const DANGER_LEVEL_KEY = 'x-ves-danger-level';
const CONFIRMATION_KEY = 'x-ves-confirmation-required';
const SIDE_EFFECTS_KEY = 'x-ves-side-effects';
const CLI_EXAMPLES_KEY = 'x-ves-cli-examples';

export interface OperationMetadataStats {
  operationsEnriched: number;
  requiredFieldsAdded: number;
  dangerLevelsAssigned: number;
  examplesGenerated: number;
  sideEffectsDocumented: number;
}

export interface OperationMetadataResult {
  document: JsonObject;
  stats: OperationMetadataStats;
}

export interface CliExample {
  description: string;
  command: string;
  useCase: string;
  warning?: string;
}

interface CompiledEscalation {
  readonly matcher: RegExp;
  readonly level: DangerLevel;
}

/**
 * Last literal path segment in kebab case, singular by one trailing `s`:
 * `/api/config/namespaces/{namespace}/origin_pools` gives `origin-pool`.
 */
export function resourceTypeOf(path: string): string {
  const segments = path
    .split('/')
    .filter((segment) => segment.length > 0 && !segment.startsWith('{'));
  const last = segments.at(-1);
  if (last === undefined) return 'resource';
  return (last.endsWith('s') ? last.slice(0, -1) : last).replaceAll('_', '-');
}

/** Second segment of an `/api/...` path, otherwise `default`. */
export function domainOf(path: string): string {
  const segments = path.split('/');
  return segments.length > 2 && segments[1] === 'api'
    ? segments[2] ?? 'default'
    : 'default';
}

/**
 * Describes what each operation does for CLI and agent consumers: the
 * fields a request must carry, how destructive it is, what it creates,
 * modifies or deletes, and a few example commands. Values are recomputed
 * on every run, so a second pass writes the same keys.
 */
export class OperationMetadataEnricher {
  private readonly enabled: boolean;
  private readonly options: ResolvedOptions['operationMetadata'];
  private readonly escalations: readonly CompiledEscalation[];
  private readonly dangerousParameters: ReadonlySet<string>;

  constructor(options: ResolvedOptions['operationMetadata']) {
    this.enabled = options.enabled;
    this.options = options;
    this.escalations = options.escalationPatterns.map((rule) => ({
      matcher: compilePattern(
        rule.pattern,
        '',
        'operationMetadata.escalationPatterns'
      ),
      level: rule.level,
    }));
    this.dangerousParameters = new Set(
      options.dangerousParameters.map((name) => name.toLowerCase())
    );
  }

  enrich(document: JsonObject): OperationMetadataResult {
    const stats: OperationMetadataStats = {
      operationsEnriched: 0,
      requiredFieldsAdded: 0,
      dangerLevelsAssigned: 0,
      examplesGenerated: 0,
      sideEffectsDocumented: 0,
    };
    if (!this.enabled) {
      return { document, stats };
    }

    const result = cloneJson(document);
    for (const entry of listOperations(result)) {
      this.enrichOperation(entry, stats);
    }
    return { document: result, stats };
  }

  private enrichOperation(
    { path, method, operation }: OperationEntry,
    stats: OperationMetadataStats
  ): void {
    const verb = method.toUpperCase();
    stats.operationsEnriched += 1;

    const required = this.requiredFields(operation, verb);
    if (required.length > 0) {
      operation[REQUIRED_FIELDS_KEY] = required;
      stats.requiredFieldsAdded += 1;
    }

    const level = this.dangerLevel(verb, path, operation);
    operation[DANGER_LEVEL_KEY] = level;
    stats.dangerLevelsAssigned += 1;
    if (level === 'high') {
      operation[CONFIRMATION_KEY] = true;
    }

    const sideEffects = sideEffectsOf(verb, path);
    if (Object.keys(sideEffects).length > 0) {
      operation[SIDE_EFFECTS_KEY] = sideEffects;
      stats.sideEffectsDocumented += 1;
    }

    const examples = this.cliExamples(verb, path);
    if (examples.length > 0) {
      operation[CLI_EXAMPLES_KEY] = examples.map(toJsonExample);
      stats.examplesGenerated += 1;
    }
  }

  /**
   * Body `required` entries, one level of nested `prop.field` entries,
   * required path parameters as `path.<name>`, and the standard create
   * fields for POST. Sorted and unique.
   */
  requiredFields(operation: JsonObject, verb: string): string[] {
    const required = new Set<string>();

    const content = getObject(getObject(operation, 'requestBody') ?? {}, 'content');
    for (const media of Object.values(content ?? {})) {
      const schema = isJsonObject(media) ? getObject(media, 'schema') : undefined;
      if (!schema) continue;
      for (const field of stringsIn(getArray(schema, 'required'))) {
        required.add(field);
      }
      for (const [name, property] of Object.entries(
        getObject(schema, 'properties') ?? {}
      )) {
        if (!isJsonObject(property)) continue;
        for (const field of stringsIn(getArray(property, 'required'))) {
          required.add(`${name}.${field}`);
        }
      }
    }

    for (const parameter of getArray(operation, 'parameters') ?? []) {
      if (!isJsonObject(parameter)) continue;
      const name = getString(parameter, 'name');
      if (name && getString(parameter, 'in') === 'path' && parameter.required === true) {
        required.add(`path.${name}`);
      }
    }

    if (verb === 'POST') {
      for (const field of this.options.standardCreateFields) {
        required.add(field);
      }
    }
    return [...required].sort();
  }

  /**
   * The first escalation pattern found in `"METHOD path"` decides; otherwise
   * the method's base level, raised one step by a dangerous parameter.
   */
  dangerLevel(verb: string, path: string, operation: JsonObject): DangerLevel {
    const base = this.options.methodLevels[verb] ?? 'medium';
    const subject = `${verb} ${path}`;
    for (const { matcher, level } of this.escalations) {
      if (matcher.test(subject)) return level;
    }

    const dangerous = (getArray(operation, 'parameters') ?? []).some(
      (parameter) =>
        isJsonObject(parameter) &&
        this.dangerousParameters.has(
          (getString(parameter, 'name') ?? '').toLowerCase()
        )
    );
    if (!dangerous) return base;
    return base === 'low' ? 'medium' : 'high';
  }

  cliExamples(verb: string, path: string): CliExample[] {
    const resource = resourceTypeOf(path);
    const prefix = `${this.options.cliName} ${domainOf(path)} ${resource}`;
    const examples: CliExample[] = [];

    switch (verb) {
      case 'GET':
        if (path.includes('{name}') || path.includes('{id}')) {
          examples.push({
            description: `Get specific ${resource}`,
            command: `${prefix} get {name} --namespace {namespace}`,
            useCase: 'get_specific',
          });
        } else {
          examples.push({
            description: `List all ${resource}s`,
            command: `${prefix} list --namespace {namespace}`,
            useCase: 'list_all',
          });
        }
        break;
      case 'POST':
        examples.push(
          {
            description: `Create ${resource}`,
            command: `${prefix} create {name} --namespace {namespace}`,
            useCase: 'basic_create',
          },
          {
            description: 'Create from YAML file',
            command: `${prefix} create -f {file}.yaml`,
            useCase: 'file_based',
          }
        );
        break;
      case 'PUT':
        examples.push({
          description: `Update ${resource}`,
          command: `${prefix} update {name} --namespace {namespace} -f {file}.yaml`,
          useCase: 'update',
        });
        break;
      case 'DELETE':
        examples.push({
          description: `Delete ${resource}`,
          command: `${prefix} delete {name} --namespace {namespace}`,
          useCase: 'delete',
          warning: 'Permanent operation - cannot be undone',
        });
        break;
      default:
        break;
    }
    return examples.slice(0, this.options.maxExamples);
  }
}

function stringsIn(values: JsonValue[] | undefined): string[] {
  return (values ?? []).filter(
    (value): value is string => typeof value === 'string'
  );
}

/** Empty lists are left out. */
function sideEffectsOf(verb: string, path: string): JsonObject {
  const resource = resourceTypeOf(path);
  const effects: JsonObject = {};
  if (verb === 'POST') {
    effects.creates = [resource];
  } else if (verb === 'PUT' || verb === 'PATCH') {
    effects.modifies = [resource];
  } else if (verb === 'DELETE') {
    effects.deletes = path.includes('namespace')
      ? [resource, 'contained_resources']
      : [resource];
  }
  return effects;
}

function toJsonExample(example: CliExample): JsonObject {
  const out: JsonObject = {
    description: example.description,
    command: example.command,
    use_case: example.useCase,
  };
  if (example.warning !== undefined) {
    out.warning = example.warning;
  }
  return out;
}
