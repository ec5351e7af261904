/**
 * Configuration file loading.
 *
 * Priority:
 *   1. Explicit path
 *   2. `specrefine.yaml`, `specrefine.yml` or `specrefine.json` in cwd
 *   3. Built-in defaults
 *
 * A section whose shape is wrong is dropped with a warning and falls back
 * to its defaults; the rest of the file still applies.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';

import { Ajv, type ErrorObject, type ValidateFunction } from 'ajv';
import { parse as parseYaml } from 'yaml';

import { SECTION_SCHEMAS } from './schema.js';
import { ConfigurationError, toError } from '../types/errors.js';
import { type JsonObject, isJsonObject, toJsonValue } from '../types/json.js';
import {
  type RefineOptions,
  type ResolvedOptions,
  resolveOptions,
} from '../types/options.js';
import { type Result, err, ok } from '../types/result.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('config');

export const CONFIG_FILENAMES = [
  'specrefine.yaml',
  'specrefine.yml',
  'specrefine.json',
] as const;

type SectionName = keyof RefineOptions;

type SectionValidators = {
  [K in SectionName]-?: ValidateFunction<NonNullable<RefineOptions[K]>>;
};

const ajv = new Ajv({ allErrors: true, strict: false });

function compileSection<K extends SectionName>(
  name: K
): ValidateFunction<NonNullable<RefineOptions[K]>> {
  return ajv.compile<NonNullable<RefineOptions[K]>>(SECTION_SCHEMAS[name]);
}

const validators: SectionValidators = {
  schemaFixes: compileSection('schemaFixes'),
  reconciliation: compileSection('reconciliation'),
  deprecatedTiers: compileSection('deprecatedTiers'),
  descriptionStructure: compileSection('descriptionStructure'),
  descriptionValidation: compileSection('descriptionValidation'),
  cliMetadata: compileSection('cliMetadata'),
  readOnly: compileSection('readOnly'),
  operationMetadata: compileSection('operationMetadata'),
  tags: compileSection('tags'),
  consistencyValidation: compileSection('consistencyValidation'),
  domains: compileSection('domains'),
  processing: compileSection('processing'),
  preserveFields: compileSection('preserveFields'),
  targetFields: compileSection('targetFields'),
};

const SECTION_NAMES = Object.keys(SECTION_SCHEMAS).filter(
  (name): name is SectionName => name in validators
);

function formatAjvErrors(errors: ErrorObject[] | null | undefined): string {
  return (errors ?? [])
    .map((error) => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`)
    .join('; ');
}

function copySection<K extends SectionName>(
  name: K,
  raw: JsonObject,
  target: RefineOptions,
  source: string
): void {
  const value = raw[name];
  if (value === undefined) return;
  const validate = validators[name];
  if (validate(value)) {
    target[name] = value;
    return;
  }
  log.warn('ignoring invalid config section', {
    file: source,
    section: name,
    errors: formatAjvErrors(validate.errors),
  });
}

/**
 * Turn a parsed config document into options. Unknown top-level keys are
 * ignored; misshapen sections are dropped.
 */
export function toRefineOptions(raw: JsonObject, source = '<inline>'): RefineOptions {
  const options: RefineOptions = {};
  for (const name of SECTION_NAMES) {
    copySection(name, raw, options, source);
  }
  return options;
}

export function findConfigFile(cwd: string = process.cwd()): string | undefined {
  return CONFIG_FILENAMES.map((name) => join(cwd, name)).find((candidate) =>
    existsSync(candidate)
  );
}

function parseConfigFile(path: string): JsonObject {
  let content: string;
  try {
    content = readFileSync(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError({
      message: `Cannot read config file ${path}`,
      context: { file: path },
      cause: toError(error),
    });
  }

  let parsed: unknown;
  try {
    parsed = path.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new ConfigurationError({
      message: `Cannot parse config file ${path}`,
      context: { file: path },
      cause: toError(error),
    });
  }

  // An empty YAML file parses to null.
  if (parsed === null || parsed === undefined) return {};
  const document = toJsonValue(parsed);
  if (!isJsonObject(document)) {
    throw new ConfigurationError({
      message: `Config file ${path} must contain a mapping at the top level`,
      context: { file: path },
    });
  }
  return document;
}

/**
 * Load and resolve configuration. An explicit path that does not exist is
 * an error; finding no file during auto-detection yields the defaults.
 */
export function loadConfig(
  configPath?: string,
  cwd: string = process.cwd()
): Result<Readonly<ResolvedOptions>, ConfigurationError> {
  let path: string | undefined;
  if (configPath !== undefined) {
    path = resolve(cwd, configPath);
    if (!existsSync(path)) {
      return err(
        new ConfigurationError({
          message: `Config file not found: ${path}`,
          context: { file: path },
        })
      );
    }
  } else {
    path = findConfigFile(cwd);
  }

  try {
    const userOptions = path ? toRefineOptions(parseConfigFile(path), path) : {};
    log.debug('configuration loaded', { file: path ?? '<defaults>' });
    return ok(resolveOptions(userOptions));
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return err(error);
    }
    throw error;
  }
}

/** Like loadConfig, but logs the problem and falls back to the defaults. */
export function loadConfigOrDefaults(
  configPath?: string,
  cwd: string = process.cwd()
): Readonly<ResolvedOptions> {
  const result = loadConfig(configPath, cwd);
  if (result.isOk()) {
    return result.value;
  }
  log.warn('using default configuration', {
    file: result.error.context?.file,
    message: result.error.message,
  });
  return resolveOptions();
}
