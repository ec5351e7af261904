import { basename } from 'node:path';

import {
  ConsistencyValidator,
  DescriptionValidator,
  DomainCategorizer,
  listSpecFiles,
  loadConfigOrDefaults,
  readSpecFile,
} from '@specrefine/core';

import {
  type CategorizeCliOptions,
  type ValidateCliOptions,
  parseSeverity,
} from '../flags.js';

function printJson(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

/**
 * Print the consistency report of one spec. Returns 1 when any
 * error-severity issue was found, whatever the display threshold.
 */
export async function runValidateCommand(
  file: string,
  flags: ValidateCliOptions
): Promise<number> {
  const options = loadConfigOrDefaults(flags.config);
  const document = await readSpecFile(file);
  const validator = new ConsistencyValidator({
    ...options.consistencyValidation,
    ...(flags.severity !== undefined
      ? { severityThreshold: parseSeverity(flags.severity) }
      : {}),
  });
  validator.validate(document);
  const report = validator.getReport();
  printJson({ file, ...report });
  return report.summary.errors > 0 ? 1 : 0;
}

export async function runDescriptionsCommand(
  file: string,
  flags: { config?: string }
): Promise<number> {
  const options = loadConfigOrDefaults(flags.config);
  const document = await readSpecFile(file);
  const missing = new DescriptionValidator(
    options.descriptionValidation
  ).findMissingDescriptions(document);
  printJson({
    file,
    operations: missing.operations,
    schemas: missing.schemas,
    totals: {
      operations: missing.operations.length,
      schemas: missing.schemas.length,
    },
  });
  return 0;
}

export async function runCategorizeCommand(
  files: readonly string[],
  flags: CategorizeCliOptions
): Promise<number> {
  const options = loadConfigOrDefaults(flags.config);
  const categorizer = new DomainCategorizer(options.domains);
  const names = flags.dir
    ? await listSpecFiles(flags.dir)
    : files.map((file) => basename(file));

  const domains: Record<string, string> = {};
  for (const name of names) {
    domains[name] = categorizer.categorize(name);
  }
  printJson({
    domains,
    summary: categorizer.summarizeCategorization(names),
  });
  return 0;
}
