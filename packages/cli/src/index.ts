#!/usr/bin/env node
// CLI entry point: `specrefine` with subcommands
// - enrich: run the enrichment pipeline over a directory of specs
// - validate: consistency report for one spec
// - descriptions: operations and schemas lacking a description
// - categorize: filename → domain mapping

import fs from 'node:fs';
import { fileURLToPath } from 'node:url';

import { Command } from 'commander';
import { setLogLevel } from '@specrefine/core';

import { runEnrichCommand } from './commands/enrich.js';
import {
  runCategorizeCommand,
  runDescriptionsCommand,
  runValidateCommand,
} from './commands/inspect.js';
import type {
  CategorizeCliOptions,
  EnrichCliOptions,
  ValidateCliOptions,
} from './flags.js';
import { renderCliError } from './render.js';

function handleCliError(error: unknown): void {
  const rendered = renderCliError(error, { colors: process.stderr.isTTY });
  process.stderr.write(`${rendered.text}\n`);
  process.exitCode = rendered.exitCode;
}

/** Commands report their exit code; errors map to their code's exit code. */
async function runCommand(command: () => Promise<number>): Promise<void> {
  try {
    process.exitCode = await command();
  } catch (error) {
    handleCliError(error);
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('specrefine')
    .description('Enrich and check OpenAPI specifications')
    .version('0.1.0')
    .option('--verbose', 'Log debug output to stderr')
    .hook('preAction', (command) => {
      if (command.opts().verbose === true) {
        setLogLevel('debug');
      }
    });

  program
    .command('enrich')
    .description('Run the enrichment pipeline over a directory of JSON specs')
    .requiredOption('-i, --input <dir>', 'Directory of original specs')
    .requiredOption('-o, --output <dir>', 'Directory for enriched specs')
    .option('-c, --config <file>', 'Config file (YAML or JSON)')
    .option('--report <file>', 'Write the run report as JSON')
    .option('--workers <n>', 'Files processed concurrently')
    .option('--fail-on-error', 'Exit 1 when a file or stage fails', false)
    .action(async (options: EnrichCliOptions) => {
      await runCommand(() => runEnrichCommand(options));
    });

  program
    .command('validate')
    .description('Report naming and structural inconsistencies in a spec')
    .argument('<file>', 'Spec file (JSON)')
    .option('-c, --config <file>', 'Config file (YAML or JSON)')
    .option('--severity <level>', 'Lowest severity shown: info|warning|error')
    .action(async (file: string, options: ValidateCliOptions) => {
      await runCommand(() => runValidateCommand(file, options));
    });

  program
    .command('descriptions')
    .description('List operations and schemas without a description')
    .argument('<file>', 'Spec file (JSON)')
    .option('-c, --config <file>', 'Config file (YAML or JSON)')
    .action(async (file: string, options: { config?: string }) => {
      await runCommand(() => runDescriptionsCommand(file, options));
    });

  program
    .command('categorize')
    .description('Map spec filenames to functional domains')
    .argument('[files...]', 'Spec filenames')
    .option('-d, --dir <dir>', 'Categorize every *.json file in a directory')
    .option('-c, --config <file>', 'Config file (YAML or JSON)')
    .action(async (files: string[], options: CategorizeCliOptions) => {
      await runCommand(() => runCategorizeCommand(files, options));
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv).catch(handleCliError);
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);

if (entryFile === moduleFile) {
  await main();
}
