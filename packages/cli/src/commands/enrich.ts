import { writeFile } from 'node:fs/promises';

import {
  type CorpusRunReport,
  loadConfigOrDefaults,
  runCorpus,
} from '@specrefine/core';

import { type EnrichCliOptions, applyEnrichFlags } from '../flags.js';

export function formatCorpusSummary(report: CorpusRunReport): string {
  const { totals } = report;
  const lines = [
    `Processed ${totals.files} spec(s): ${totals.enriched} enriched, ${totals.failed} failed, ${totals.changed} changed`,
  ];
  if (totals.stageErrors > 0) {
    lines.push(`Stage errors: ${totals.stageErrors}`);
  }
  for (const file of report.files) {
    if (file.status === 'failed') {
      lines.push(`  failed: ${file.file}`);
    } else if (file.failedStages.length > 0) {
      lines.push(`  ${file.file}: ${file.failedStages.join(', ')} failed`);
    }
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Enrich a directory of specs. Returns the process exit code: 1 when
 * `--fail-on-error` is set and a file or stage failed, else 0.
 */
export async function runEnrichCommand(
  flags: EnrichCliOptions
): Promise<number> {
  const options = loadConfigOrDefaults(flags.config);
  const report = await runCorpus({
    inputDir: flags.input,
    outputDir: flags.output,
    options: applyEnrichFlags(options, flags),
  });

  if (flags.report) {
    await writeFile(flags.report, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
  }
  process.stdout.write(formatCorpusSummary(report));

  const hasFailures =
    report.totals.failed > 0 || report.totals.stageErrors > 0;
  return flags.failOnError === true && hasFailures ? 1 : 0;
}
