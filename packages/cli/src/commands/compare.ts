/**
 * compare command: one reference document against one or more candidates
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { analyzeOneToMany, type OneToManyReport } from '@plagiscope/core/services';
import { createFileExtractor } from '../lib/extract.js';
import { createLogger } from '../lib/logger.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import {
  loadConfig,
  parsePrecision,
  resolveCompareInputs,
  resolveOutputSettings,
  type CommonCliOptions,
  type OutputSettings,
} from '../lib/config.js';
import {
  formatComparisonTable,
  formatFailures,
  formatReferenceHeader,
  formatSummaryLine,
} from '../lib/format.js';
import { printInsufficient, printCommandError } from '../lib/output.js';

function printReport(report: OneToManyReport, settings: OutputSettings): ExitCode {
  if (report.status !== 'success') {
    printInsufficient(report, settings);
    return EXIT_CODES.INSUFFICIENT_DOCUMENTS;
  }

  if (settings.json) {
    console.log(JSON.stringify({ success: true, ...report }, null, 2));
    return EXIT_CODES.SUCCESS;
  }

  console.log(formatReferenceHeader(report.reference));
  console.log();

  if (report.results.length === 1) {
    console.log(formatSummaryLine(report.results[0].score));
    console.log();
  }

  for (const line of formatComparisonTable(report.results, settings.precision)) {
    console.log(line);
  }

  if (report.failures.length > 0) {
    console.log();
    console.log(chalk.yellow(`${report.failures.length} file(s) skipped:`));
    for (const line of formatFailures(report.failures)) {
      console.log(chalk.yellow(line));
    }
  }

  return EXIT_CODES.SUCCESS;
}

/**
 * Run a comparison and print the result. Returns the process exit code.
 */
export async function runCompare(
  reference: string | undefined,
  candidates: string[],
  options: CommonCliOptions,
  cwd: string = process.cwd(),
): Promise<ExitCode> {
  let settings: OutputSettings = resolveOutputSettings(options, {});
  try {
    const config = loadConfig(cwd, options.config);
    settings = resolveOutputSettings(options, config);
    const inputs = resolveCompareInputs(reference, candidates, config);

    const logger = createLogger({
      verbose: settings.verbose,
      quiet: settings.quiet || settings.json,
      stderr: settings.json,
    });

    const report = await analyzeOneToMany(
      { extractText: createFileExtractor({ cwd }), logger },
      inputs,
    );
    return printReport(report, settings);
  } catch (err) {
    printCommandError(err, settings);
    return EXIT_CODES.FAILURE;
  }
}

export function registerCompareCommand(program: Command): void {
  program
    .command('compare [reference] [candidates...]')
    .description('Score candidate documents against a reference document')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Show debug output')
    .option('-q, --quiet', 'Hide progress messages')
    .option('--precision <n>', 'Decimal places for percentages', parsePrecision)
    .option('-c, --config <path>', 'Path to a plagiscope.config.json')
    .addHelpText('after', `
With no arguments, compares original.txt against student.txt.

Examples:
  plagiscope compare
  plagiscope compare essay.txt submissions/*.txt
  plagiscope compare essay.txt alice.txt bob.txt --json
`)
    .action(async (reference: string | undefined, candidates: string[], options: CommonCliOptions) => {
      const code = await runCompare(reference, candidates, options);
      process.exitCode = code;
    });
}
