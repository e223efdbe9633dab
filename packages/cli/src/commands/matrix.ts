/**
 * matrix command: all-pairs similarity across a set of documents
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { analyzeMatrix, type MatrixReport } from '@plagiscope/core/services';
import { createFileExtractor } from '../lib/extract.js';
import { createLogger } from '../lib/logger.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import {
  loadConfig,
  parsePrecision,
  resolveMatrixInputs,
  resolveOutputSettings,
  type CommonCliOptions,
  type OutputSettings,
} from '../lib/config.js';
import { formatFailures, formatMatrix, formatMatrixRanking } from '../lib/format.js';
import { printCommandError, printInsufficient } from '../lib/output.js';

function printReport(report: MatrixReport, settings: OutputSettings): ExitCode {
  if (report.status !== 'success') {
    printInsufficient(report, settings);
    return EXIT_CODES.INSUFFICIENT_DOCUMENTS;
  }

  if (settings.json) {
    console.log(JSON.stringify({ success: true, ...report }, null, 2));
    return EXIT_CODES.SUCCESS;
  }

  console.log(chalk.bold(`Similarity matrix (${report.names.length} documents)`));
  console.log();
  for (const line of formatMatrix(report, settings.precision)) {
    console.log(line);
  }

  console.log();
  console.log(chalk.bold('Ranked by average similarity'));
  for (const line of formatMatrixRanking(report, settings.precision)) {
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
 * Build the matrix and print it. Returns the process exit code.
 */
export async function runMatrix(
  files: string[],
  options: CommonCliOptions,
  cwd: string = process.cwd(),
): Promise<ExitCode> {
  let settings: OutputSettings = resolveOutputSettings(options, {});
  try {
    const config = loadConfig(cwd, options.config);
    settings = resolveOutputSettings(options, config);

    const logger = createLogger({
      verbose: settings.verbose,
      quiet: settings.quiet || settings.json,
      stderr: settings.json,
    });

    const report = await analyzeMatrix(
      { extractText: createFileExtractor({ cwd }), logger },
      { sources: resolveMatrixInputs(files, config) },
    );
    return printReport(report, settings);
  } catch (err) {
    printCommandError(err, settings);
    return EXIT_CODES.FAILURE;
  }
}

export function registerMatrixCommand(program: Command): void {
  program
    .command('matrix [files...]')
    .description('Compare every document with every other document')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Show debug output')
    .option('-q, --quiet', 'Hide progress messages')
    .option('--precision <n>', 'Decimal places for percentages', parsePrecision)
    .option('-c, --config <path>', 'Path to a plagiscope.config.json')
    .addHelpText('after', `
Needs at least 2 readable files. Unreadable files are reported and skipped.

Examples:
  plagiscope matrix a.txt b.txt c.txt
  plagiscope matrix submissions/*.txt --precision 2
`)
    .action(async (files: string[], options: CommonCliOptions) => {
      const code = await runMatrix(files, options);
      process.exitCode = code;
    });
}
