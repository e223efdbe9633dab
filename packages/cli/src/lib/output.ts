/**
 * Error output shared by the commands
 */

import chalk from 'chalk';
import type { InsufficientDocumentsReport } from '@plagiscope/core/services';
import type { OutputSettings } from './config.js';
import { formatFailures } from './format.js';

export function printInsufficient(
  report: InsufficientDocumentsReport,
  settings: Pick<OutputSettings, 'json'>,
): void {
  if (settings.json) {
    console.log(JSON.stringify({
      success: false,
      error: report.message,
      succeeded: report.succeeded,
      required: report.required,
      missing: report.missing,
      failures: report.failures,
    }, null, 2));
    return;
  }

  console.error(chalk.red(`✗ ${report.message}`));
  for (const line of formatFailures(report.failures)) {
    console.error(chalk.gray(line));
  }
}

export function printCommandError(err: unknown, settings: Pick<OutputSettings, 'json'>): void {
  const message = err instanceof Error ? err.message : String(err);
  if (settings.json) {
    console.log(JSON.stringify({ success: false, error: message }));
  } else {
    console.error(chalk.red(`✗ ${message}`));
  }
}
