/**
 * Logger implementation for CLI
 */

import chalk from 'chalk';
import type { Logger } from '@plagiscope/core/services';

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  /** Write every level to stderr so stdout only carries command output (--json) */
  stderr?: boolean;
}

/**
 * Create a logger instance
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const { verbose = false, quiet = false, stderr = false } = opts;
  const out = stderr ? console.error : console.log;

  return {
    debug(msg: string, data?: Record<string, unknown>) {
      if (verbose && !quiet) {
        const dataStr = data ? ` ${JSON.stringify(data)}` : '';
        out(chalk.gray(`[debug] ${msg}${dataStr}`));
      }
    },

    info(msg: string, data?: Record<string, unknown>) {
      if (!quiet) {
        const dataStr = data && verbose ? ` ${JSON.stringify(data)}` : '';
        out(chalk.blue(`[info] ${msg}${dataStr}`));
      }
    },

    warn(msg: string, data?: Record<string, unknown>) {
      const dataStr = data ? ` ${JSON.stringify(data)}` : '';
      console.error(chalk.yellow(`[warn] ${msg}${dataStr}`));
    },

    error(msg: string, data?: Record<string, unknown>) {
      const dataStr = data ? ` ${JSON.stringify(data)}` : '';
      console.error(chalk.red(`[error] ${msg}${dataStr}`));
    },
  };
}
