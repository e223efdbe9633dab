#!/usr/bin/env node
/**
 * plagiscope CLI entry point
 *
 *   plagiscope compare                      # original.txt vs student.txt
 *   plagiscope compare ref.txt a.txt b.txt  # rank candidates against a reference
 *   plagiscope matrix a.txt b.txt c.txt     # all-pairs similarity
 */

import { Command } from 'commander';
import { registerCompareCommand } from '../commands/compare.js';
import { registerMatrixCommand } from '../commands/matrix.js';

const CURRENT_VERSION = '0.1.0';

const program = new Command();

program
  .name('plagiscope')
  .description('Word-overlap plagiarism checker (Jaccard similarity)')
  .version(CURRENT_VERSION);

registerCompareCommand(program);
registerMatrixCommand(program);

async function main() {
  await program.parseAsync();
}

main().catch((err) => {
  if (err instanceof Error) {
    // User-friendly error: message only, no stack trace
    const prefix = '\x1b[31m✗\x1b[0m';
    console.error(`${prefix} ${err.message}`);
    if (process.env.DEBUG || process.argv.includes('--verbose') || process.argv.includes('-v')) {
      console.error(err.stack);
    }
  } else {
    console.error(err);
  }
  process.exit(1);
});
