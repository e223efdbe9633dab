/**
 * @plagiscope/cli
 *
 * plagiscope command-line interface.
 *
 * This package is a CLI tool only - it has no public API exports.
 * Use it via the command line:
 *
 *   plagiscope compare essay.txt alice.txt bob.txt
 *   plagiscope matrix alice.txt bob.txt carol.txt
 *
 * The CLI entry point is src/bin/plagiscope.ts
 */

export {};
