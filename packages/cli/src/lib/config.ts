/**
 * CLI configuration
 *
 * Settings come from three layers, highest priority first:
 * command-line flags, plagiscope.config.json, built-in defaults.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { InvalidArgumentError } from 'commander';
import { z } from 'zod';
import { INPUT_DEFAULTS, OUTPUT_DEFAULTS } from '@plagiscope/core';

export const CONFIG_FILENAME = 'plagiscope.config.json';

export const configSchema = z
  .object({
    /** Reference document for `compare` */
    reference: z.string().min(1).optional(),
    /** Candidate documents for `compare` */
    candidates: z.array(z.string().min(1)).optional(),
    /** Documents for `matrix` */
    files: z.array(z.string().min(1)).optional(),
    /** Decimal places for percentages */
    precision: z.number().int().min(0).max(OUTPUT_DEFAULTS.MAX_PRECISION).optional(),
    /** Emit JSON instead of tables */
    json: z.boolean().optional(),
  })
  .strict();

export type PlagiscopeConfig = z.infer<typeof configSchema>;

/**
 * Options shared by every command
 */
export interface CommonCliOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  precision?: number;
  config?: string;
}

export interface OutputSettings {
  json: boolean;
  verbose: boolean;
  quiet: boolean;
  precision: number;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Load plagiscope.config.json (or an explicit path).
 * A missing default file yields an empty config; a missing explicit file,
 * malformed JSON or an invalid field throws.
 */
export function loadConfig(cwd: string, explicitPath?: string): PlagiscopeConfig {
  const configPath = path.resolve(cwd, explicitPath ?? CONFIG_FILENAME);

  if (!fs.existsSync(configPath)) {
    if (explicitPath) {
      throw new Error(`Config file not found: ${explicitPath}`);
    }
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new Error(`Invalid JSON in ${path.basename(configPath)}: ${err instanceof Error ? err.message : err}`);
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid config ${path.basename(configPath)}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Parse a --precision value. Commander reports the InvalidArgumentError
 * as a usage error for the option.
 */
export function parsePrecision(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0 || n > OUTPUT_DEFAULTS.MAX_PRECISION) {
    throw new InvalidArgumentError(`--precision must be an integer between 0 and ${OUTPUT_DEFAULTS.MAX_PRECISION}`);
  }
  return n;
}

export function resolveOutputSettings(
  options: CommonCliOptions,
  config: PlagiscopeConfig,
): OutputSettings {
  return {
    json: options.json ?? config.json ?? false,
    verbose: options.verbose ?? false,
    quiet: options.quiet ?? false,
    precision: options.precision ?? config.precision ?? OUTPUT_DEFAULTS.PRECISION,
  };
}

/**
 * Pick the reference and candidates for `compare`.
 * Falls back to config, then to original.txt vs student.txt.
 */
export function resolveCompareInputs(
  reference: string | undefined,
  candidates: string[],
  config: PlagiscopeConfig,
): { reference: string; candidates: string[] } {
  const resolvedReference = reference ?? config.reference ?? INPUT_DEFAULTS.REFERENCE_FILE;

  let resolvedCandidates = candidates;
  if (resolvedCandidates.length === 0) {
    resolvedCandidates = config.candidates ?? [];
  }
  if (resolvedCandidates.length === 0 && !reference) {
    resolvedCandidates = [INPUT_DEFAULTS.CANDIDATE_FILE];
  }

  return { reference: resolvedReference, candidates: resolvedCandidates };
}

/**
 * Pick the documents for `matrix`
 */
export function resolveMatrixInputs(files: string[], config: PlagiscopeConfig): string[] {
  return files.length > 0 ? files : config.files ?? [];
}
