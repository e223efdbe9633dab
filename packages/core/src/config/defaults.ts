/**
 * Centralized default constants for plagiscope.
 *
 * Both the core engine and the CLI read these values.
 * Add new defaults here — not scattered across packages.
 */

// ---------------------------------------------------------------------------
// Similarity scoring
// ---------------------------------------------------------------------------

export const SIMILARITY_DEFAULTS = {
  /** Scores below this are "Low Similarity" */
  LOW_THRESHOLD: 30,
  /** Scores at or above this are "High Similarity" */
  HIGH_THRESHOLD: 60,
  /** Matrix diagonal value (set directly, never computed) */
  SELF_SIMILARITY: 100,
  /** Matrix mode needs at least this many processed documents */
  MIN_MATRIX_DOCUMENTS: 2,
  /** One-to-many mode needs at least this many processed candidates */
  MIN_CANDIDATES: 1,
} as const;

// ---------------------------------------------------------------------------
// Input defaults
// ---------------------------------------------------------------------------

export const INPUT_DEFAULTS = {
  /** Reference file used when `compare` gets no arguments */
  REFERENCE_FILE: 'original.txt',
  /** Candidate file used when `compare` gets no candidates */
  CANDIDATE_FILE: 'student.txt',
  ENCODING: 'utf-8',
  /** Extensions read as plain text ('' = no extension) */
  SUPPORTED_EXTENSIONS: ['.txt', '.md', ''] as readonly string[],
} as const;

// ---------------------------------------------------------------------------
// Output defaults
// ---------------------------------------------------------------------------

export const OUTPUT_DEFAULTS = {
  /** Decimal places for percentages in tables */
  PRECISION: 1,
  /** Upper bound accepted for --precision */
  MAX_PRECISION: 4,
  /** Decimal places for the single-pair summary line */
  SUMMARY_PRECISION: 2,
} as const;
