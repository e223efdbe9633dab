/**
 * @plagiscope/core
 *
 * Core scoring logic and shared types for plagiscope:
 *
 * - Tokenizer (normalized word sequences and word sets)
 * - Similarity engine (Jaccard scoring, one-to-many ranking, all-pairs matrix)
 * - Analysis service (document acquisition with per-file failure reports)
 */

// Tokenizer
export * as tokenizer from './tokenizer/shared.js';
export { tokenize, normalizeText, createDocument } from './tokenizer/shared.js';
export type { TokenizedText, TokenizedDocument } from './tokenizer/shared.js';

// Similarity engine
export * as similarity from './similarity/shared.js';
export type {
  ScorableDocument,
  SimilarityLevel,
  PairResult,
  MatrixDocumentSummary,
  MatrixResult,
} from './similarity/shared.js';

// Services (namespaced)
export * as services from './services/index.js';
export type { Logger, TextExtractor, AnalysisDeps, ExtractionFailure } from './services/index.js';
export { analyzeOneToMany, analyzeMatrix } from './services/index.js';

// Centralized defaults
export { SIMILARITY_DEFAULTS, INPUT_DEFAULTS, OUTPUT_DEFAULTS } from './config/defaults.js';
