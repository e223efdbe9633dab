/**
 * Pure similarity engine — Jaccard overlap of word sets, no I/O.
 *
 * Scores are percentages in [0, 100]. Three modes build on `similarity()`:
 * a single pair, one reference against many candidates, and an all-pairs
 * matrix with per-document averages.
 */

import { SIMILARITY_DEFAULTS } from '../config/defaults.js';
import type { TokenizedDocument } from '../tokenizer/shared.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** What the engine needs from a document */
export type ScorableDocument = Pick<TokenizedDocument, 'name' | 'tokens' | 'wordSet'>;

export type SimilarityLevel = 'low' | 'medium' | 'high';

export interface PairResult {
  /** Candidate name */
  name: string;
  /** 0-100 */
  score: number;
  wordCount: number;
  uniqueWordCount: number;
  /** Words the candidate shares with the reference */
  commonWordCount: number;
}

export interface MatrixDocumentSummary {
  name: string;
  /** Position of the document in the matrix */
  index: number;
  /** Mean of the document's row, diagonal excluded */
  averageSimilarity: number;
  wordCount: number;
  uniqueWordCount: number;
}

export interface MatrixResult {
  /** Document names in matrix order */
  names: string[];
  /** matrix[i][j] = similarity of documents i and j */
  matrix: number[][];
  /** Sorted by averageSimilarity, highest first */
  perDocument: MatrixDocumentSummary[];
}

const LEVEL_LABELS: Record<SimilarityLevel, string> = {
  low: 'Low Similarity',
  medium: 'Medium Similarity',
  high: 'High Similarity',
};

// ---------------------------------------------------------------------------
// Core scoring
// ---------------------------------------------------------------------------

/**
 * Size of the intersection of two word sets.
 */
export function commonWordCount(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let shared = 0;
  for (const word of small) {
    if (large.has(word)) shared++;
  }
  return shared;
}

/**
 * Jaccard similarity of two word sets as a percentage (0-100).
 * Two empty sets score 0, so a numeric score always exists.
 */
export function similarity(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  const intersection = commonWordCount(a, b);
  const union = a.size + b.size - intersection;
  if (union === 0) return 0;
  return (intersection / union) * 100;
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

/**
 * Bucket a score for reporting. Boundary values go to the higher bucket.
 */
export function classifySimilarity(score: number): SimilarityLevel {
  if (score < SIMILARITY_DEFAULTS.LOW_THRESHOLD) return 'low';
  if (score < SIMILARITY_DEFAULTS.HIGH_THRESHOLD) return 'medium';
  return 'high';
}

export function similarityLabel(level: SimilarityLevel): string {
  return LEVEL_LABELS[level];
}

// ---------------------------------------------------------------------------
// Pairwise modes
// ---------------------------------------------------------------------------

/**
 * Compare one candidate against the reference word set.
 */
export function comparePair(
  reference: ReadonlySet<string>,
  candidate: ScorableDocument,
): PairResult {
  return {
    name: candidate.name,
    score: similarity(reference, candidate.wordSet),
    wordCount: candidate.tokens.length,
    uniqueWordCount: candidate.wordSet.size,
    commonWordCount: commonWordCount(reference, candidate.wordSet),
  };
}

/**
 * Compare every candidate against the reference, highest score first.
 * Tied candidates keep their input order.
 */
export function compareOneToMany(
  reference: ReadonlySet<string>,
  candidates: readonly ScorableDocument[],
): PairResult[] {
  if (candidates.length < SIMILARITY_DEFAULTS.MIN_CANDIDATES) {
    throw new Error('compareOneToMany requires at least 1 candidate');
  }

  return candidates
    .map(candidate => comparePair(reference, candidate))
    .sort((a, b) => b.score - a.score);
}

// ---------------------------------------------------------------------------
// Matrix mode
// ---------------------------------------------------------------------------

/**
 * Build the all-pairs similarity matrix and rank documents by their average
 * similarity to every other document.
 */
export function buildMatrix(documents: readonly ScorableDocument[]): MatrixResult {
  const n = documents.length;
  if (n < SIMILARITY_DEFAULTS.MIN_MATRIX_DOCUMENTS) {
    throw new Error(
      `buildMatrix requires at least ${SIMILARITY_DEFAULTS.MIN_MATRIX_DOCUMENTS} documents, got ${n}`,
    );
  }

  const matrix: number[][] = documents.map(() => new Array<number>(n).fill(0));

  for (let i = 0; i < n; i++) {
    matrix[i][i] = SIMILARITY_DEFAULTS.SELF_SIMILARITY;
    for (let j = i + 1; j < n; j++) {
      const score = similarity(documents[i].wordSet, documents[j].wordSet);
      matrix[i][j] = score;
      matrix[j][i] = score;
    }
  }

  const perDocument = documents
    .map((doc, index): MatrixDocumentSummary => {
      let total = 0;
      for (let j = 0; j < n; j++) {
        if (j !== index) total += matrix[index][j];
      }
      return {
        name: doc.name,
        index,
        averageSimilarity: total / (n - 1),
        wordCount: doc.tokens.length,
        uniqueWordCount: doc.wordSet.size,
      };
    })
    .sort((a, b) => b.averageSimilarity - a.averageSimilarity);

  return {
    names: documents.map(doc => doc.name),
    matrix,
    perDocument,
  };
}
