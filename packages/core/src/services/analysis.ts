/**
 * Analysis Service - Acquire documents and run a similarity analysis
 *
 * This is pure orchestration: text extraction is injected, scoring is
 * delegated to the similarity engine. Per-document failures are collected
 * into the report instead of aborting the run.
 */

import { SIMILARITY_DEFAULTS } from '../config/defaults.js';
import { createDocument, type TokenizedDocument } from '../tokenizer/shared.js';
import {
  buildMatrix,
  compareOneToMany,
  type MatrixResult,
  type PairResult,
} from '../similarity/shared.js';

/**
 * Logger interface
 */
export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
}

/**
 * Reads the plain text of one source (a file path, URL, upload id...).
 * Rejects when the source cannot be read or decoded.
 */
export type TextExtractor = (source: string) => Promise<string>;

export interface AnalysisDeps {
  extractText: TextExtractor;
  logger?: Logger;
}

export interface ExtractionFailure {
  name: string;
  message: string;
}

export interface AcquiredDocuments {
  /** Successfully read documents, in input order */
  documents: TokenizedDocument[];
  /** Sources that could not be read, in input order */
  failures: ExtractionFailure[];
}

export interface ReferenceSummary {
  name: string;
  wordCount: number;
  uniqueWordCount: number;
}

export type MissingRole = 'reference' | 'candidates' | 'documents';

export interface InsufficientDocumentsReport {
  status: 'insufficient_documents';
  /** Documents that were read successfully, reference included */
  succeeded: number;
  /** Documents the mode needs, reference included */
  required: number;
  /** Which documents the run is short of */
  missing: MissingRole;
  failures: ExtractionFailure[];
  message: string;
}

export interface OneToManySuccess {
  status: 'success';
  reference: ReferenceSummary;
  results: PairResult[];
  failures: ExtractionFailure[];
}

export type OneToManyReport = OneToManySuccess | InsufficientDocumentsReport;

export interface MatrixSuccess extends MatrixResult {
  status: 'success';
  failures: ExtractionFailure[];
}

export type MatrixReport = MatrixSuccess | InsufficientDocumentsReport;

export interface OneToManyOptions {
  reference: string;
  candidates: readonly string[];
}

export interface MatrixOptions {
  sources: readonly string[];
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Extract and tokenize every source concurrently.
 * Waits for all extractions to settle before returning.
 */
export async function acquireDocuments(
  deps: AnalysisDeps,
  sources: readonly string[],
): Promise<AcquiredDocuments> {
  const { extractText, logger } = deps;

  const settled = await Promise.allSettled(sources.map(source => extractText(source)));

  const documents: TokenizedDocument[] = [];
  const failures: ExtractionFailure[] = [];

  settled.forEach((outcome, i) => {
    const name = sources[i];
    if (outcome.status === 'fulfilled') {
      const doc = createDocument(name, outcome.value);
      logger?.debug(`Tokenized ${name}`, {
        wordCount: doc.tokens.length,
        uniqueWordCount: doc.wordSet.size,
      });
      documents.push(doc);
    } else {
      const message = errorMessage(outcome.reason);
      logger?.warn(`Could not read ${name}: ${message}`);
      failures.push({ name, message });
    }
  });

  return { documents, failures };
}

function insufficient(
  missing: MissingRole,
  succeeded: number,
  required: number,
  failures: ExtractionFailure[],
  message: string,
): InsufficientDocumentsReport {
  return { status: 'insufficient_documents', succeeded, required, missing, failures, message };
}

/**
 * Compare every candidate against one reference document.
 */
export async function analyzeOneToMany(
  deps: AnalysisDeps,
  opts: OneToManyOptions,
): Promise<OneToManyReport> {
  const { logger } = deps;
  const { reference, candidates } = opts;

  const [ref, cand] = await Promise.all([
    acquireDocuments(deps, [reference]),
    acquireDocuments(deps, candidates),
  ]);
  const referenceDoc: TokenizedDocument | undefined = ref.documents[0];
  const candidateDocs = cand.documents;
  const failures = [...ref.failures, ...cand.failures];

  // The reference counts as one of the documents the run needs
  const required = 1 + SIMILARITY_DEFAULTS.MIN_CANDIDATES;

  if (!referenceDoc) {
    return insufficient(
      'reference',
      candidateDocs.length,
      required,
      failures,
      `Reference document ${reference} could not be processed`,
    );
  }

  if (candidateDocs.length < SIMILARITY_DEFAULTS.MIN_CANDIDATES) {
    return insufficient(
      'candidates',
      1 + candidateDocs.length,
      required,
      failures,
      `No candidate documents could be processed (${candidates.length} requested)`,
    );
  }

  logger?.info(`Comparing ${candidateDocs.length} document(s) against ${reference}`);

  return {
    status: 'success',
    reference: {
      name: referenceDoc.name,
      wordCount: referenceDoc.tokens.length,
      uniqueWordCount: referenceDoc.wordSet.size,
    },
    results: compareOneToMany(referenceDoc.wordSet, candidateDocs),
    failures,
  };
}

/**
 * Build the all-pairs similarity matrix over every readable source.
 */
export async function analyzeMatrix(
  deps: AnalysisDeps,
  opts: MatrixOptions,
): Promise<MatrixReport> {
  const { logger } = deps;

  const { documents, failures } = await acquireDocuments(deps, opts.sources);

  if (documents.length < SIMILARITY_DEFAULTS.MIN_MATRIX_DOCUMENTS) {
    return insufficient(
      'documents',
      documents.length,
      SIMILARITY_DEFAULTS.MIN_MATRIX_DOCUMENTS,
      failures,
      `Matrix mode needs at least ${SIMILARITY_DEFAULTS.MIN_MATRIX_DOCUMENTS} documents, ` +
        `${documents.length} of ${opts.sources.length} could be processed`,
    );
  }

  logger?.info(`Building ${documents.length}x${documents.length} similarity matrix`);

  return {
    status: 'success',
    ...buildMatrix(documents),
    failures,
  };
}
