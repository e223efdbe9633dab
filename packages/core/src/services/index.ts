/**
 * Service exports
 *
 * Services orchestrate document acquisition and scoring.
 * Text extraction is dependency-injected for testability.
 */

export {
  acquireDocuments,
  analyzeOneToMany,
  analyzeMatrix,
  type Logger,
  type TextExtractor,
  type AnalysisDeps,
  type ExtractionFailure,
  type AcquiredDocuments,
  type ReferenceSummary,
  type InsufficientDocumentsReport,
  type MissingRole,
  type OneToManySuccess,
  type OneToManyReport,
  type MatrixSuccess,
  type MatrixReport,
  type OneToManyOptions,
  type MatrixOptions,
} from './analysis.js';
