/**
 * Process exit codes shared by every command
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  /** Too few documents could be read for the requested mode */
  INSUFFICIENT_DOCUMENTS: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
