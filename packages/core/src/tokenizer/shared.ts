/**
 * Pure tokenizer — no filesystem, no I/O.
 *
 * Turns raw text into the normalized word sequence and word set that the
 * similarity engine compares. The normalization is fixed: scores produced
 * by earlier runs stay comparable only if it never changes.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TokenizedText {
  /** Normalized words in input order, duplicates kept */
  tokens: readonly string[];
  /** Distinct tokens */
  uniqueWords: ReadonlySet<string>;
}

export interface TokenizedDocument {
  /** Display identifier, usually the file name */
  name: string;
  rawText: string;
  tokens: readonly string[];
  wordSet: ReadonlySet<string>;
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

/**
 * Lowercase the text and strip every character that is not a-z or a space.
 * Stripped characters are removed, not replaced: "don't" becomes "dont" and
 * a newline joins the words on either side of it.
 */
export function normalizeText(text: string): string {
  return text.toLowerCase().replace(/[^a-z ]/g, '');
}

/**
 * Split text into normalized tokens and their distinct set.
 * Never throws; empty or punctuation-only input yields no tokens.
 */
export function tokenize(text: string): TokenizedText {
  const tokens = normalizeText(text)
    .split(/\s+/)
    .filter(word => word.length > 0);

  return { tokens, uniqueWords: new Set(tokens) };
}

/**
 * Build a document whose tokens and word set are derived once from its text.
 */
export function createDocument(name: string, rawText: string): TokenizedDocument {
  const { tokens, uniqueWords } = tokenize(rawText);
  return { name, rawText, tokens, wordSet: uniqueWords };
}
