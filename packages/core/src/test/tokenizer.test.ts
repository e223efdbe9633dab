/**
 * Tokenizer tests — pure functions only (no filesystem).
 */

import { describe, it, expect } from 'vitest';
import { normalizeText, tokenize, createDocument } from '../tokenizer/shared.js';

// ---------------------------------------------------------------------------
// normalizeText
// ---------------------------------------------------------------------------

describe('normalizeText', () => {
  it('lowercases letters', () => {
    expect(normalizeText('HeLLo')).toBe('hello');
  });

  it('strips punctuation and digits instead of replacing them', () => {
    expect(normalizeText("it's 2024: cafe-time")).toBe('its  cafetime');
  });

  it('removes accented letters entirely', () => {
    expect(normalizeText('café')).toBe('caf');
  });

  it('removes newlines and tabs, joining adjacent words', () => {
    expect(normalizeText('one\ntwo\tthree')).toBe('onetwothree');
  });

  it('keeps plain spaces', () => {
    expect(normalizeText('  a  b ')).toBe('  a  b ');
  });
});

// ---------------------------------------------------------------------------
// tokenize
// ---------------------------------------------------------------------------

describe('tokenize', () => {
  it('splits "Hello World!" into two words', () => {
    const { tokens, uniqueWords } = tokenize('Hello World!');
    expect(tokens).toEqual(['hello', 'world']);
    expect([...uniqueWords]).toEqual(['hello', 'world']);
  });

  it('keeps duplicates in tokens but not in the set', () => {
    const { tokens, uniqueWords } = tokenize('The cat and the hat');
    expect(tokens).toEqual(['the', 'cat', 'and', 'the', 'hat']);
    expect(uniqueWords.size).toBe(4);
    expect(uniqueWords.has('the')).toBe(true);
  });

  it('drops empty tokens from leading, trailing and repeated spaces', () => {
    expect(tokenize('   leading   and trailing   ').tokens).toEqual(['leading', 'and', 'trailing']);
  });

  it('handles mixed content', () => {
    expect(tokenize("It's 2024: café-time\nnow").tokens).toEqual(['its', 'caftimenow']);
  });

  it('returns nothing for an empty string', () => {
    const { tokens, uniqueWords } = tokenize('');
    expect(tokens).toEqual([]);
    expect(uniqueWords.size).toBe(0);
  });

  it('returns nothing for punctuation and digits only', () => {
    const { tokens, uniqueWords } = tokenize('!!! ... 123 -- ?');
    expect(tokens).toEqual([]);
    expect(uniqueWords.size).toBe(0);
  });

  it('is stable when the tokens are rejoined and tokenized again', () => {
    const samples = [
      'Hello, World! Hello again.',
      "Don't stop\nbelieving 99 times",
      '  Ünïcödé   and ASCII\tmixed  ',
      '',
    ];
    for (const text of samples) {
      const first = tokenize(text);
      const second = tokenize(first.tokens.join(' '));
      expect([...second.uniqueWords].sort()).toEqual([...first.uniqueWords].sort());
      expect(second.tokens).toEqual(first.tokens);
    }
  });
});

// ---------------------------------------------------------------------------
// createDocument
// ---------------------------------------------------------------------------

describe('createDocument', () => {
  it('derives tokens and word set from the raw text', () => {
    const doc = createDocument('essay.txt', 'To be, or not to be.');
    expect(doc.name).toBe('essay.txt');
    expect(doc.rawText).toBe('To be, or not to be.');
    expect(doc.tokens).toEqual(['to', 'be', 'or', 'not', 'to', 'be']);
    expect(doc.wordSet.size).toBe(4);
  });
});
