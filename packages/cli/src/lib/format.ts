/**
 * Terminal formatting for analysis results
 */

import chalk from 'chalk';
import { OUTPUT_DEFAULTS } from '@plagiscope/core';
import {
  classifySimilarity,
  similarityLabel,
  type SimilarityLevel,
  type PairResult,
  type MatrixResult,
} from '@plagiscope/core/similarity';
import type { ExtractionFailure, ReferenceSummary } from '@plagiscope/core/services';

const LEVEL_COLORS: Record<SimilarityLevel, (text: string) => string> = {
  low: chalk.green,
  medium: chalk.yellow,
  high: chalk.red,
};

export function formatPercent(score: number, precision: number = OUTPUT_DEFAULTS.PRECISION): string {
  return `${score.toFixed(precision)}%`;
}

/**
 * One-line verdict for a single reference/candidate pair
 */
export function formatSummaryLine(score: number): string {
  return `Plagiarism detected: ${formatPercent(score, OUTPUT_DEFAULTS.SUMMARY_PRECISION)} similarity`;
}

export function formatReferenceHeader(reference: ReferenceSummary): string {
  return `${chalk.bold(`Reference: ${reference.name}`)} ${chalk.gray(
    `(${reference.wordCount} words, ${reference.uniqueWordCount} unique)`,
  )}`;
}

/**
 * Ranked one-to-many results, one line per candidate
 */
export function formatComparisonTable(results: PairResult[], precision: number): string[] {
  const nameWidth = Math.max(...results.map(r => r.name.length));
  const pctWidth = Math.max(...results.map(r => formatPercent(r.score, precision).length));

  return results.map((r, i) => {
    const level = classifySimilarity(r.score);
    const color = LEVEL_COLORS[level];
    const pct = formatPercent(r.score, precision).padStart(pctWidth);
    const stats = chalk.gray(
      `(${r.wordCount} words, ${r.uniqueWordCount} unique, ${r.commonWordCount} common)`,
    );
    return `${i + 1}. ${r.name.padEnd(nameWidth)}  ${color(pct)}  ${color(similarityLabel(level))}  ${stats}`;
  });
}

/**
 * N×N grid of scores with a [index] → name legend
 */
export function formatMatrix(result: MatrixResult, precision: number): string[] {
  const labels = result.names.map((_, i) => `[${i}]`);
  const cells = result.matrix.map(row => row.map(v => v.toFixed(precision)));

  const labelWidth = Math.max(...labels.map(l => l.length));
  const cellWidth = Math.max(labelWidth, ...cells.flat().map(c => c.length));
  const gap = '  ';

  const lines: string[] = [];
  lines.push(' '.repeat(labelWidth) + gap + labels.map(l => l.padStart(cellWidth)).join(gap));

  cells.forEach((row, i) => {
    const rendered = row.map((cell, j) => {
      const padded = cell.padStart(cellWidth);
      if (i === j) return chalk.gray(padded);
      return LEVEL_COLORS[classifySimilarity(result.matrix[i][j])](padded);
    });
    lines.push(labels[i].padEnd(labelWidth) + gap + rendered.join(gap));
  });

  lines.push('');
  result.names.forEach((name, i) => {
    lines.push(chalk.gray(`${labels[i].padEnd(labelWidth)} ${name}`));
  });

  return lines;
}

/**
 * Documents ranked by average similarity to all the others
 */
export function formatMatrixRanking(result: MatrixResult, precision: number): string[] {
  const docs = result.perDocument;
  const nameWidth = Math.max(...docs.map(d => d.name.length));
  const pctWidth = Math.max(...docs.map(d => formatPercent(d.averageSimilarity, precision).length));

  return docs.map((d, i) => {
    const level = classifySimilarity(d.averageSimilarity);
    const color = LEVEL_COLORS[level];
    const pct = formatPercent(d.averageSimilarity, precision).padStart(pctWidth);
    const stats = chalk.gray(`(${d.wordCount} words, ${d.uniqueWordCount} unique)`);
    return `${i + 1}. ${d.name.padEnd(nameWidth)}  avg ${color(pct)}  ${color(similarityLabel(level))}  ${stats}`;
  });
}

export function formatFailures(failures: ExtractionFailure[]): string[] {
  return failures.map(f => `  ✗ ${f.name}: ${f.message}`);
}
