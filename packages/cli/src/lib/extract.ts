/**
 * Plain-text extraction from local files.
 *
 * Binary formats (PDF, DOCX, ...) are rejected per file; the analysis
 * service records the rejection and keeps going with the other files.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { INPUT_DEFAULTS } from '@plagiscope/core';
import type { TextExtractor } from '@plagiscope/core/services';

export interface FileExtractorOptions {
  /** Relative sources resolve against this directory (default: process.cwd()) */
  cwd?: string;
  encoding?: BufferEncoding;
}

export function isSupportedFile(source: string): boolean {
  const ext = path.extname(source).toLowerCase();
  return INPUT_DEFAULTS.SUPPORTED_EXTENSIONS.includes(ext);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Create an extractor that reads plain-text files from disk
 */
export function createFileExtractor(opts: FileExtractorOptions = {}): TextExtractor {
  const cwd = opts.cwd ?? process.cwd();
  const encoding = opts.encoding ?? INPUT_DEFAULTS.ENCODING;

  return async (source: string) => {
    if (!isSupportedFile(source)) {
      throw new Error(`Unsupported file format: ${path.extname(source).toLowerCase()}`);
    }

    const absPath = path.resolve(cwd, source);
    try {
      const stat = await fs.stat(absPath);
      if (!stat.isFile()) {
        throw new Error(`Not a file: ${source}`);
      }
      return await fs.readFile(absPath, { encoding });
    } catch (err) {
      if (isNotFound(err)) {
        throw new Error(`File not found: ${source}`);
      }
      throw err;
    }
  };
}
