import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { INPUT_DEFAULTS } from '@plagiscope/core';
import { createFileExtractor, isSupportedFile } from '../lib/extract.js';

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'plagiscope-extract-test-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('isSupportedFile', () => {
  it('accepts plain-text extensions and extensionless files', () => {
    expect(isSupportedFile('essay.txt')).toBe(true);
    expect(isSupportedFile('NOTES.MD')).toBe(true);
    expect(isSupportedFile('README')).toBe(true);
  });

  it('accepts exactly .txt, .md and extensionless files', () => {
    expect(INPUT_DEFAULTS.SUPPORTED_EXTENSIONS).toEqual(['.txt', '.md', '']);
    expect(isSupportedFile('notes.text')).toBe(false);
  });

  it('rejects binary document formats', () => {
    expect(isSupportedFile('thesis.pdf')).toBe(false);
    expect(isSupportedFile('report.docx')).toBe(false);
  });
});

describe('createFileExtractor', () => {
  it('reads a file relative to cwd', async () => {
    fs.writeFileSync(path.join(tmpDir, 'a.txt'), 'Hello World!\n');
    const extract = createFileExtractor({ cwd: tmpDir });
    await expect(extract('a.txt')).resolves.toBe('Hello World!\n');
  });

  it('reads an absolute path', async () => {
    const file = path.join(tmpDir, 'b.txt');
    fs.writeFileSync(file, 'absolute');
    const extract = createFileExtractor({ cwd: '/' });
    await expect(extract(file)).resolves.toBe('absolute');
  });

  it('rejects missing files with a short message', async () => {
    const extract = createFileExtractor({ cwd: tmpDir });
    await expect(extract('missing.txt')).rejects.toThrow('File not found: missing.txt');
  });

  it('rejects directories', async () => {
    fs.mkdirSync(path.join(tmpDir, 'folder'));
    const extract = createFileExtractor({ cwd: tmpDir });
    await expect(extract('folder')).rejects.toThrow('Not a file: folder');
  });

  it('rejects unsupported formats without touching the disk', async () => {
    const extract = createFileExtractor({ cwd: tmpDir });
    await expect(extract('thesis.PDF')).rejects.toThrow('Unsupported file format: .pdf');
  });
});
