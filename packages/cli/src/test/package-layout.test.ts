/**
 * Workspace manifests: what node loads at run time must be built JavaScript,
 * while tests and type-checks read the TypeScript sources.
 */

import { describe, it, expect } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const PACKAGES_DIR = fileURLToPath(new URL('../../../', import.meta.url));

const exportsSchema = z.record(
  z.object({ types: z.string(), import: z.string(), default: z.string() }),
);

function readJson(...segments: string[]): Record<string, unknown> {
  return JSON.parse(fs.readFileSync(path.join(PACKAGES_DIR, ...segments), 'utf-8'));
}

function exportTargets(pkg: string) {
  return Object.entries(exportsSchema.parse(readJson(pkg, 'package.json').exports));
}

describe.each(['core', 'cli'])('@plagiscope/%s exports', (pkg) => {
  it('send runtime imports to dist/*.js and types to an existing source', () => {
    for (const [subpath, target] of exportTargets(pkg)) {
      expect(target.import, subpath).toMatch(/^\.\/dist\/.+\.js$/);
      expect(target.default, subpath).toBe(target.import);
      expect(target.types, subpath).toMatch(/^\.\/src\/.+\.ts$/);
      expect(fs.existsSync(path.join(PACKAGES_DIR, pkg, target.types)), target.types).toBe(true);

      const built = target.import.replace(/^\.\/dist\//, './src/').replace(/\.js$/, '.ts');
      expect(built, subpath).toBe(target.types);
    }
  });

  it('builds sources only, leaving tests out of dist', () => {
    const build = readJson(pkg, 'tsconfig.build.json');
    expect(build.compilerOptions).toMatchObject({ rootDir: 'src', outDir: 'dist' });
    expect(build.include).toEqual(['src/**/*.ts']);
    expect(build.exclude).toEqual(['src/test/**']);
  });
});

describe('plagiscope bin', () => {
  it('points at the compiled entry point of the cli package', () => {
    const manifest = readJson('cli', 'package.json');
    expect(manifest.bin).toEqual({ plagiscope: './dist/bin/plagiscope.js' });

    const source = fs.readFileSync(path.join(PACKAGES_DIR, 'cli', 'src', 'bin', 'plagiscope.ts'), 'utf-8');
    expect(source.startsWith('#!/usr/bin/env node\n')).toBe(true);
  });

  it('builds the core package first', () => {
    const build = readJson('cli', 'tsconfig.build.json');
    expect(build.references).toEqual([{ path: '../core/tsconfig.build.json' }]);
  });
});
