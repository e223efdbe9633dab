import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const core = (p: string) => fileURLToPath(new URL(`./packages/core/src/${p}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@plagiscope/core/services': core('services/index.ts'),
      '@plagiscope/core/similarity': core('similarity/shared.ts'),
      '@plagiscope/core/tokenizer': core('tokenizer/shared.ts'),
      '@plagiscope/core': core('index.ts'),
    },
  },
  test: {
    testTimeout: 30000,
    include: ['packages/*/src/test/**/*.test.ts'],
  },
});
