import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts', 'apps/*/tests/**/*.test.ts'],
    setupFiles: ['packages/core/tests/setup.ts'],
  },
  resolve: {
    alias: {
      '@tasklane/core': path.resolve(rootDir, 'packages/core/src/index.ts'),
    },
  },
});
