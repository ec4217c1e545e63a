import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

function source(relativePath: string): string {
  return fileURLToPath(new URL(relativePath, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      '@sightcheck/core': source('./packages/core/src/index.ts'),
      '@sightcheck/runtime-mock': source('./packages/runtime-mock/src/index.ts'),
      '@sightcheck/runtime-ollama': source('./packages/runtime-ollama/src/index.ts'),
      '@sightcheck/capture-playwright': source('./packages/capture-playwright/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/__tests__/**', 'packages/*/src/**/index.ts'],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 70,
        statements: 80,
      },
    },
  },
});
