import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const resolveSource = (relativePath: string): string =>
  fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.{test,spec}.ts', 'apps/*/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.d.ts',
        '**/__tests__/**',
        '**/*.test.ts',
        '**/vitest.config.ts',
        '**/index.ts',
      ],
    },
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      // Resolve workspace packages to their source files for testing
      '@schoolreg/types': resolveSource('./packages/types/src/index.ts'),
      '@schoolreg/core': resolveSource('./packages/core/src/index.ts'),
      '@schoolreg/domain': resolveSource('./packages/domain/src/index.ts'),
      '@schoolreg/infrastructure': resolveSource('./packages/infrastructure/src/index.ts'),
    },
  },
});
