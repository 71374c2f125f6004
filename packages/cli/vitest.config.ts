import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // workspace packages resolve to their TypeScript sources, not dist/
    conditions: ['source'],
  },
  test: {
    globals: true,
    pool: 'forks', // env stubs and console spies stay inside one process per file
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary', 'json'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: ['src/**/__tests__/**', 'src/**/*.test.ts', 'src/**/index.ts'],
      thresholds: {
        branches: 70,
        functions: 80,
        lines: 75,
        statements: 75,
      },
    },
  },
});
