import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const rootDir = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@config': path.resolve(rootDir, 'src/config'),
      '@domain': path.resolve(rootDir, 'src/domain'),
      '@engine': path.resolve(rootDir, 'src/engine'),
      '@utils': path.resolve(rootDir, 'src/utils'),
    },
  },
  test: {
    environment: 'node',
    include: ['tests/**/*.spec.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      reportsDirectory: 'coverage',
      all: true,
      thresholds: {
        lines: 80,
        statements: 80,
        functions: 80,
        branches: 80,
      },
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts'],
    },
  },
});
