import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      // Workspace packages resolve to their TypeScript sources
      {
        find: /^@nullmodem\/(utils|config)\/(.+)$/,
        replacement: path.resolve(root, './packages/$1/src/$2.ts'),
      },
      {
        find: /^@nullmodem\/(utils|config|serial)$/,
        replacement: path.resolve(root, './packages/$1/src/index.ts'),
      },
    ],
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts', 'packages/**/src/**/*.test.ts'],
    testTimeout: 15_000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts', 'packages/**/src/**/*.ts'],
      exclude: ['**/*.test.ts', '**/__fixtures__/**', 'src/cli/index.ts'],
    },
  },
});
