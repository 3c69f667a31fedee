/**
 * Vitest Configuration
 *
 * Projects:
 * - core: @treelox/core package tests
 * - cli: @treelox/cli package tests
 *
 * Run one project:
 *   npx vitest --project=core
 */
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@treelox/core': fileURLToPath(
        new URL('./packages/core/src/index.ts', import.meta.url)
      ),
    },
  },
  test: {
    projects: [
      {
        extends: true,
        test: {
          name: 'core',
          environment: 'node',
          include: ['packages/core/tests/**/*.test.ts'],
        },
      },
      {
        extends: true,
        test: {
          name: 'cli',
          environment: 'node',
          include: ['packages/cli/tests/**/*.test.ts'],
        },
      },
    ],
  },
});
