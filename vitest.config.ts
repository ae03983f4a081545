import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (pkg: string): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

/**
 * Shared Vitest settings, extended by every entry in vitest.workspace.ts.
 *
 * Workspace packages resolve to their TypeScript sources so the suite
 * runs without a build.
 */
export default defineConfig({
  resolve: {
    alias: {
      'gradekit-core': source('core'),
      'gradekit-grader': source('grader'),
    },
  },
  test: {
    environment: 'node',
    testTimeout: 15000,
    restoreMocks: true,
  },
});
