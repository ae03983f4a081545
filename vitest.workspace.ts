import { defineWorkspace } from 'vitest/config';

/**
 * Vitest workspace configuration for the gradekit monorepo.
 * This enables running tests across all packages with a single command.
 */
export default defineWorkspace([
  // Analysis engine
  {
    extends: './vitest.config.ts',
    test: {
      name: 'gradekit-core',
      root: './packages/core',
      include: ['src/**/*.{test,spec}.ts'],
    },
  },

  // Grading, jobs and notifications
  {
    extends: './vitest.config.ts',
    test: {
      name: 'gradekit-grader',
      root: './packages/grader',
      include: ['src/**/*.{test,spec}.ts'],
    },
  },

  // CLI package
  {
    extends: './vitest.config.ts',
    test: {
      name: 'gradekit-cli',
      root: './packages/cli',
      include: ['src/**/*.{test,spec}.ts'],
    },
  },
]);
