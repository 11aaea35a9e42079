import { defineConfig } from 'vitest/config';

/**
 * Vitest Configuration for spm-bootstrap
 *
 * Every test runs in process: external tools are replaced by a recording
 * invoker or a mocked execa, and filesystem tests use throwaway temp dirs.
 */
export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    pool: 'forks',
    testTimeout: 30000,
    hookTimeout: 10000,
  },
});
