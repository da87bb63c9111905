import { mkdirSync } from 'node:fs';
import { defineConfig } from 'vitest/config';

// Ensure a stable, writable temp directory for vitest internals.
const resolvedTmpDir =
  process.env.TMPDIR && process.env.TMPDIR.trim().length > 0
    ? process.env.TMPDIR
    : '/tmp';
process.env.TMPDIR = resolvedTmpDir;
mkdirSync(resolvedTmpDir, { recursive: true });

/**
 * Vitest configuration.
 *
 * Every model capability is replaced by an in-process fake, so the suite
 * needs no network and no API keys.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'test/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000,
    hookTimeout: 10000,
    pool: 'forks',
  },
});
