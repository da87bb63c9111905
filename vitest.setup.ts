/**
 * Centralized Vitest setup.
 *
 * Pipeline stages log degraded paths (fallbacks, suppressed answers) on
 * stderr. Unit tests exercise those paths on purpose, so logging is silenced
 * unless LEGAL_RAG_LOG_LEVEL is set explicitly.
 */

import { beforeAll } from 'vitest';

process.env.LEGAL_RAG_LOG_LEVEL ??= 'silent';

beforeAll(() => {
  if (process.env.VITEST_QUIET !== 'true' && process.env.LEGAL_RAG_LOG_LEVEL !== 'silent') {
    console.error(`[vitest.setup] Log level: ${process.env.LEGAL_RAG_LOG_LEVEL}`);
  }
});
