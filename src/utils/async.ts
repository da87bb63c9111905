/**
 * @fileoverview Async Utilities
 *
 * Deadlines and cancellation for model calls. Each stage gets its own
 * AbortSignal that fires when the stage times out or the caller cancels, so
 * adapters can abandon in-flight requests.
 *
 * @packageDocumentation
 */

import { PipelineCancelledError, StageTimeoutError } from '../core/errors.js';

/**
 * Options for withDeadline.
 */
export interface DeadlineOptions {
  /** Stage name used in timeout and cancellation errors */
  stage: string;
  /** Timeout in milliseconds (if <= 0 or undefined, no deadline applies) */
  timeoutMs?: number;
  /** Caller-side cancellation */
  signal?: AbortSignal;
}

/**
 * Throw PipelineCancelledError when the signal has already fired.
 */
export function throwIfAborted(signal: AbortSignal | undefined, stage?: string): void {
  if (signal?.aborted) {
    throw new PipelineCancelledError(stage);
  }
}

/**
 * Run `work` with a stage-scoped AbortSignal and a deadline.
 *
 * @returns The result of `work` if it settles before the deadline
 * @throws StageTimeoutError when the deadline passes first
 * @throws PipelineCancelledError when the caller's signal fires first
 *
 * @example
 * ```typescript
 * const entities = await withDeadline(
 *   (signal) => extractor.extract(query, signal),
 *   { stage: 'entity_extraction', timeoutMs: 5000, signal: callerSignal },
 * );
 * ```
 */
export async function withDeadline<T>(
  work: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions
): Promise<T> {
  const { stage, timeoutMs, signal } = options;
  throwIfAborted(signal, stage);

  const controller = new AbortController();
  const cleanups: Array<() => void> = [];
  const guards: Promise<never>[] = [];

  if (signal) {
    guards.push(
      new Promise<never>((_, reject) => {
        const onAbort = (): void => {
          controller.abort();
          reject(new PipelineCancelledError(stage));
        };
        signal.addEventListener('abort', onAbort, { once: true });
        cleanups.push(() => signal.removeEventListener('abort', onAbort));
      })
    );
  }

  if (timeoutMs && Number.isFinite(timeoutMs) && timeoutMs > 0) {
    guards.push(
      new Promise<never>((_, reject) => {
        const timeoutId = setTimeout(() => {
          controller.abort();
          reject(new StageTimeoutError(stage, timeoutMs));
        }, timeoutMs);
        cleanups.push(() => clearTimeout(timeoutId));
      })
    );
  }

  try {
    if (guards.length === 0) {
      return await work(controller.signal);
    }
    return await Promise.race([work(controller.signal), ...guards]);
  } finally {
    for (const cleanup of cleanups) {
      cleanup();
    }
  }
}

/**
 * Wait for `promise` unless the caller's signal fires first.
 *
 * @throws PipelineCancelledError when the signal fires before `promise` settles
 */
export function waitUnlessAborted<T>(promise: Promise<T>, signal: AbortSignal | undefined, stage?: string): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(new PipelineCancelledError(stage));
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new PipelineCancelledError(stage));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
