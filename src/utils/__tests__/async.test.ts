import { describe, it, expect, vi, afterEach } from 'vitest';
import { PipelineCancelledError, StageTimeoutError } from '../../core/errors.js';
import { throwIfAborted, withDeadline } from '../async.js';

afterEach(() => {
  vi.useRealTimers();
});

describe('throwIfAborted', () => {
  it('throws only for an aborted signal', () => {
    const controller = new AbortController();
    expect(() => throwIfAborted(controller.signal, 'retrieval')).not.toThrow();
    controller.abort();
    expect(() => throwIfAborted(controller.signal, 'retrieval')).toThrow('Query cancelled during retrieval');
    expect(() => throwIfAborted(undefined)).not.toThrow();
  });
});

describe('withDeadline', () => {
  it('resolves with the work result inside the deadline', async () => {
    await expect(withDeadline(async () => 42, { stage: 'reranking', timeoutMs: 1000 })).resolves.toBe(42);
  });

  it('rejects with StageTimeoutError and aborts the stage signal', async () => {
    vi.useFakeTimers();
    let stageSignal: AbortSignal | undefined;
    const pending = withDeadline(
      (signal) => {
        stageSignal = signal;
        return new Promise<never>(() => {});
      },
      { stage: 'generation', timeoutMs: 50 },
    );
    const assertion = expect(pending).rejects.toBeInstanceOf(StageTimeoutError);
    await vi.advanceTimersByTimeAsync(50);
    await assertion;
    expect(stageSignal?.aborted).toBe(true);
  });

  it('rejects with PipelineCancelledError when the caller aborts', async () => {
    const controller = new AbortController();
    const pending = withDeadline(() => new Promise<never>(() => {}), {
      stage: 'validation',
      signal: controller.signal,
    });
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(PipelineCancelledError);
  });

  it('does not start work when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const work = vi.fn(async () => 'never');
    await expect(withDeadline(work, { stage: 'retrieval', signal: controller.signal })).rejects.toThrow(
      'Query cancelled during retrieval',
    );
    expect(work).not.toHaveBeenCalled();
  });

  it('propagates errors from the work itself', async () => {
    await expect(
      withDeadline(async () => {
        throw new Error('model offline');
      }, { stage: 'generation', timeoutMs: 1000 }),
    ).rejects.toThrow('model offline');
  });
});
