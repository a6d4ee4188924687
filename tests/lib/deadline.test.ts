/**
 * Tests for per-call deadlines
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { withDeadline } from '../../src/lib/deadline';
import { CancelledError, TimeoutError } from '../../src/lib/errors';

describe('withDeadline', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve with the operation result before the deadline', async () => {
    await expect(withDeadline(async () => 'done', 1000)).resolves.toBe('done');
  });

  it('should reject with TimeoutError when the operation outlives the deadline', async () => {
    vi.useFakeTimers();
    let observed: AbortSignal | undefined;

    const pending = withDeadline(signal => {
      observed = signal;
      return new Promise<string>(() => undefined);
    }, 50);
    const assertion = expect(pending).rejects.toBeInstanceOf(TimeoutError);

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
    expect(observed?.aborted).toBe(true);
  });

  it('should reject with CancelledError when the parent signal fires', async () => {
    const parent = new AbortController();
    const pending = withDeadline(() => new Promise<string>(() => undefined), 10_000, parent.signal);

    parent.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });

  it('should not start the operation when the parent is already aborted', async () => {
    const parent = new AbortController();
    parent.abort();
    const operation = vi.fn(async () => 'never');

    await expect(withDeadline(operation, 1000, parent.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(operation).not.toHaveBeenCalled();
  });

  it('should propagate the operation error unchanged', async () => {
    const error = new Error('upstream');
    await expect(
      withDeadline(async () => {
        throw error;
      }, 1000)
    ).rejects.toBe(error);
  });
});
