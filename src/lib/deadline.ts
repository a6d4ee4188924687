/**
 * Signal Digest — Deadlines
 *
 * Every outbound call gets its own AbortSignal, aborted when the call's
 * timeout elapses or when the caller's signal fires. The returned promise
 * settles at the deadline even if the operation ignores its signal.
 */

import { CancelledError, TimeoutError } from './errors';

export async function withDeadline<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    throw new CancelledError();
  }

  const controller = new AbortController();
  let rejectInterrupted: (error: Error) => void = () => undefined;
  const interrupted = new Promise<never>((_, reject) => {
    rejectInterrupted = reject;
  });

  const interrupt = (error: Error) => {
    controller.abort(error);
    rejectInterrupted(error);
  };

  const timer = setTimeout(() => interrupt(new TimeoutError(timeoutMs)), timeoutMs);
  const onParentAbort = () => interrupt(new CancelledError());
  parent?.addEventListener('abort', onParentAbort, { once: true });

  try {
    return await Promise.race([operation(controller.signal), interrupted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
