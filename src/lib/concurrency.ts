/**
 * Signal Digest — Bounded Concurrency
 *
 * Parallel map behind a counting gate (p-limit). Output order matches
 * input order. A task that throws, or that is reached after the signal
 * fired, resolves through `recover` instead, so one item never rejects
 * the batch.
 */

import pLimit from 'p-limit';

export type RecoveryReason =
  | { kind: 'cancelled' }
  | { kind: 'error'; error: unknown };

export interface BoundedMapOptions<T, R> {
  /** Maximum tasks in flight at once */
  concurrency: number;
  signal?: AbortSignal;
  recover: (item: T, index: number, reason: RecoveryReason) => R;
}

export async function boundedMap<T, R>(
  items: readonly T[],
  task: (item: T, index: number) => Promise<R>,
  options: BoundedMapOptions<T, R>
): Promise<R[]> {
  const limit = pLimit(options.concurrency);

  return Promise.all(
    items.map((item, index) =>
      limit(async (): Promise<R> => {
        if (options.signal?.aborted) {
          return options.recover(item, index, { kind: 'cancelled' });
        }
        try {
          return await task(item, index);
        } catch (error) {
          return options.recover(item, index, { kind: 'error', error });
        }
      })
    )
  );
}
