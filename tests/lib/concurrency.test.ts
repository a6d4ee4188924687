/**
 * Tests for bounded parallel map
 */

import { describe, it, expect } from 'vitest';
import { boundedMap, type RecoveryReason } from '../../src/lib/concurrency';

const tick = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

describe('boundedMap', () => {
  it('should preserve input order regardless of completion order', async () => {
    const delays = [30, 5, 15, 0];
    const results = await boundedMap(
      delays,
      async (delay, index) => {
        await tick(delay);
        return index;
      },
      { concurrency: 4, recover: () => -1 }
    );

    expect(results).toEqual([0, 1, 2, 3]);
  });

  it('should never exceed the concurrency limit', async () => {
    let inFlight = 0;
    let maxInFlight = 0;

    await boundedMap(
      Array.from({ length: 20 }, (_, i) => i),
      async item => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await tick(2);
        inFlight--;
        return item;
      },
      { concurrency: 3, recover: () => -1 }
    );

    expect(maxInFlight).toBeLessThanOrEqual(3);
    expect(maxInFlight).toBeGreaterThan(0);
  });

  it('should recover a failing task without rejecting the batch', async () => {
    const reasons: RecoveryReason[] = [];

    const results = await boundedMap(
      ['a', 'b', 'c'],
      async item => {
        if (item === 'b') throw new Error('bad item');
        return item.toUpperCase();
      },
      {
        concurrency: 2,
        recover: (item, _index, reason) => {
          reasons.push(reason);
          return `recovered-${item}`;
        },
      }
    );

    expect(results).toEqual(['A', 'recovered-b', 'C']);
    expect(reasons).toHaveLength(1);
    expect(reasons[0]?.kind).toBe('error');
  });

  it('should recover items not yet started once the signal fires', async () => {
    const controller = new AbortController();
    controller.abort();
    let calls = 0;

    const results = await boundedMap(
      [1, 2, 3],
      async item => {
        calls++;
        return item;
      },
      {
        concurrency: 1,
        signal: controller.signal,
        recover: (_item, _index, reason) => (reason.kind === 'cancelled' ? 0 : -1),
      }
    );

    expect(results).toEqual([0, 0, 0]);
    expect(calls).toBe(0);
  });
});
