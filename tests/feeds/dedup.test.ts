/**
 * Tests for deduplication and ordering
 */

import { describe, it, expect } from 'vitest';
import { deduplicateByIdentity, sortByRankThenRecency } from '../../src/feeds/dedup';
import { createMockItem } from '../fixtures';

describe('deduplicateByIdentity', () => {
  it('should keep the first item seen for each identity', () => {
    const first = createMockItem({ locator: 'https://a.test/x', sourceName: 'One' });
    const second = createMockItem({ locator: 'https://a.test/x', sourceName: 'Two' });
    const other = createMockItem({ locator: 'https://a.test/y' });

    const result = deduplicateByIdentity([first, second, other]);

    expect(result.items).toEqual([first, other]);
    expect(result.duplicateCount).toBe(1);
  });

  it('should not merge items that only share a title', () => {
    const a = createMockItem({ locator: 'https://a.test/1', title: 'Same' });
    const b = createMockItem({ locator: 'https://a.test/2', title: 'Same' });

    expect(deduplicateByIdentity([a, b]).items).toHaveLength(2);
  });
});

describe('sortByRankThenRecency', () => {
  it('should order by rank descending, then newest first', () => {
    const items = [
      createMockItem({ locator: 'https://a.test/low', rankScore: 3 }),
      createMockItem({ locator: 'https://a.test/old', rankScore: 7, publishedAt: '2026-01-01T00:00:00.000Z' }),
      createMockItem({ locator: 'https://a.test/top', rankScore: 10 }),
      createMockItem({ locator: 'https://a.test/new', rankScore: 7, publishedAt: '2026-01-05T00:00:00.000Z' }),
    ];

    const sorted = sortByRankThenRecency(items);

    expect(sorted.map(i => i.locator)).toEqual([
      'https://a.test/top',
      'https://a.test/new',
      'https://a.test/old',
      'https://a.test/low',
    ]);
  });

  it('should not mutate its input', () => {
    const items = [createMockItem({ rankScore: 1 }), createMockItem({ locator: 'https://a.test/2', rankScore: 2 })];
    sortByRankThenRecency(items);
    expect(items[0]?.rankScore).toBe(1);
  });
});
