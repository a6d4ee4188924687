/**
 * Tests for the feed aggregator
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { aggregateFeeds } from '../../src/feeds/aggregator';
import { createMockItem, StubSource } from '../fixtures';

describe('aggregateFeeds', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should merge sources and drop duplicate identities', async () => {
    const x = createMockItem({ locator: 'https://a.test/x', rankScore: 1 });
    const y = createMockItem({ locator: 'https://a.test/y', rankScore: 2 });
    const yAgain = createMockItem({ locator: 'https://a.test/y', rankScore: 2, sourceName: 'Other' });
    const z = createMockItem({ locator: 'https://a.test/z', rankScore: 3 });

    const result = await aggregateFeeds([
      new StubSource('A', { items: [x, y] }),
      new StubSource('B', { items: [yAgain, z] }),
    ]);

    expect(result.items.map(i => i.locator)).toEqual(['https://a.test/z', 'https://a.test/y', 'https://a.test/x']);
    expect(result.totalFetched).toBe(4);
    expect(result.duplicatesDropped).toBe(1);
    expect(result.failedSources).toEqual([]);
  });

  it('should keep the copy from the source that completed first', async () => {
    const slow = createMockItem({ locator: 'https://a.test/shared', sourceName: 'Slow' });
    const fast = createMockItem({ locator: 'https://a.test/shared', sourceName: 'Fast' });

    const result = await aggregateFeeds([
      new StubSource('Slow', { items: [slow], delayMs: 30 }),
      new StubSource('Fast', { items: [fast] }),
    ]);

    expect(result.items).toHaveLength(1);
    expect(result.items[0]?.sourceName).toBe('Fast');
    expect(result.sourceResults.map(r => r.sourceName)).toEqual(['Fast', 'Slow']);
  });

  it('should isolate a failing source', async () => {
    const item = createMockItem({ locator: 'https://a.test/ok' });

    const result = await aggregateFeeds([
      new StubSource('Broken', { error: new Error('HTTP 503') }),
      new StubSource('Healthy', { items: [item] }),
    ]);

    expect(result.items).toEqual([item]);
    expect(result.failedSources).toEqual(['Broken']);
    const broken = result.sourceResults.find(r => r.sourceName === 'Broken');
    expect(broken?.error).toBe('HTTP 503');
    expect(broken?.items).toEqual([]);
  });

  it('should return an empty result when every source fails', async () => {
    const result = await aggregateFeeds([
      new StubSource('One', { error: new Error('down') }),
      new StubSource('Two', { error: new Error('down') }),
    ]);

    expect(result.items).toEqual([]);
    expect(result.totalFetched).toBe(0);
    expect(result.failedSources.sort()).toEqual(['One', 'Two']);
  });

  it('should order by rank with recency breaking ties', async () => {
    const result = await aggregateFeeds([
      new StubSource('A', {
        items: [
          createMockItem({ locator: 'https://a.test/3', rankScore: 3 }),
          createMockItem({ locator: 'https://a.test/7-old', rankScore: 7, publishedAt: '2026-01-01T00:00:00.000Z' }),
        ],
      }),
      new StubSource('B', {
        items: [
          createMockItem({ locator: 'https://a.test/10', rankScore: 10 }),
          createMockItem({ locator: 'https://a.test/7-new', rankScore: 7, publishedAt: '2026-01-02T00:00:00.000Z' }),
        ],
      }),
    ]);

    expect(result.items.map(i => i.rankScore)).toEqual([10, 7, 7, 3]);
    expect(result.items[1]?.locator).toBe('https://a.test/7-new');
  });

  it('should not start sources once the signal has fired', async () => {
    const controller = new AbortController();
    controller.abort();
    const source = new StubSource('A', { items: [createMockItem()] });

    const result = await aggregateFeeds([source], { signal: controller.signal });

    expect(source.calls).toBe(0);
    expect(result.items).toEqual([]);
    expect(result.failedSources).toEqual(['A']);
  });

  it('should report how each source fetches', async () => {
    const result = await aggregateFeeds([
      new StubSource('Healthy', { items: [createMockItem()] }),
      new StubSource('Broken', { error: new Error('down') }),
    ]);

    expect(result.sourceResults.map(r => [r.sourceName, r.fetchMethod]).sort()).toEqual([
      ['Broken', 'api'],
      ['Healthy', 'api'],
    ]);
  });

  it('should fail a hanging source at its timeout', async () => {
    vi.useFakeTimers();
    const hanging = new StubSource('Hanging', { items: [createMockItem()], delayMs: 5_000 });

    const pending = aggregateFeeds([hanging]);
    await vi.advanceTimersByTimeAsync(1_000);
    const result = await pending;

    expect(result.items).toEqual([]);
    expect(result.failedSources).toEqual(['Hanging']);
    expect(result.sourceResults[0]?.error).toBe('Timeout after 1000ms');
    expect(result.sourceResults[0]?.durationMs).toBe(1_000);
  });
});
