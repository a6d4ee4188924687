/**
 * Tests for the pipeline orchestrator
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { runPipeline, type PipelineDependencies } from '../src/pipeline';
import { StructuredClassifier, type TextGenerator } from '../src/classifier';
import { defaultRecord } from '../src/classifier/record';
import { MemoryRecordStore } from '../src/db/memory-store';
import type { RecordStore } from '../src/db/record-store';
import { StoreError } from '../src/lib/errors';
import { createClassifierConfig, createEnrichmentConfig, createMockItem, StubSource } from './fixtures';

const mockFetch = vi.fn<typeof fetch>();
global.fetch = mockFetch;

const RESPONSE = JSON.stringify({
  summary: 'Worth a look.',
  category: 'AI Model',
  tags: ['models'],
  relevance_score: 7,
  is_product_or_tool: false,
  product_name: '',
  competitors: [],
  competitive_advantage: '',
});

function richItem(id: string, rankScore: number) {
  return createMockItem({
    locator: `https://a.test/${id}`,
    title: `Item ${id}`,
    bodyText: 'b'.repeat(100),
    rankScore,
  });
}

function dependencies(overrides: Partial<PipelineDependencies> = {}): PipelineDependencies {
  return {
    sources: [
      new StubSource('A', { items: [richItem('x', 1), richItem('y', 2)] }),
      new StubSource('B', { items: [richItem('y', 2), richItem('z', 3)] }),
    ],
    enrichment: createEnrichmentConfig(),
    classifier: new StructuredClassifier(createClassifierConfig({ apiKey: undefined })),
    store: new MemoryRecordStore(),
    ...overrides,
  };
}

describe('runPipeline', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('should store one default record per unique item without a credential', async () => {
    const store = new MemoryRecordStore();

    const report = await runPipeline(dependencies({ store }));

    expect(report.records.map(r => r.title)).toEqual(['Item z', 'Item y', 'Item x']);
    expect(report.produced).toBe(3);
    expect(report.fetched).toBe(4);
    expect(report.duplicatesDropped).toBe(1);
    expect(report.degraded).toEqual({
      sources: 0,
      enrichment: 0,
      classificationTransport: 0,
      classificationSchema: 0,
      unclassified: 3,
    });
    expect(report.records.every(r => r.category === 'Industry News' && r.relevanceScore === 5)).toBe(true);
    expect(store.size).toBe(3);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should classify, enrich sparse items and report degradation', async () => {
    const sparse = createMockItem({ locator: 'https://a.test/sparse', title: 'Sparse', rankScore: 10 });
    mockFetch.mockResolvedValue(new Response('gone', { status: 404 }));
    const generate = vi.fn<TextGenerator['generate']>(async () => RESPONSE);

    const report = await runPipeline(
      dependencies({
        sources: [
          new StubSource('A', { items: [sparse, richItem('x', 1)] }),
          new StubSource('Broken', { error: new Error('HTTP 500') }),
        ],
        classifier: new StructuredClassifier(createClassifierConfig(), { generate }),
      })
    );

    expect(report.records.map(r => r.title)).toEqual(['Sparse', 'Item x']);
    expect(report.records.every(r => r.category === 'AI Model' && r.relevanceScore === 7)).toBe(true);
    expect(report.records[0]?.tags).toEqual(['test', 'models']);
    expect(report.failedSources).toEqual(['Broken']);
    expect(report.enriched).toBe(0);
    expect(report.degraded).toEqual({
      sources: 1,
      enrichment: 1,
      classificationTransport: 0,
      classificationSchema: 0,
      unclassified: 0,
    });
    expect(generate).toHaveBeenCalledTimes(2);
  });

  it('should produce an empty batch when every source fails', async () => {
    const store = new MemoryRecordStore();

    const report = await runPipeline(
      dependencies({
        sources: [new StubSource('A', { error: new Error('down') })],
        store,
      })
    );

    expect(report.records).toEqual([]);
    expect(report.failedSources).toEqual(['A']);
    expect(store.size).toBe(0);
  });

  it('should raise StoreError when the store fails, after a single upsert', async () => {
    const upsert = vi.fn<RecordStore['upsert']>(async () => {
      throw new Error('connection refused');
    });
    const store: RecordStore = { upsert, queryTop: async () => [] };

    await expect(runPipeline(dependencies({ store }))).rejects.toThrow(StoreError);
    expect(upsert).toHaveBeenCalledTimes(1);
    expect(upsert.mock.calls[0]?.[0]).toHaveLength(3);
  });

  it('should pass a StoreError through unchanged', async () => {
    const error = new StoreError('Supabase upsert failed: timeout', '57014');
    const store: RecordStore = {
      upsert: async () => {
        throw error;
      },
      queryTop: async () => [],
    };

    await expect(runPipeline(dependencies({ store }))).rejects.toBe(error);
  });

  it('should fall back to default records for items reached after cancellation', async () => {
    const controller = new AbortController();
    const sparse = createMockItem({ locator: 'https://a.test/sparse' });
    const generate = vi.fn<TextGenerator['generate']>(async () => RESPONSE);
    mockFetch.mockImplementation(async () => {
      controller.abort();
      return new Response('late', { status: 200 });
    });

    const report = await runPipeline(
      dependencies({
        sources: [new StubSource('A', { items: [sparse] })],
        classifier: new StructuredClassifier(createClassifierConfig(), { generate }),
      }),
      { signal: controller.signal }
    );

    expect(generate).not.toHaveBeenCalled();
    expect(report.records).toEqual([defaultRecord(sparse)]);
    expect(report.degraded.enrichment).toBe(1);
    expect(report.degraded.unclassified).toBe(1);
  });
});
