/**
 * Signal Digest — Feed Aggregator
 *
 * 1. Run every source concurrently, each behind its own failure boundary
 * 2. Merge results in the order sources complete
 * 3. Deduplicate by identity (first seen wins)
 * 4. Sort by rank, then recency
 *
 * Never throws: when every source fails the result is simply empty.
 */

import type { IntermediateItem, SourceFetchResult } from '../types';
import type { FeedSource } from './base';
import { deduplicateByIdentity, sortByRankThenRecency } from './dedup';
import { errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

export interface AggregatorOptions {
  signal?: AbortSignal;
}

export interface AggregatorResult {
  /** Merged, deduplicated, sorted items */
  items: IntermediateItem[];
  /** Per-source breakdown, in completion order */
  sourceResults: SourceFetchResult[];
  failedSources: string[];
  totalFetched: number;
  duplicatesDropped: number;
  durationMs: number;
  completedAt: string;
}

// ============================================================
// MAIN AGGREGATOR
// ============================================================

export async function aggregateFeeds(
  sources: readonly FeedSource[],
  options: AggregatorOptions = {}
): Promise<AggregatorResult> {
  const startTime = Date.now();

  logger.info('Starting feed aggregation', { sources: sources.map(s => s.name) });

  const completed: SourceFetchResult[] = [];

  await Promise.all(
    sources.map(async source => {
      const result = await source.safeFetch(options.signal).catch(
        (error: unknown): SourceFetchResult => ({
          sourceName: source.name,
          fetchMethod: source.fetchMethod,
          items: [],
          durationMs: Date.now() - startTime,
          fetchedAt: new Date().toISOString(),
          error: errorMessage(error),
        })
      );
      completed.push(result);
    })
  );

  const merged = completed.flatMap(result => result.items);
  const { items: unique, duplicateCount } = deduplicateByIdentity(merged);
  const items = sortByRankThenRecency(unique);
  const failedSources = completed.filter(r => r.error !== undefined).map(r => r.sourceName);
  const durationMs = Date.now() - startTime;

  if (failedSources.length > 0) {
    logger.warn('Some sources failed', { failedSources });
  }

  logger.info('Feed aggregation completed', {
    fetched: merged.length,
    unique: items.length,
    duplicates: duplicateCount,
    failed: failedSources.length,
    durationMs,
  });

  return {
    items,
    sourceResults: completed,
    failedSources,
    totalFetched: merged.length,
    duplicatesDropped: duplicateCount,
    durationMs,
    completedAt: new Date().toISOString(),
  };
}
