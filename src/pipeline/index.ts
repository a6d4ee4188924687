/**
 * Signal Digest — Pipeline Orchestrator
 *
 * Aggregate → Enrich → Classify → Store.
 *
 * Fetch, enrichment and classification failures are contained per source
 * or per item and only show up in the report. The store is handed the
 * complete record sequence in one call; its failure is the only error
 * this function throws.
 */

import type { ClassifiedRecord } from '../types';
import type { EnrichmentConfig } from '../config';
import type { FeedSource } from '../feeds/base';
import type { RecordStore } from '../db/record-store';
import type { StructuredClassifier } from '../classifier';
import { aggregateFeeds } from '../feeds/aggregator';
import { enrichBatch } from '../enrichment/enricher';
import { StoreError, errorMessage } from '../lib/errors';
import { logger, timeOperation } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

export interface PipelineDependencies {
  sources: readonly FeedSource[];
  enrichment: EnrichmentConfig;
  classifier: StructuredClassifier;
  store: RecordStore;
}

export interface PipelineOptions {
  /** Stops new outbound calls; items not yet started take their fallback */
  signal?: AbortSignal;
}

export interface DegradedCounts {
  /** Sources that failed and contributed nothing */
  sources: number;
  /** Items whose enrichment was attempted and missed */
  enrichment: number;
  classificationTransport: number;
  classificationSchema: number;
  /** Default records written without attempting a call */
  unclassified: number;
}

export interface PipelineReport {
  records: ClassifiedRecord[];
  produced: number;
  fetched: number;
  duplicatesDropped: number;
  enriched: number;
  failedSources: string[];
  degraded: DegradedCounts;
  durationMs: number;
  completedAt: string;
}

// ============================================================
// ORCHESTRATOR
// ============================================================

export async function runPipeline(
  deps: PipelineDependencies,
  options: PipelineOptions = {}
): Promise<PipelineReport> {
  const startTime = Date.now();
  const { signal } = options;

  logger.info('Pipeline starting', {
    sources: deps.sources.length,
    classifierConfigured: deps.classifier.isConfigured,
  });

  const aggregated = await timeOperation('Aggregation', () => aggregateFeeds(deps.sources, { signal }));
  const enrichment = await timeOperation('Enrichment', () =>
    enrichBatch(aggregated.items, deps.enrichment, signal)
  );
  const classification = await timeOperation('Classification', () =>
    deps.classifier.classifyBatch(enrichment.items, signal)
  );

  const records = classification.results.map(result => result.record);

  try {
    await deps.store.upsert(records);
  } catch (error) {
    logger.error('Record store failed', { records: records.length, error: errorMessage(error) });
    throw error instanceof StoreError
      ? error
      : new StoreError(`Record store failed: ${errorMessage(error)}`, undefined, { cause: error });
  }

  const { counts } = classification;
  const report: PipelineReport = {
    records,
    produced: records.length,
    fetched: aggregated.totalFetched,
    duplicatesDropped: aggregated.duplicatesDropped,
    enriched: enrichment.enriched,
    failedSources: aggregated.failedSources,
    degraded: {
      sources: aggregated.failedSources.length,
      enrichment: enrichment.missed,
      classificationTransport: counts.transport_failure,
      classificationSchema: counts.schema_failure,
      unclassified: counts.unconfigured + counts.skipped,
    },
    durationMs: Date.now() - startTime,
    completedAt: new Date().toISOString(),
  };

  logger.info('Pipeline completed', {
    produced: report.produced,
    fetched: report.fetched,
    duplicates: report.duplicatesDropped,
    enriched: report.enriched,
    degraded: report.degraded,
    durationMs: report.durationMs,
  });

  return report;
}
