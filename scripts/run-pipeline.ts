/**
 * Signal Digest — Run Pipeline Script
 *
 * Fetches every source, enriches, classifies and stores one batch.
 *
 * Usage:
 *   npm run pipeline                 # Upsert into Supabase
 *   npm run pipeline -- --dry-run    # Keep records in memory and print them
 */

import 'dotenv/config';
import { loadConfig } from '../src/config';
import { createDefaultSources } from '../src/feeds/sources';
import { StructuredClassifier } from '../src/classifier';
import { runPipeline } from '../src/pipeline';
import { MemoryRecordStore } from '../src/db/memory-store';
import { SupabaseRecordStore, type RecordStore } from '../src/db/record-store';
import { checkDatabaseHealth, createAdminClient } from '../src/db/client';
import { StoreError, errorMessage } from '../src/lib/errors';
import { logger } from '../src/lib/logger';

interface ScriptOptions {
  dryRun: boolean;
}

function parseArgs(): ScriptOptions {
  return { dryRun: process.argv.slice(2).includes('--dry-run') };
}

async function main(): Promise<void> {
  const options = parseArgs();
  const config = loadConfig();

  let store: RecordStore;
  if (options.dryRun) {
    store = new MemoryRecordStore();
  } else {
    const client = createAdminClient(config.store);
    const health = await checkDatabaseHealth(client, config.store.table);
    if (!health.healthy) {
      throw new StoreError(`Record store unreachable: ${health.error ?? 'unknown error'}`);
    }
    store = new SupabaseRecordStore(client, config.store.table);
  }

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupted, finishing in-flight work');
    controller.abort();
  });

  const report = await runPipeline(
    {
      sources: createDefaultSources(config.sources),
      enrichment: config.enrichment,
      classifier: new StructuredClassifier(config.classifier),
      store,
    },
    { signal: controller.signal }
  );

  console.log('\n' + '='.repeat(60));
  console.log(options.dryRun ? 'PIPELINE COMPLETE (dry run)' : 'PIPELINE COMPLETE');
  console.log('='.repeat(60));
  console.log(`Duration: ${(report.durationMs / 1000).toFixed(2)}s`);
  console.log(`Fetched: ${report.fetched} (${report.duplicatesDropped} duplicates dropped)`);
  console.log(`Enriched: ${report.enriched}`);
  console.log(`Records: ${report.produced}`);
  if (report.failedSources.length > 0) {
    console.log(`Failed sources: ${report.failedSources.join(', ')}`);
  }
  console.log(
    `Degraded: enrichment ${report.degraded.enrichment}, transport ${report.degraded.classificationTransport}, ` +
      `schema ${report.degraded.classificationSchema}, unclassified ${report.degraded.unclassified}`
  );
  console.log('='.repeat(60) + '\n');

  if (options.dryRun) {
    for (const record of report.records) {
      console.log(`[${record.relevanceScore}/10] ${record.category} | ${record.title}`);
    }
  }
}

main().catch((error: unknown) => {
  logger.error('Pipeline failed', { error: errorMessage(error) });
  console.error('\nPipeline failed:', errorMessage(error));
  process.exitCode = error instanceof StoreError ? 2 : 1;
});
