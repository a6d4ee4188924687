/**
 * Signal Digest — Content Enricher
 *
 * Most aggregator items are a title and a URL. For those, fetch the page
 * once and lift its meta description into `bodyText` so the classifier
 * has something to read. Best effort only: every failure leaves the item
 * as it was.
 */

import * as cheerio from 'cheerio';
import type { IntermediateItem } from '../types';
import type { EnrichmentConfig } from '../config';
import { fetchPage } from '../lib/http';
import { attempt, withDefault } from '../lib/outcome';
import { boundedMap } from '../lib/concurrency';
import { errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

export type EnrichmentStatus = 'skipped' | 'enriched' | 'missed';

export interface EnrichmentResult {
  item: IntermediateItem;
  status: EnrichmentStatus;
  reason?: string;
}

export interface EnrichmentBatchResult {
  /** Same order as the input */
  items: IntermediateItem[];
  enriched: number;
  skipped: number;
  missed: number;
}

const log = logger.child({ component: 'enricher' });

// Attribute order inside the tag does not matter to the selector engine
const DESCRIPTION_SELECTORS = [
  'meta[property="og:description" i]',
  'meta[name="description" i]',
  'meta[name="og:description" i]',
  'meta[name="twitter:description" i]',
];

// ============================================================
// HELPERS
// ============================================================

/**
 * Whether an item is sparse enough, and its page worth fetching.
 */
export function needsEnrichment(item: IntermediateItem, config: EnrichmentConfig): boolean {
  if (item.bodyText.length > config.minBodyLength) return false;

  try {
    const url = new URL(item.locator);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') return false;
    return !config.discussionHosts.includes(url.hostname.toLowerCase());
  } catch {
    return false;
  }
}

/**
 * First non-empty description from the page metadata.
 */
export function extractDescription(html: string): string | null {
  const $ = cheerio.load(html);

  for (const selector of DESCRIPTION_SELECTORS) {
    const content = $(selector).first().attr('content');
    const description = content?.replace(/\s+/g, ' ').trim();
    if (description) return description;
  }

  return null;
}

// ============================================================
// ENRICHMENT
// ============================================================

export async function enrichItem(
  item: IntermediateItem,
  config: EnrichmentConfig,
  signal?: AbortSignal
): Promise<EnrichmentResult> {
  if (!needsEnrichment(item, config)) {
    return { item, status: 'skipped' };
  }

  const outcome = await attempt(async (): Promise<EnrichmentResult> => {
    const page = await fetchPage(item.locator, {
      timeoutMs: config.timeoutMs,
      userAgent: config.userAgent,
      signal,
      headers: { Accept: 'text/html,application/xhtml+xml' },
    });

    if (!page.contentType.toLowerCase().includes('html')) {
      throw new Error(`Not HTML: ${page.contentType || 'unknown'}`);
    }

    const description = extractDescription(page.body)?.slice(0, config.maxDescriptionLength);
    if (!description || description.length <= config.minDescriptionLength) {
      throw new Error('No usable description');
    }

    return { item: { ...item, bodyText: description }, status: 'enriched' };
  });

  return withDefault(outcome, (reason): EnrichmentResult => ({ item, status: 'missed', reason }));
}

/**
 * Enrich a batch behind the enrichment gate. Output order matches input.
 */
export async function enrichBatch(
  items: readonly IntermediateItem[],
  config: EnrichmentConfig,
  signal?: AbortSignal
): Promise<EnrichmentBatchResult> {
  const results = await boundedMap(items, item => enrichItem(item, config, signal), {
    concurrency: config.concurrency,
    signal,
    recover: (item, _index, reason): EnrichmentResult =>
      reason.kind === 'cancelled'
        ? { item, status: 'skipped', reason: 'cancelled' }
        : { item, status: 'missed', reason: errorMessage(reason.error) },
  });

  const counts = { enriched: 0, skipped: 0, missed: 0 };
  for (const result of results) {
    counts[result.status]++;
    if (result.status === 'missed') {
      log.debug('Enrichment missed', { identity: result.item.identity, reason: result.reason });
    }
  }

  log.info('Enrichment completed', { total: items.length, ...counts });

  return { items: results.map(r => r.item), ...counts };
}
