/**
 * Signal Digest — Item Types v1.0
 *
 * Items move through the pipeline in two shapes:
 * IntermediateItem (sources → enricher → classifier) and
 * ClassifiedRecord (classifier → store → delivery).
 */

import type { Category, Competitor } from './classification';

// ============================================================
// INTERMEDIATE ITEM
// ============================================================

/**
 * Normalized, pre-classification item from any source.
 */
export interface IntermediateItem {
  /** Stable short token derived from `locator` */
  identity: string;
  title: string;
  /** Canonical URL of the item */
  locator: string;
  sourceName: string;
  /** ISO 8601; ingestion time when the provider date is unusable */
  publishedAt: string;
  /** Possibly empty; filled at most once by the enricher */
  bodyText: string;
  author: string;
  tags: string[];
  /** Provider signal such as upvotes, 0 when unavailable */
  rankScore: number;
}

// ============================================================
// CLASSIFIED RECORD
// ============================================================

/**
 * AI-annotated output of the pipeline.
 * Every field is always present; failed classifications carry defaults.
 */
export interface ClassifiedRecord extends Readonly<IntermediateItem> {
  readonly summary: string;
  readonly category: Category;
  /** Integer 1-10 */
  readonly relevanceScore: number;
  readonly isProductOrTool: boolean;
  readonly productName: string;
  readonly competitors: readonly Competitor[];
  readonly competitiveAdvantage: string;
}

// ============================================================
// SOURCE FETCH RESULTS
// ============================================================

export type FetchMethod = 'api' | 'atom' | 'rss_proxy';

/**
 * Outcome of one source adapter run.
 */
export interface SourceFetchResult {
  sourceName: string;
  fetchMethod: FetchMethod;
  items: IntermediateItem[];
  durationMs: number;
  fetchedAt: string;
  error?: string;
}
