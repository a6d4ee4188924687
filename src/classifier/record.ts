/**
 * Signal Digest — Record Builders
 */

import type { ClassificationResponse, ClassifiedRecord, IntermediateItem } from '../types';
import { DEFAULT_CATEGORY, DEFAULT_RELEVANCE_SCORE } from '../types';

const FALLBACK_SUMMARY_LENGTH = 300;

export function fallbackSummary(item: IntermediateItem): string {
  const body = item.bodyText.trim();
  if (body) return body.slice(0, FALLBACK_SUMMARY_LENGTH);
  return `From ${item.sourceName}. Open the link to read the full article.`;
}

/**
 * Deterministic record used whenever classification cannot be trusted.
 */
export function defaultRecord(item: IntermediateItem): ClassifiedRecord {
  return {
    ...item,
    tags: [...item.tags],
    summary: fallbackSummary(item),
    category: DEFAULT_CATEGORY,
    relevanceScore: DEFAULT_RELEVANCE_SCORE,
    isProductOrTool: false,
    productName: '',
    competitors: [],
    competitiveAdvantage: '',
  };
}

/**
 * Source tags first, then model tags; case-insensitive, order kept.
 */
export function mergeTags(...lists: readonly string[][]): string[] {
  const seen = new Set<string>();
  const merged: string[] = [];

  for (const tag of lists.flat()) {
    const clean = tag.trim();
    const key = clean.toLowerCase();
    if (!clean || seen.has(key)) continue;
    seen.add(key);
    merged.push(clean);
  }

  return merged;
}

export function classifiedRecord(item: IntermediateItem, response: ClassificationResponse): ClassifiedRecord {
  const isProduct = response.is_product_or_tool;

  return {
    ...item,
    tags: mergeTags(item.tags, response.tags),
    summary: response.summary.trim(),
    category: response.category,
    relevanceScore: response.relevance_score,
    isProductOrTool: isProduct,
    productName: isProduct ? response.product_name.trim() : '',
    competitors: isProduct ? response.competitors : [],
    competitiveAdvantage: isProduct ? response.competitive_advantage.trim() : '',
  };
}
