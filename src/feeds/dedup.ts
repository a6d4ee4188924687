/**
 * Signal Digest — Deduplication & Ordering
 *
 * Identity-only deduplication: the first item seen with an identity wins,
 * later ones are dropped and counted.
 */

import type { IntermediateItem } from '../types';

export interface DedupResult {
  items: IntermediateItem[];
  duplicateCount: number;
}

export function deduplicateByIdentity(items: readonly IntermediateItem[]): DedupResult {
  const seen = new Set<string>();
  const unique: IntermediateItem[] = [];

  for (const item of items) {
    if (seen.has(item.identity)) continue;
    seen.add(item.identity);
    unique.push(item);
  }

  return { items: unique, duplicateCount: items.length - unique.length };
}

/**
 * Total order: rankScore descending, then publishedAt descending.
 */
export function compareByRankThenRecency(a: IntermediateItem, b: IntermediateItem): number {
  if (a.rankScore !== b.rankScore) return b.rankScore - a.rankScore;
  return Date.parse(b.publishedAt) - Date.parse(a.publishedAt);
}

export function sortByRankThenRecency(items: readonly IntermediateItem[]): IntermediateItem[] {
  return [...items].sort(compareByRankThenRecency);
}
