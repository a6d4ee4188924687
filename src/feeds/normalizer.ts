/**
 * Signal Digest — Item Normalizer
 *
 * Shared helpers that turn provider fields into IntermediateItems.
 */

import * as cheerio from 'cheerio';
import type { IntermediateItem } from '../types';
import { identity } from '../lib/identity';

/**
 * Provider fields as an adapter has mapped them, before validation.
 */
export interface ItemDraft {
  title: string | null | undefined;
  locator: string | null | undefined;
  sourceName: string;
  publishedAt?: string | null;
  bodyText?: string | null;
  author?: string | null;
  tags: string[];
  rankScore?: number | null;
}

// "2024-05-01 12:30:00", as the rss2json proxy reports dates (UTC)
const SPACE_SEPARATED_DATE = /^(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2})$/;

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Plain text of an HTML fragment.
 */
export function htmlToText(html: string): string {
  if (!html.includes('<')) return collapseWhitespace(html);
  return collapseWhitespace(cheerio.load(html).root().text());
}

/**
 * ISO timestamp for a provider date, or `now` when it cannot be parsed.
 */
export function parsePublishedAt(value: string | null | undefined, now: Date = new Date()): string {
  if (!value) return now.toISOString();

  const spaced = SPACE_SEPARATED_DATE.exec(value.trim());
  const candidate = spaced ? `${spaced[1]}T${spaced[2]}Z` : value.trim();
  const time = Date.parse(candidate);

  return Number.isNaN(time) ? now.toISOString() : new Date(time).toISOString();
}

/**
 * Build an IntermediateItem, or null when the draft has no title or locator.
 */
export function normalizeItem(draft: ItemDraft, now: Date = new Date()): IntermediateItem | null {
  const title = collapseWhitespace(draft.title ?? '');
  const locator = (draft.locator ?? '').trim();
  if (!title || !locator) return null;

  const rank = draft.rankScore ?? 0;

  return {
    identity: identity(locator),
    title,
    locator,
    sourceName: draft.sourceName,
    publishedAt: parsePublishedAt(draft.publishedAt, now),
    bodyText: (draft.bodyText ?? '').trim(),
    author: (draft.author ?? '').trim(),
    tags: [...draft.tags],
    rankScore: Number.isFinite(rank) ? rank : 0,
  };
}

export function normalizeItems(drafts: ItemDraft[], now: Date = new Date()): IntermediateItem[] {
  return drafts
    .map(draft => normalizeItem(draft, now))
    .filter((item): item is IntermediateItem => item !== null);
}
