/**
 * Signal Digest — Hacker News Source
 *
 * Searches stories through the HN Algolia API, then keeps the ones whose
 * title or text matches the relevance vocabulary.
 */

import { z } from 'zod';
import { FeedSource, type SourceSettings } from '../base';
import { htmlToText, normalizeItems, type ItemDraft } from '../normalizer';
import { isRelevant } from '../relevance';
import { withQuery } from '../../lib/http';
import type { IntermediateItem } from '../../types';

const HN_SEARCH_URL = 'https://hn.algolia.com/api/v1/search';
const HN_ITEM_URL = 'https://news.ycombinator.com/item?id=';
const DEFAULT_QUERY = 'AI machine learning LLM platform engineering';

const HNHitSchema = z.object({
  objectID: z.string(),
  title: z.string().nullish(),
  url: z.string().nullish(),
  story_text: z.string().nullish(),
  author: z.string().nullish(),
  points: z.number().nullish(),
  created_at: z.string().nullish(),
});

const HNSearchResponseSchema = z.object({
  hits: z.array(HNHitSchema),
});

export interface HackerNewsOptions {
  minPoints: number;
  hitsPerPage: number;
  query?: string;
}

export class HackerNewsSource extends FeedSource {
  readonly name = 'Hacker News';
  readonly fetchMethod = 'api' as const;

  constructor(
    settings: SourceSettings,
    private readonly options: HackerNewsOptions
  ) {
    super(settings);
  }

  async fetch(signal: AbortSignal): Promise<IntermediateItem[]> {
    const url = withQuery(HN_SEARCH_URL, {
      query: this.options.query ?? DEFAULT_QUERY,
      tags: 'story',
      numericFilters: `points>${this.options.minPoints}`,
      hitsPerPage: this.options.hitsPerPage,
    });

    const { hits } = HNSearchResponseSchema.parse(await this.getJson(url, signal));

    const drafts: ItemDraft[] = hits
      .filter(hit => isRelevant(this.settings.keywords, hit.title, hit.story_text))
      .map(hit => ({
        title: hit.title,
        // Ask HN and friends have no external URL; fall back to the thread
        locator: hit.url || `${HN_ITEM_URL}${hit.objectID}`,
        sourceName: this.name,
        publishedAt: hit.created_at,
        bodyText: hit.story_text ? htmlToText(hit.story_text) : '',
        author: hit.author,
        tags: ['hacker-news'],
        rankScore: hit.points,
      }));

    this.logger.debug('Hits filtered', { hits: hits.length, relevant: drafts.length });

    return normalizeItems(drafts);
  }
}
