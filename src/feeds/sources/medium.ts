/**
 * Signal Digest — Medium Source
 *
 * Reads Medium tag feeds through the rss2json proxy, which turns RSS into
 * JSON. One feed failing is logged and skipped; the source only fails
 * when every feed does.
 */

import { z } from 'zod';
import { FeedSource, type SourceSettings } from '../base';
import { htmlToText, normalizeItems, type ItemDraft } from '../normalizer';
import { isRelevant } from '../relevance';
import { withQuery } from '../../lib/http';
import { attempt } from '../../lib/outcome';
import type { IntermediateItem } from '../../types';

const RSS2JSON_URL = 'https://api.rss2json.com/v1/api.json';
const MAX_BODY_LENGTH = 500;

const Rss2JsonItemSchema = z.object({
  title: z.string().nullish(),
  link: z.string().nullish(),
  pubDate: z.string().nullish(),
  author: z.string().nullish(),
  description: z.string().nullish(),
});

const Rss2JsonResponseSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  items: z.array(Rss2JsonItemSchema).default([]),
});

export interface MediumOptions {
  feeds: string[];
  itemsPerFeed: number;
}

export class MediumSource extends FeedSource {
  readonly name = 'Medium';
  readonly fetchMethod = 'rss_proxy' as const;

  constructor(
    settings: SourceSettings,
    private readonly options: MediumOptions
  ) {
    super(settings);
  }

  async fetch(signal: AbortSignal): Promise<IntermediateItem[]> {
    const outcomes = await Promise.all(
      this.options.feeds.map(feed => attempt(() => this.fetchFeed(feed, signal)))
    );

    const drafts: ItemDraft[] = [];
    let failed = 0;

    outcomes.forEach((outcome, index) => {
      if (outcome.ok) {
        drafts.push(...outcome.value);
      } else {
        failed++;
        this.logger.warn('Feed failed', { feed: this.options.feeds[index], error: outcome.reason });
      }
    });

    if (this.options.feeds.length > 0 && failed === this.options.feeds.length) {
      throw new Error(`All ${failed} Medium feeds failed`);
    }

    return normalizeItems(drafts);
  }

  private async fetchFeed(feed: string, signal: AbortSignal): Promise<ItemDraft[]> {
    const url = withQuery(RSS2JSON_URL, { rss_url: feed, count: this.options.itemsPerFeed });
    const data = Rss2JsonResponseSchema.parse(await this.getJson(url, signal));

    if (data.status !== 'ok') {
      throw new Error(`rss2json error: ${data.message ?? data.status}`);
    }

    return data.items
      .filter(item => isRelevant(this.settings.keywords, item.title, item.description))
      .map(item => ({
        title: item.title,
        locator: item.link,
        sourceName: this.name,
        publishedAt: item.pubDate,
        bodyText: item.description ? htmlToText(item.description).slice(0, MAX_BODY_LENGTH) : '',
        author: item.author,
        tags: ['medium'],
        rankScore: 0,
      }));
  }
}
