/**
 * Signal Digest — NewsAPI Source
 *
 * Uses the NewsAPI "everything" endpoint (requires API key).
 * Without a key the source is skipped, which is not a failure.
 */

import { z } from 'zod';
import { FeedSource, type SourceSettings } from '../base';
import { normalizeItems } from '../normalizer';
import { isRelevant } from '../relevance';
import { withQuery } from '../../lib/http';
import type { IntermediateItem } from '../../types';

const NEWS_API_URL = 'https://newsapi.org/v2/everything';
const DEFAULT_QUERY = 'AI OR LLM OR "machine learning" OR "platform engineering" OR MLOps';

const NewsApiArticleSchema = z.object({
  source: z.object({ name: z.string().nullish() }).nullish(),
  author: z.string().nullish(),
  title: z.string().nullish(),
  description: z.string().nullish(),
  url: z.string().nullish(),
  publishedAt: z.string().nullish(),
});

const NewsApiResponseSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  articles: z.array(NewsApiArticleSchema).default([]),
});

export interface NewsApiOptions {
  apiKey?: string;
  pageSize?: number;
  query?: string;
}

export class NewsApiSource extends FeedSource {
  readonly name = 'NewsAPI';
  readonly fetchMethod = 'api' as const;

  constructor(
    settings: SourceSettings,
    private readonly options: NewsApiOptions
  ) {
    super(settings);
  }

  async fetch(signal: AbortSignal): Promise<IntermediateItem[]> {
    if (!this.options.apiKey) {
      this.logger.warn('NEWS_API_KEY not set, skipping');
      return [];
    }

    const url = withQuery(NEWS_API_URL, {
      q: this.options.query ?? DEFAULT_QUERY,
      language: 'en',
      sortBy: 'publishedAt',
      pageSize: this.options.pageSize ?? 20,
    });

    const data = NewsApiResponseSchema.parse(
      await this.getJson(url, signal, { 'X-Api-Key': this.options.apiKey })
    );

    if (data.status !== 'ok') {
      throw new Error(`NewsAPI error: ${data.message ?? data.status}`);
    }

    return normalizeItems(
      data.articles
        .filter(article => isRelevant(this.settings.keywords, article.title, article.description))
        .map(article => ({
          title: article.title,
          locator: article.url,
          sourceName: `${this.name} / ${article.source?.name || this.name}`,
          publishedAt: article.publishedAt,
          bodyText: article.description,
          author: article.author,
          tags: ['news'],
          rankScore: 0,
        }))
    );
  }
}
