/**
 * Signal Digest — Feed Sources Index
 *
 * Builds the fixed set of source adapters from configuration.
 */

import type { SourcesConfig } from '../../config';
import type { FeedSource, SourceSettings } from '../base';
import { HackerNewsSource } from './hacker-news';
import { ArxivSource } from './arxiv';
import { NewsApiSource } from './news-api';
import { MediumSource } from './medium';

export { HackerNewsSource, ArxivSource, NewsApiSource, MediumSource };

export function createDefaultSources(config: SourcesConfig): FeedSource[] {
  const settings: SourceSettings = {
    timeoutMs: config.timeoutMs,
    userAgent: config.userAgent,
    keywords: config.keywords,
  };

  return [
    new HackerNewsSource(settings, config.hackerNews),
    new ArxivSource(settings, config.arxiv),
    new NewsApiSource(settings, { apiKey: config.newsApiKey }),
    new MediumSource(settings, config.medium),
  ];
}
