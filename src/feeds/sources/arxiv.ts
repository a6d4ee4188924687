/**
 * Signal Digest — arXiv Source
 *
 * Queries the arXiv export API, which answers with an Atom feed.
 * Filtering happens provider-side through the search query.
 */

import Parser from 'rss-parser';
import { z } from 'zod';
import { FeedSource, type SourceSettings } from '../base';
import { collapseWhitespace, normalizeItems } from '../normalizer';
import { withQuery } from '../../lib/http';
import type { IntermediateItem } from '../../types';

const ARXIV_API_URL = 'https://export.arxiv.org/api/query';
const DEFAULT_QUERY =
  'all:LLM OR all:"large language model" OR all:"AI agent" OR all:"foundation model"';

const MAX_AUTHORS = 3;

/** Atom fields rss-parser fills in beyond its RSS item type */
interface ArxivEntry {
  id?: string;
  author?: string;
  summary?: string;
  /** Raw `<author>` elements, kept as an array through customFields */
  authors?: unknown;
}

const AtomAuthorsSchema = z.array(z.object({ name: z.array(z.string()).optional() }));

/**
 * First three author names, comma separated. rss-parser itself keeps
 * only the first.
 */
function authorNames(entry: ArxivEntry): string {
  const authors = AtomAuthorsSchema.safeParse(entry.authors);
  if (!authors.success) return entry.author ?? '';

  return authors.data
    .flatMap(author => author.name?.[0]?.trim() || [])
    .slice(0, MAX_AUTHORS)
    .join(', ');
}

export interface ArxivOptions {
  maxResults: number;
  query?: string;
}

export class ArxivSource extends FeedSource {
  readonly name = 'arXiv';
  readonly fetchMethod = 'atom' as const;

  private readonly parser = new Parser<Record<string, unknown>, ArxivEntry>({
    customFields: { item: [['author', 'authors', { keepArray: true }]] },
  });

  constructor(
    settings: SourceSettings,
    private readonly options: ArxivOptions
  ) {
    super(settings);
  }

  async fetch(signal: AbortSignal): Promise<IntermediateItem[]> {
    const url = withQuery(ARXIV_API_URL, {
      search_query: this.options.query ?? DEFAULT_QUERY,
      sortBy: 'lastUpdatedDate',
      sortOrder: 'descending',
      max_results: this.options.maxResults,
    });

    const feed = await this.parser.parseString(await this.getText(url, signal));

    return normalizeItems(
      feed.items.map(entry => ({
        title: entry.title,
        locator: entry.link ?? entry.id,
        sourceName: this.name,
        publishedAt: entry.isoDate ?? entry.pubDate,
        bodyText: entry.summary ? collapseWhitespace(entry.summary) : '',
        author: authorNames(entry),
        tags: ['research', 'arxiv'],
        rankScore: 0,
      }))
    );
  }
}
