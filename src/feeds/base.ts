/**
 * Signal Digest — Feed Source Base
 *
 * Abstract base class for all source adapters.
 * Each adapter fetches from one provider, filters for relevance and
 * normalizes into IntermediateItems. `safeFetch` is the failure boundary:
 * it always resolves, with an empty item list when the source fails.
 */

import type { FetchMethod, IntermediateItem, SourceFetchResult } from '../types';
import { fetchJson, fetchPage } from '../lib/http';
import { withDeadline } from '../lib/deadline';
import { attempt } from '../lib/outcome';
import { logger } from '../lib/logger';

export interface SourceSettings {
  /** Bound on the whole adapter run, every request included */
  timeoutMs: number;
  userAgent: string;
  /** Relevance vocabulary */
  keywords: string[];
}

/**
 * Abstract base class for feed sources.
 */
export abstract class FeedSource {
  abstract readonly name: string;
  abstract readonly fetchMethod: FetchMethod;

  protected logger = logger.child({ source: this.constructor.name });

  constructor(protected readonly settings: SourceSettings) {}

  /**
   * Fetch, filter and normalize items from the provider.
   * May throw; callers go through `safeFetch`.
   */
  abstract fetch(signal: AbortSignal): Promise<IntermediateItem[]>;

  protected getJson(url: string, signal: AbortSignal, headers?: Record<string, string>): Promise<unknown> {
    return fetchJson(url, {
      timeoutMs: this.settings.timeoutMs,
      userAgent: this.settings.userAgent,
      signal,
      headers,
    });
  }

  protected async getText(url: string, signal: AbortSignal): Promise<string> {
    const page = await fetchPage(url, {
      timeoutMs: this.settings.timeoutMs,
      userAgent: this.settings.userAgent,
      signal,
    });
    return page.body;
  }

  /**
   * Execute fetch under the source timeout with error handling and logging.
   */
  async safeFetch(signal?: AbortSignal): Promise<SourceFetchResult> {
    const startTime = Date.now();
    this.logger.info('Starting fetch', { fetchMethod: this.fetchMethod });

    const outcome = await attempt(() =>
      withDeadline(deadline => this.fetch(deadline), this.settings.timeoutMs, signal)
    );
    const durationMs = Date.now() - startTime;

    if (outcome.ok) {
      this.logger.info('Fetch completed', { itemsFound: outcome.value.length, durationMs });
      return {
        sourceName: this.name,
        fetchMethod: this.fetchMethod,
        items: outcome.value,
        durationMs,
        fetchedAt: new Date().toISOString(),
      };
    }

    this.logger.error('Fetch failed', { error: outcome.reason, durationMs });
    return {
      sourceName: this.name,
      fetchMethod: this.fetchMethod,
      items: [],
      durationMs,
      fetchedAt: new Date().toISOString(),
      error: outcome.reason,
    };
  }
}
