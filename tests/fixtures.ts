/**
 * Shared test fixtures
 */

import type { ClassifiedRecord, IntermediateItem } from '../src/types';
import type { ClassifierConfig, EnrichmentConfig } from '../src/config';
import { identity } from '../src/lib/identity';
import { FeedSource } from '../src/feeds/base';

export function createMockItem(overrides: Partial<IntermediateItem> = {}): IntermediateItem {
  const locator = overrides.locator ?? 'https://example.com/articles/1';
  return {
    identity: identity(locator),
    title: 'New open-source LLM runtime',
    locator,
    sourceName: 'Test Source',
    publishedAt: '2026-01-15T10:00:00.000Z',
    bodyText: '',
    author: 'Test Author',
    tags: ['test'],
    rankScore: 0,
    ...overrides,
  };
}

export function createMockRecord(overrides: Partial<ClassifiedRecord> = {}): ClassifiedRecord {
  return {
    ...createMockItem(),
    summary: 'A short summary.',
    category: 'Industry News',
    relevanceScore: 5,
    isProductOrTool: false,
    productName: '',
    competitors: [],
    competitiveAdvantage: '',
    ...overrides,
  };
}

export function createClassifierConfig(overrides: Partial<ClassifierConfig> = {}): ClassifierConfig {
  return {
    apiKey: 'test-secret',
    model: 'test-model',
    maxTokens: 600,
    timeoutMs: 1_000,
    concurrency: 5,
    ...overrides,
  };
}

export function createEnrichmentConfig(overrides: Partial<EnrichmentConfig> = {}): EnrichmentConfig {
  return {
    concurrency: 10,
    timeoutMs: 1_000,
    userAgent: 'TestAgent/1.0',
    minBodyLength: 80,
    minDescriptionLength: 40,
    maxDescriptionLength: 500,
    discussionHosts: ['news.ycombinator.com'],
    ...overrides,
  };
}

/**
 * Source double returning fixed items after an optional delay, or failing.
 */
export class StubSource extends FeedSource {
  readonly fetchMethod = 'api';
  calls = 0;

  constructor(
    readonly name: string,
    private readonly behavior: { items?: IntermediateItem[]; error?: Error; delayMs?: number }
  ) {
    super({ timeoutMs: 1_000, userAgent: 'TestAgent/1.0', keywords: [] });
  }

  async fetch(): Promise<IntermediateItem[]> {
    this.calls++;
    if (this.behavior.delayMs) {
      await new Promise(resolve => setTimeout(resolve, this.behavior.delayMs));
    }
    if (this.behavior.error) throw this.behavior.error;
    return this.behavior.items ?? [];
  }
}
