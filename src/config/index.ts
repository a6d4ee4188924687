/**
 * Signal Digest — Configuration
 *
 * Builds the read-only configuration value once from the environment.
 * Components receive the slice they need at construction; nothing reads
 * process.env after startup.
 */

import { z } from 'zod';
import defaultKeywords from './keywords.json';
import { CategorySchema, type Category } from '../types';

// ============================================================
// TYPES
// ============================================================

export interface ClassifierConfig {
  /** Unset means the classifier never calls out */
  apiKey?: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
  concurrency: number;
}

export interface SourcesConfig {
  timeoutMs: number;
  userAgent: string;
  keywords: string[];
  newsApiKey?: string;
  hackerNews: { minPoints: number; hitsPerPage: number };
  arxiv: { maxResults: number };
  medium: { feeds: string[]; itemsPerFeed: number };
}

export interface EnrichmentConfig {
  concurrency: number;
  timeoutMs: number;
  userAgent: string;
  /** Body text longer than this is left alone */
  minBodyLength: number;
  /** Descriptions this short are not worth keeping */
  minDescriptionLength: number;
  maxDescriptionLength: number;
  /** Hosts whose pages are discussion threads with no content of their own */
  discussionHosts: string[];
}

export interface StoreConfig {
  supabaseUrl?: string;
  supabaseKey?: string;
  table: string;
}

export interface Recipient {
  name: string;
  email: string;
  /** Overrides DigestConfig.categories when set */
  categories?: Category[];
  /** Overrides DigestConfig.minRelevance when set */
  minRelevance?: number;
}

export interface DigestConfig {
  provider: 'resend' | 'console';
  from: string;
  resendApiKey?: string;
  recipients: Recipient[];
  categories: Category[];
  minRelevance: number;
  limit: number;
}

export interface AppConfig {
  classifier: ClassifierConfig;
  sources: SourcesConfig;
  enrichment: EnrichmentConfig;
  store: StoreConfig;
  digest: DigestConfig;
}

// ============================================================
// ENVIRONMENT SCHEMA
// ============================================================

const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; SignalDigestBot/1.0)';

const DEFAULT_MEDIUM_FEEDS = [
  'https://medium.com/feed/tag/artificial-intelligence',
  'https://medium.com/feed/tag/machine-learning',
  'https://medium.com/feed/tag/platform-engineering',
  'https://medium.com/feed/tag/mlops',
];

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const commaList = (fallback: string[]) =>
  z.preprocess(
    blankToUndefined,
    z
      .string()
      .transform(value => value.split(',').map(part => part.trim()).filter(Boolean))
      .default(fallback.join(','))
  );

const RelevanceSchema = z.coerce.number().int().min(1).max(10);

/**
 * One recipient: `Name:email[:Category|Category[:minRelevance]]`.
 * An empty category segment keeps the global categories.
 */
function parseRecipient(entry: string): Recipient | string {
  const [rawName = '', rawEmail = '', rawCategories, rawRelevance] = entry.split(':').map(part => part.trim());
  if (!rawName || !rawEmail.includes('@')) {
    return `Invalid recipient "${entry}", expected Name:email[:Category|Category[:minRelevance]]`;
  }

  const recipient: Recipient = { name: rawName, email: rawEmail };

  if (rawCategories) {
    const categories: Category[] = [];
    for (const label of rawCategories.split('|').map(part => part.trim()).filter(Boolean)) {
      const category = CategorySchema.safeParse(label);
      if (!category.success) return `Invalid category "${label}" for recipient ${rawEmail}`;
      categories.push(category.data);
    }
    recipient.categories = categories;
  }

  if (rawRelevance) {
    const relevance = RelevanceSchema.safeParse(rawRelevance);
    if (!relevance.success) return `Invalid minimum relevance "${rawRelevance}" for recipient ${rawEmail}`;
    recipient.minRelevance = relevance.data;
  }

  return recipient;
}

const RecipientListSchema = z.preprocess(
  blankToUndefined,
  z
    .string()
    .default('')
    .transform((value, ctx) => {
      const recipients: Recipient[] = [];
      for (const entry of value.split(',').map(part => part.trim()).filter(Boolean)) {
        const parsed = parseRecipient(entry);
        if (typeof parsed === 'string') {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed });
          continue;
        }
        recipients.push(parsed);
      }
      return recipients;
    })
);

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: z.preprocess(blankToUndefined, z.string().default('claude-haiku-4-5-20251001')),
  CLASSIFIER_MAX_TOKENS: positiveInt(600),
  CLASSIFIER_TIMEOUT_MS: positiveInt(30_000),
  CLASSIFIER_CONCURRENCY: positiveInt(5),

  NEWS_API_KEY: optionalString,
  SOURCE_TIMEOUT_MS: positiveInt(15_000),
  HN_MIN_POINTS: positiveInt(10),
  HN_HITS_PER_PAGE: positiveInt(30),
  ARXIV_MAX_RESULTS: positiveInt(20),
  MEDIUM_FEEDS: commaList(DEFAULT_MEDIUM_FEEDS),
  MEDIUM_ITEMS_PER_FEED: positiveInt(10),
  RELEVANCE_KEYWORDS: commaList(defaultKeywords),

  ENRICH_CONCURRENCY: positiveInt(10),
  ENRICH_TIMEOUT_MS: positiveInt(8_000),
  HTTP_USER_AGENT: z.preprocess(blankToUndefined, z.string().default(DEFAULT_USER_AGENT)),

  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  RECORDS_TABLE: z.preprocess(blankToUndefined, z.string().default('classified_records')),

  EMAIL_PROVIDER: z.preprocess(blankToUndefined, z.enum(['resend', 'console']).default('console')),
  EMAIL_FROM: z.preprocess(blankToUndefined, z.string().default('Signal Digest <digest@example.com>')),
  RESEND_API_KEY: optionalString,
  DIGEST_RECIPIENTS: RecipientListSchema,
  DIGEST_CATEGORIES: commaList([]).pipe(z.array(CategorySchema)),
  DIGEST_MIN_RELEVANCE: z.preprocess(blankToUndefined, RelevanceSchema.default(5)),
  DIGEST_LIMIT: positiveInt(10),
});

// ============================================================
// LOADER
// ============================================================

/**
 * Parse configuration from an environment map.
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }

  const e = parsed.data;

  return {
    classifier: {
      apiKey: e.ANTHROPIC_API_KEY,
      model: e.ANTHROPIC_MODEL,
      maxTokens: e.CLASSIFIER_MAX_TOKENS,
      timeoutMs: e.CLASSIFIER_TIMEOUT_MS,
      concurrency: e.CLASSIFIER_CONCURRENCY,
    },
    sources: {
      timeoutMs: e.SOURCE_TIMEOUT_MS,
      userAgent: e.HTTP_USER_AGENT,
      keywords: e.RELEVANCE_KEYWORDS,
      newsApiKey: e.NEWS_API_KEY,
      hackerNews: { minPoints: e.HN_MIN_POINTS, hitsPerPage: e.HN_HITS_PER_PAGE },
      arxiv: { maxResults: e.ARXIV_MAX_RESULTS },
      medium: { feeds: e.MEDIUM_FEEDS, itemsPerFeed: e.MEDIUM_ITEMS_PER_FEED },
    },
    enrichment: {
      concurrency: e.ENRICH_CONCURRENCY,
      timeoutMs: e.ENRICH_TIMEOUT_MS,
      userAgent: e.HTTP_USER_AGENT,
      minBodyLength: 80,
      minDescriptionLength: 40,
      maxDescriptionLength: 500,
      discussionHosts: ['news.ycombinator.com'],
    },
    store: {
      supabaseUrl: e.SUPABASE_URL,
      supabaseKey: e.SUPABASE_SERVICE_ROLE_KEY,
      table: e.RECORDS_TABLE,
    },
    digest: {
      provider: e.EMAIL_PROVIDER,
      from: e.EMAIL_FROM,
      resendApiKey: e.RESEND_API_KEY,
      recipients: e.DIGEST_RECIPIENTS,
      categories: e.DIGEST_CATEGORIES,
      minRelevance: e.DIGEST_MIN_RELEVANCE,
      limit: e.DIGEST_LIMIT,
    },
  };
}
