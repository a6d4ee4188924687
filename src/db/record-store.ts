/**
 * Signal Digest — Record Store
 *
 * Persistence collaborator of the pipeline. Upserts are idempotent by
 * identity; the latest write wins on AI-derived fields.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { ClassifiedRecord } from '../types';
import { CategorySchema, CompetitorSchema } from '../types';
import { handleSupabaseError } from './client';
import { StoreError } from '../lib/errors';
import { logger } from '../lib/logger';

export interface RecordStore {
  upsert(records: readonly ClassifiedRecord[]): Promise<void>;
  /** Records with relevance >= minRelevance, most relevant first */
  queryTop(minRelevance: number, limit: number): Promise<ClassifiedRecord[]>;
}

// ============================================================
// ROW MAPPING
// ============================================================

export const RecordRowSchema = z.object({
  identity: z.string(),
  title: z.string(),
  locator: z.string(),
  source_name: z.string(),
  published_at: z.string(),
  body_text: z.string().nullable(),
  author: z.string().nullable(),
  tags: z.array(z.string()).nullable(),
  rank_score: z.number(),
  summary: z.string(),
  category: CategorySchema,
  relevance_score: z.number().int(),
  is_product_or_tool: z.boolean(),
  product_name: z.string().nullable(),
  competitors: z.array(CompetitorSchema).nullable(),
  competitive_advantage: z.string().nullable(),
  fetched_at: z.string(),
});
export type RecordRow = z.infer<typeof RecordRowSchema>;

export function toRow(record: ClassifiedRecord, fetchedAt: string): RecordRow {
  return {
    identity: record.identity,
    title: record.title,
    locator: record.locator,
    source_name: record.sourceName,
    published_at: record.publishedAt,
    body_text: record.bodyText,
    author: record.author,
    tags: [...record.tags],
    rank_score: record.rankScore,
    summary: record.summary,
    category: record.category,
    relevance_score: record.relevanceScore,
    is_product_or_tool: record.isProductOrTool,
    product_name: record.productName,
    competitors: [...record.competitors],
    competitive_advantage: record.competitiveAdvantage,
    fetched_at: fetchedAt,
  };
}

export function fromRow(row: RecordRow): ClassifiedRecord {
  return {
    identity: row.identity,
    title: row.title,
    locator: row.locator,
    sourceName: row.source_name,
    publishedAt: row.published_at,
    bodyText: row.body_text ?? '',
    author: row.author ?? '',
    tags: row.tags ?? [],
    rankScore: row.rank_score,
    summary: row.summary,
    category: row.category,
    relevanceScore: row.relevance_score,
    isProductOrTool: row.is_product_or_tool,
    productName: row.product_name ?? '',
    competitors: row.competitors ?? [],
    competitiveAdvantage: row.competitive_advantage ?? '',
  };
}

// ============================================================
// SUPABASE STORE
// ============================================================

export class SupabaseRecordStore implements RecordStore {
  private readonly log = logger.child({ component: 'record-store' });

  constructor(
    private readonly client: SupabaseClient,
    private readonly table: string = 'classified_records'
  ) {}

  async upsert(records: readonly ClassifiedRecord[]): Promise<void> {
    if (records.length === 0) return;

    const fetchedAt = new Date().toISOString();
    const { error } = await this.client
      .from(this.table)
      .upsert(records.map(record => toRow(record, fetchedAt)), { onConflict: 'identity' });

    if (error) throw handleSupabaseError(error, 'upsert');

    this.log.info('Records upserted', { count: records.length });
  }

  async queryTop(minRelevance: number, limit: number): Promise<ClassifiedRecord[]> {
    const { data, error } = await this.client
      .from(this.table)
      .select('*')
      .gte('relevance_score', minRelevance)
      .order('relevance_score', { ascending: false })
      .order('rank_score', { ascending: false })
      .limit(limit);

    if (error) throw handleSupabaseError(error, 'query');

    const rows = z.array(RecordRowSchema).safeParse(data ?? []);
    if (!rows.success) {
      throw new StoreError(`Unexpected row shape: ${rows.error.issues[0]?.message ?? 'invalid'}`);
    }

    return rows.data.map(fromRow);
  }
}
