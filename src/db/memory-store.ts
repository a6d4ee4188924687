/**
 * Signal Digest — In-Memory Record Store
 *
 * Used for dry runs. Same upsert and ordering semantics as the Supabase
 * store.
 */

import type { ClassifiedRecord } from '../types';
import type { RecordStore } from './record-store';

export class MemoryRecordStore implements RecordStore {
  private readonly records = new Map<string, ClassifiedRecord>();

  async upsert(records: readonly ClassifiedRecord[]): Promise<void> {
    for (const record of records) {
      this.records.set(record.identity, record);
    }
  }

  async queryTop(minRelevance: number, limit: number): Promise<ClassifiedRecord[]> {
    return [...this.records.values()]
      .filter(record => record.relevanceScore >= minRelevance)
      .sort((a, b) => b.relevanceScore - a.relevanceScore || b.rankScore - a.rankScore)
      .slice(0, limit);
  }

  get size(): number {
    return this.records.size;
  }
}
