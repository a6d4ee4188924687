/**
 * Signal Digest — Type Exports
 *
 * Re-exports all types from the types module.
 */

export type {
  IntermediateItem,
  ClassifiedRecord,
  FetchMethod,
  SourceFetchResult,
} from './item';

export type {
  Category,
  Competitor,
  ClassificationResponse,
  ClassificationStatus,
} from './classification';
export {
  CATEGORIES,
  CategorySchema,
  CompetitorSchema,
  ClassificationResponseSchema,
  DEFAULT_CATEGORY,
  DEFAULT_RELEVANCE_SCORE,
} from './classification';
