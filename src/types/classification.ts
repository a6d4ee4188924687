/**
 * Signal Digest — Classification Types
 *
 * The JSON contract the text-generation service must satisfy.
 * Anything that does not parse against ClassificationResponseSchema is
 * treated as a schema failure and replaced by the default record.
 */

import { z } from 'zod';

// ============================================================
// CATEGORIES
// ============================================================

export const CATEGORIES = [
  'Product/Tool',
  'AI Model',
  'Research Paper',
  'Industry News',
  'Tutorial/Guide',
  'Platform/Infrastructure',
] as const;

export const CategorySchema = z.enum(CATEGORIES);
export type Category = z.infer<typeof CategorySchema>;

export const DEFAULT_CATEGORY: Category = 'Industry News';
export const DEFAULT_RELEVANCE_SCORE = 5;

// ============================================================
// RESPONSE SCHEMA
// ============================================================

export const CompetitorSchema = z.object({
  name: z.string(),
  description: z.string(),
  comparison: z.string(),
});
export type Competitor = z.infer<typeof CompetitorSchema>;

export const ClassificationResponseSchema = z.object({
  summary: z.string().trim().min(1, 'Summary cannot be empty'),
  category: CategorySchema,
  tags: z.array(z.string()),
  relevance_score: z.number().int().min(1).max(10),
  is_product_or_tool: z.boolean(),
  product_name: z.string(),
  competitors: z.array(CompetitorSchema),
  competitive_advantage: z.string(),
});
export type ClassificationResponse = z.infer<typeof ClassificationResponseSchema>;

// ============================================================
// CLASSIFICATION STATUS
// ============================================================

export type ClassificationStatus =
  | 'classified'          // Model output accepted
  | 'unconfigured'        // No credential, no call made
  | 'transport_failure'   // Network, timeout, non-2xx
  | 'schema_failure'      // Unparseable or invalid response
  | 'skipped';            // Cancelled before the call was issued
