/**
 * Signal Digest — Classification Prompt
 */

import type { IntermediateItem } from '../types';
import { CATEGORIES } from '../types';

export const MAX_PROMPT_TITLE_LENGTH = 300;
export const MAX_PROMPT_BODY_LENGTH = 600;

export function buildSystemPrompt(): string {
  return `You are an expert AI/ML analyst specializing in software development and platform engineering.
You analyze AI news articles and provide structured analysis. Always respond with valid JSON only, no markdown.`;
}

export function buildUserPrompt(item: IntermediateItem): string {
  const title = item.title.slice(0, MAX_PROMPT_TITLE_LENGTH);
  const body = item.bodyText.slice(0, MAX_PROMPT_BODY_LENGTH) || '(no body text available)';

  return `Analyze this AI/tech article and return JSON:

Title: ${title}
Source: ${item.sourceName}
Content: ${body}

Return this exact JSON structure:
{
  "summary": "2-3 sentence summary focused on what matters for software engineers and platform engineers",
  "category": "one of: ${CATEGORIES.join(' | ')}",
  "tags": ["tag1", "tag2", "tag3"],
  "relevance_score": <integer 1-10 for software dev / platform engineering relevance>,
  "is_product_or_tool": <true if this is about a product, tool, model, framework, or platform>,
  "product_name": "<name if is_product_or_tool, else empty string>",
  "competitors": [
    {
      "name": "Competitor Name",
      "description": "brief description",
      "comparison": "how this new thing differs or improves on this competitor"
    }
  ],
  "competitive_advantage": "<if is_product_or_tool: what makes it stand out vs competitors, else empty string>"
}

For competitors: only include if is_product_or_tool is true, otherwise return an empty array. List 2-3 most relevant competitors max.`;
}
