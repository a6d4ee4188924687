/**
 * Signal Digest — Classification Response Parsing
 *
 * Model output is untrusted text. It is unwrapped, parsed and validated
 * here; anything that fails comes back as a failed Outcome and never
 * reaches a record.
 */

import { ClassificationResponseSchema, type ClassificationResponse } from '../types';
import { attemptSync, failure, success, type Outcome } from '../lib/outcome';

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)\s*```/i;

/**
 * Strip formatting around the JSON payload: a fenced code block, or any
 * prose before the first `{` and after the last `}`.
 */
export function extractJsonPayload(text: string): string {
  const trimmed = text.trim();

  const fenced = FENCED_BLOCK.exec(trimmed);
  const candidate = fenced ? fenced[1].trim() : trimmed;

  const start = candidate.indexOf('{');
  const end = candidate.lastIndexOf('}');
  if (start === -1 || end < start) return candidate;

  return candidate.slice(start, end + 1);
}

export function parseClassificationResponse(text: string): Outcome<ClassificationResponse> {
  const json = attemptSync((): unknown => JSON.parse(extractJsonPayload(text)));
  if (!json.ok) {
    return failure(new Error(`Response is not JSON: ${json.reason}`));
  }

  const parsed = ClassificationResponseSchema.safeParse(json.value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'root'}: ${issue.message}`);
    return failure(new Error(`Response violates schema: ${issues.join('; ')}`));
  }

  return success(parsed.data);
}
