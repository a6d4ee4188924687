/**
 * Signal Digest — Relevance Filter
 *
 * Case-insensitive substring match of title + body against the
 * configured vocabulary.
 */

export function isRelevant(keywords: readonly string[], ...texts: Array<string | null | undefined>): boolean {
  const haystack = texts.filter(Boolean).join(' ').toLowerCase();
  if (!haystack) return false;
  return keywords.some(keyword => haystack.includes(keyword.toLowerCase()));
}
