/**
 * Signal Digest — Digest Builder
 *
 * Selects the records each recipient cares about and renders them as a
 * plain-text and HTML email, grouped by category.
 */

import { CATEGORIES, type Category, type ClassifiedRecord } from '../types';
import type { Recipient } from '../config';
import type { EmailMessage, EmailRecipient } from './email';

// ============================================================
// TYPES
// ============================================================

export interface DigestPreferences {
  /** Empty means every category */
  categories: readonly Category[];
  minRelevance: number;
}

export interface CategoryGroup {
  category: Category;
  records: ClassifiedRecord[];
}

// ============================================================
// SELECTION
// ============================================================

/**
 * A recipient's own preferences, falling back to the digest-wide ones.
 */
export function recipientPreferences(recipient: Recipient, defaults: DigestPreferences): DigestPreferences {
  return {
    categories: recipient.categories ?? defaults.categories,
    minRelevance: recipient.minRelevance ?? defaults.minRelevance,
  };
}

export function selectForRecipient(
  records: readonly ClassifiedRecord[],
  preferences: DigestPreferences,
  limit: number
): ClassifiedRecord[] {
  const allowed = new Set<Category>(preferences.categories);

  return records
    .filter(r => allowed.size === 0 || allowed.has(r.category))
    .filter(r => r.relevanceScore >= preferences.minRelevance)
    .sort((a, b) => b.relevanceScore - a.relevanceScore || b.rankScore - a.rankScore)
    .slice(0, limit);
}

/**
 * Group records in the fixed category order, dropping empty groups.
 * Order within a group is preserved.
 */
export function groupByCategory(records: readonly ClassifiedRecord[]): CategoryGroup[] {
  return CATEGORIES.map(category => ({
    category,
    records: records.filter(r => r.category === category),
  })).filter(group => group.records.length > 0);
}

// ============================================================
// TEXT RENDERING
// ============================================================

export function renderDigestText(records: readonly ClassifiedRecord[], generatedAt: Date): string {
  const lines: string[] = [];

  lines.push(`SIGNAL DIGEST - ${generatedAt.toISOString().slice(0, 10)}`);
  lines.push(`${records.length} articles`);
  lines.push('');

  if (records.length === 0) {
    lines.push('Nothing cleared the relevance bar today.');
    return lines.join('\n');
  }

  for (const group of groupByCategory(records)) {
    lines.push(`## ${group.category}`);
    lines.push('');

    for (const record of group.records) {
      lines.push(`[${record.relevanceScore}/10] ${record.title}`);
      lines.push(`  ${record.summary}`);
      lines.push(`  ${record.sourceName} | ${record.locator}`);

      if (record.isProductOrTool && record.competitors.length > 0) {
        const names = record.competitors.map(c => c.name).join(', ');
        lines.push(`  Competes with: ${names}`);
        if (record.competitiveAdvantage) {
          lines.push(`  Edge: ${record.competitiveAdvantage}`);
        }
      }
      lines.push('');
    }
  }

  return lines.join('\n').trimEnd();
}

// ============================================================
// HTML RENDERING
// ============================================================

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

function renderCompetitorTable(record: ClassifiedRecord): string {
  if (!record.isProductOrTool || record.competitors.length === 0) return '';

  const rows = record.competitors
    .map(
      c => `
        <tr>
          <td>${escapeHtml(c.name)}</td>
          <td>${escapeHtml(c.description)}</td>
          <td>${escapeHtml(c.comparison)}</td>
        </tr>`
    )
    .join('');

  const advantage = record.competitiveAdvantage
    ? `<p class="edge"><strong>Edge:</strong> ${escapeHtml(record.competitiveAdvantage)}</p>`
    : '';

  return `
      <table class="competitors">
        <tr><th>Competitor</th><th>What it is</th><th>Comparison</th></tr>${rows}
      </table>
      ${advantage}`;
}

function renderRecordHtml(record: ClassifiedRecord): string {
  const tags = record.tags.map(t => `<span class="tag">${escapeHtml(t)}</span>`).join(' ');

  return `
    <div class="item">
      <span class="score">${record.relevanceScore}/10</span>
      <h3><a href="${escapeHtml(record.locator)}">${escapeHtml(record.title)}</a></h3>
      <p>${escapeHtml(record.summary)}</p>
      <p class="meta">${escapeHtml(record.sourceName)}${tags ? ` ${tags}` : ''}</p>
      ${renderCompetitorTable(record)}
    </div>`;
}

export function renderDigestHtml(records: readonly ClassifiedRecord[], generatedAt: Date): string {
  const sections = groupByCategory(records)
    .map(
      group => `
  <div class="section">
    <h2>${escapeHtml(group.category)}</h2>
    ${group.records.map(renderRecordHtml).join('')}
  </div>`
    )
    .join('');

  const body = sections || '<p>Nothing cleared the relevance bar today.</p>';

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <style>
    body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; line-height: 1.6; color: #333; max-width: 800px; margin: 0 auto; padding: 20px; }
    h1 { color: #1a1a2e; border-bottom: 3px solid #4361ee; padding-bottom: 10px; }
    h2 { color: #4361ee; margin-top: 30px; }
    .item { background: #f8f9fa; border-left: 4px solid #4361ee; padding: 15px; margin: 15px 0; border-radius: 4px; }
    .score { float: right; font-weight: bold; color: #4361ee; }
    .meta { font-size: 13px; color: #64748b; }
    .tag { background: #e2e8f0; padding: 1px 6px; border-radius: 3px; }
    .competitors { border-collapse: collapse; font-size: 13px; width: 100%; }
    .competitors td, .competitors th { border: 1px solid #e2e8f0; padding: 4px 8px; text-align: left; }
  </style>
</head>
<body>
  <h1>Signal Digest</h1>
  <div class="meta">${generatedAt.toISOString().slice(0, 10)} | ${records.length} articles</div>
  ${body}
</body>
</html>`;
}

// ============================================================
// EMAIL BUILDER
// ============================================================

export function buildDigestEmail(
  records: readonly ClassifiedRecord[],
  recipients: EmailRecipient[],
  generatedAt: Date = new Date()
): EmailMessage {
  return {
    to: recipients,
    subject: `[Signal Digest] ${records.length} articles for ${generatedAt.toISOString().slice(0, 10)}`,
    text: renderDigestText(records, generatedAt),
    html: renderDigestHtml(records, generatedAt),
  };
}
