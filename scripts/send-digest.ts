/**
 * Signal Digest — Send Digest Script
 *
 * Reads the most relevant stored records and emails each configured
 * recipient their selection.
 *
 * Usage:
 *   npm run digest
 */

import 'dotenv/config';
import { loadConfig } from '../src/config';
import { createAdminClient } from '../src/db/client';
import { SupabaseRecordStore } from '../src/db/record-store';
import { buildDigestEmail, recipientPreferences, selectForRecipient } from '../src/delivery/digest';
import { sendEmail } from '../src/delivery/email';
import { errorMessage } from '../src/lib/errors';
import { logger } from '../src/lib/logger';

// Headroom so per-recipient category filters still have enough to choose from
const QUERY_MULTIPLIER = 5;

async function main(): Promise<void> {
  const config = loadConfig();
  const { digest } = config;

  if (digest.recipients.length === 0) {
    logger.warn('DIGEST_RECIPIENTS not set, nothing to send');
    return;
  }

  const store = new SupabaseRecordStore(createAdminClient(config.store), config.store.table);
  const defaults = { categories: digest.categories, minRelevance: digest.minRelevance };
  const preferences = digest.recipients.map(recipient => recipientPreferences(recipient, defaults));
  const floor = Math.min(...preferences.map(p => p.minRelevance));
  const records = await store.queryTop(floor, digest.limit * QUERY_MULTIPLIER);

  let failures = 0;
  for (const [index, recipient] of digest.recipients.entries()) {
    const selected = selectForRecipient(records, preferences[index] ?? defaults, digest.limit);
    const message = buildDigestEmail(selected, [{ name: recipient.name, email: recipient.email }]);
    const result = await sendEmail(
      { provider: digest.provider, from: digest.from, resendApiKey: digest.resendApiKey },
      message
    );
    if (!result.success) failures++;
  }

  logger.info('Digest run complete', { recipients: digest.recipients.length, failures });
  if (failures > 0) process.exitCode = 1;
}

main().catch((error: unknown) => {
  logger.error('Digest failed', { error: errorMessage(error) });
  console.error('\nDigest failed:', errorMessage(error));
  process.exitCode = 1;
});
