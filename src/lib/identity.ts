/**
 * Signal Digest — Identity Assigner
 */

import { createHash } from 'crypto';

export const IDENTITY_LENGTH = 16;

/**
 * Stable short identity for a canonical locator: the first 16 hex
 * characters of its SHA-256 digest. Defined for every string, including
 * the empty one.
 */
export function identity(locator: string): string {
  return createHash('sha256').update(locator, 'utf8').digest('hex').slice(0, IDENTITY_LENGTH);
}
