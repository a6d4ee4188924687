/**
 * Tests for the identity assigner
 */

import { describe, it, expect } from 'vitest';
import { createHash } from 'crypto';
import { identity, IDENTITY_LENGTH } from '../../src/lib/identity';

describe('identity', () => {
  it('should return the first 16 hex characters of the SHA-256 digest', () => {
    const locator = 'https://example.com/post/1';
    const expected = createHash('sha256').update(locator).digest('hex').slice(0, 16);

    expect(identity(locator)).toBe(expected);
    expect(identity(locator)).toHaveLength(IDENTITY_LENGTH);
  });

  it('should be stable across calls', () => {
    expect(identity('https://example.com/a')).toBe(identity('https://example.com/a'));
  });

  it('should differ for different locators', () => {
    expect(identity('https://example.com/a')).not.toBe(identity('https://example.com/b'));
  });

  it('should be defined for the empty string', () => {
    expect(identity('')).toBe('e3b0c44298fc1c14');
  });
});
