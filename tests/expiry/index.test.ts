// tests/expiry/index.test.ts
import { describe, it, expect } from 'vitest';
import { checkExpiration } from '../../src/expiry/index.js';

const NOW = new Date('2025-06-01T12:00:00Z');

function withExpiration(expiration: string) {
  return { expiration: () => expiration };
}

describe('checkExpiration', () => {
  it('returns valid for credentials expiring later', () => {
    const result = checkExpiration(withExpiration('2025-06-01T13:30:00Z'), NOW);
    expect(result.isValid).toBe(true);
    expect(result.isExpired).toBe(false);
    expect(result.expiresAt).toEqual(new Date('2025-06-01T13:30:00Z'));
    expect(result.minutesUntilExpiry).toBe(90);
  });

  it('returns expired for credentials in the past', () => {
    const result = checkExpiration(withExpiration('2025-06-01T11:59:00Z'), NOW);
    expect(result.isValid).toBe(false);
    expect(result.isExpired).toBe(true);
    expect(result.minutesUntilExpiry).toBe(-1);
  });

  it('treats the exact expiration instant as expired', () => {
    const result = checkExpiration(withExpiration('2025-06-01T12:00:00Z'), NOW);
    expect(result.isExpired).toBe(true);
  });

  it('returns invalid for unparseable expiration text', () => {
    const result = checkExpiration(withExpiration('next tuesday'), NOW);
    expect(result).toEqual({ isValid: false, isExpired: false, expiresAt: null, minutesUntilExpiry: null });
  });

  it('defaults to the current time', () => {
    const future = new Date(Date.now() + 60 * 60 * 1000).toISOString();
    const result = checkExpiration(withExpiration(future));
    expect(result.isValid).toBe(true);
    expect(result.minutesUntilExpiry).toBeGreaterThan(50);
  });
});
