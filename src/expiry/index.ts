// src/expiry/index.ts
import type { ExpirationCheck } from '../types.js';

interface HasExpiration {
  expiration(): string;
}

/**
 * Compare a bundle's expiration text against `now`. The bundle never does this
 * itself; callers decide whether credentials are still worth sending.
 */
export function checkExpiration(credentials: HasExpiration, now: Date = new Date()): ExpirationCheck {
  const expiresAt = new Date(credentials.expiration());
  if (Number.isNaN(expiresAt.getTime())) {
    return { isValid: false, isExpired: false, expiresAt: null, minutesUntilExpiry: null };
  }
  const isExpired = expiresAt <= now;
  const minutesUntilExpiry = Math.floor((expiresAt.getTime() - now.getTime()) / 60_000);
  return { isValid: !isExpired, isExpired, expiresAt, minutesUntilExpiry };
}
