import { CachedToken } from '../core/index.js';

/** Lifetime assumed when the gateway does not state one */
export const DEFAULT_TOKEN_LIFETIME_SECONDS = 3600;

export function isTokenValid(cached: CachedToken | null, now: number = Date.now()): cached is CachedToken {
  return cached !== null && cached.token !== '' && now < cached.expiresAt;
}

/**
 * Turn the gateway's `expiryDate` into an absolute epoch-millisecond instant
 *
 * A number (or numeric string) is a lifetime in seconds; any other string is
 * read as an ISO 8601 timestamp. Anything else falls back to the default
 * lifetime.
 */
export function resolveExpiry(expiryDate: string | number | undefined, now: number = Date.now()): number {
  if (typeof expiryDate === 'number' && Number.isFinite(expiryDate)) {
    return now + expiryDate * 1000;
  }

  if (typeof expiryDate === 'string' && expiryDate.trim() !== '') {
    const seconds = Number(expiryDate);
    if (Number.isFinite(seconds)) {
      return now + seconds * 1000;
    }

    const instant = Date.parse(expiryDate);
    if (!Number.isNaN(instant)) {
      return instant;
    }
  }

  return now + DEFAULT_TOKEN_LIFETIME_SECONDS * 1000;
}

export function createCachedToken(
  token: string,
  expiryDate: string | number | undefined,
  now: number = Date.now()
): CachedToken {
  return Object.freeze({ token, expiresAt: resolveExpiry(expiryDate, now) });
}
