import { createHash } from 'crypto';

/**
 * SHA-256 hex digest of a raw token, used as its lookup key so raw
 * refresh tokens are never stored.
 */
export function digestToken(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}
