import type { RefreshTokenRecord } from '../../domain/auth/user.js';
import type { Logger, RefreshTokenStore } from '../ports.js';
import type { TokenDenylist } from './tokenDenylist.js';

/**
 * - `consumed`: this caller removed the record.
 * - `already_consumed`: the record was gone by the time we deleted it.
 * - `denylisted_only`: the delete failed but the denylist entry was written.
 * - `failed`: neither step took effect; the token may still be usable.
 */
export type RevocationOutcome = 'consumed' | 'already_consumed' | 'denylisted_only' | 'failed';

/**
 * Revokes a refresh token by denylisting the raw string first and then
 * deleting its record. A crash between the two leaves the token unusable.
 */
export class RefreshTokenRevocation {
  constructor(
    private readonly denylist: TokenDenylist,
    private readonly refreshTokens: RefreshTokenStore,
    private readonly logger: Logger
  ) {}

  async revoke(rawToken: string, record: RefreshTokenRecord): Promise<RevocationOutcome> {
    let denylisted = true;
    try {
      await this.denylist.add(rawToken, record.expiresAt.getTime() - Date.now());
    } catch (error) {
      denylisted = false;
      this.logger.error('Failed to denylist refresh token', { recordId: record.id, error });
    }

    let deleted: boolean;
    try {
      deleted = await this.refreshTokens.deleteByDigest(record.tokenDigest);
    } catch (error) {
      this.logger.warn('Failed to delete refresh token record', { recordId: record.id, error });
      return denylisted ? 'denylisted_only' : 'failed';
    }

    return deleted ? 'consumed' : 'already_consumed';
  }
}
