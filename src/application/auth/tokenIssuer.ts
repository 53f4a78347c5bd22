import type { TokenCodec } from '../../domain/auth/tokenCodec.js';
import { digestToken } from '../../domain/auth/tokenDigest.js';
import { toSummary, type User, type UserSummary } from '../../domain/auth/user.js';
import { DuplicateRecordError, storeCall, UnavailableError } from '../errors.js';
import type { ClientMetadata, RefreshTokenStore } from '../ports.js';

export interface AuthResult {
  accessToken: string;
  tokenType: 'Bearer';
  /** Access-token lifetime in seconds. */
  expiresIn: number;
  refreshToken: string;
  /** Refresh-token lifetime in seconds, for the cookie's max age. */
  refreshExpiresIn: number;
  user: UserSummary;
}

/**
 * Issues an access/refresh pair and persists the refresh record. If the
 * record cannot be stored no pair is returned.
 */
export class TokenIssuer {
  constructor(
    private readonly codec: TokenCodec,
    private readonly refreshTokens: RefreshTokenStore
  ) {}

  async issue(user: User, client: ClientMetadata = {}): Promise<AuthResult> {
    const accessToken = this.codec.issueAccess(user.id, user.email);
    const refreshToken = this.codec.issueRefresh(user.id);
    const refreshTtlSeconds = this.codec.refreshTokenTtlSeconds;

    try {
      await storeCall('refreshTokens.create', () =>
        this.refreshTokens.create({
          userId: user.id,
          tokenDigest: digestToken(refreshToken),
          expiresAt: new Date(Date.now() + refreshTtlSeconds * 1000),
          deviceInfo: client.userAgent ?? null,
          ipAddress: client.ipAddress ?? null,
        })
      );
    } catch (error) {
      if (error instanceof DuplicateRecordError) {
        throw new UnavailableError('Could not persist refresh token', { cause: error });
      }
      throw error;
    }

    return {
      accessToken,
      tokenType: 'Bearer',
      expiresIn: this.codec.accessTokenTtlSeconds,
      refreshToken,
      refreshExpiresIn: refreshTtlSeconds,
      user: toSummary(user),
    };
  }
}
