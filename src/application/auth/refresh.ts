import { TokenError } from '../../domain/auth/errors.js';
import type { TokenCodec } from '../../domain/auth/tokenCodec.js';
import { digestToken } from '../../domain/auth/tokenDigest.js';
import { storeCall, UnauthorizedError, UnavailableError } from '../errors.js';
import type { ClientMetadata, OperationOptions, RefreshTokenStore, UserStore } from '../ports.js';
import type { RefreshTokenRevocation } from './refreshTokenRevocation.js';
import type { TokenDenylist } from './tokenDenylist.js';
import type { AuthResult, TokenIssuer } from './tokenIssuer.js';

export interface RefreshCommand {
  refreshToken: string;
  client?: ClientMetadata;
}

const INVALID_REFRESH_TOKEN = 'Invalid or expired refresh token';

/**
 * Exchanges a live refresh token for a fresh pair. Each refresh token
 * authorizes at most one rotation: the record delete is the commit point,
 * and only the caller whose delete removed the row gets a new pair.
 */
export class RefreshUseCase {
  constructor(
    private readonly users: UserStore,
    private readonly refreshTokens: RefreshTokenStore,
    private readonly denylist: TokenDenylist,
    private readonly revocation: RefreshTokenRevocation,
    private readonly codec: TokenCodec,
    private readonly issuer: TokenIssuer
  ) {}

  async execute(command: RefreshCommand, options: OperationOptions = {}): Promise<AuthResult> {
    const { refreshToken } = command;

    let subjectId: string;
    try {
      subjectId = this.codec.verifyRefresh(refreshToken).subjectId;
    } catch (error) {
      if (error instanceof TokenError) {
        throw new UnauthorizedError(INVALID_REFRESH_TOKEN);
      }
      throw error;
    }

    const record = await storeCall('refreshTokens.findByDigest', () =>
      this.refreshTokens.findByDigest(digestToken(refreshToken))
    );
    if (!record || record.userId !== subjectId) {
      throw new UnauthorizedError(INVALID_REFRESH_TOKEN);
    }
    if (Date.now() > record.expiresAt.getTime()) {
      throw new UnauthorizedError(INVALID_REFRESH_TOKEN);
    }

    const denied = await storeCall('denylist.has', () => this.denylist.has(refreshToken));
    if (denied) {
      throw new UnauthorizedError(INVALID_REFRESH_TOKEN);
    }

    const user = await storeCall('users.findById', () => this.users.findById(record.userId));
    if (!user || !user.isActive) {
      throw new UnauthorizedError(INVALID_REFRESH_TOKEN);
    }

    // Past this point a cancellation would leave the caller without a token
    options.signal?.throwIfAborted();

    const outcome = await this.revocation.revoke(refreshToken, record);
    switch (outcome) {
      case 'already_consumed':
        throw new UnauthorizedError(INVALID_REFRESH_TOKEN);
      case 'failed':
        throw new UnavailableError('Could not revoke refresh token');
      case 'consumed':
      case 'denylisted_only':
        break;
    }

    return await this.issuer.issue(user, command.client);
  }
}
