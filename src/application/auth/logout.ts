import { digestToken } from '../../domain/auth/tokenDigest.js';
import type { RefreshTokenRecord } from '../../domain/auth/user.js';
import type { Logger, OperationOptions, RefreshTokenStore } from '../ports.js';
import type { RefreshTokenRevocation } from './refreshTokenRevocation.js';

export interface LogoutCommand {
  userId: string;
  refreshToken?: string;
}

export interface LogoutResult {
  revoked: boolean;
}

/**
 * Revokes the presented refresh token if it belongs to the caller. A
 * missing, unknown or foreign token is a no-op, and store failures are
 * logged rather than surfaced.
 */
export class LogoutUseCase {
  constructor(
    private readonly refreshTokens: RefreshTokenStore,
    private readonly revocation: RefreshTokenRevocation,
    private readonly logger: Logger
  ) {}

  async execute(command: LogoutCommand, options: OperationOptions = {}): Promise<LogoutResult> {
    const { userId, refreshToken } = command;
    if (!refreshToken) {
      return { revoked: false };
    }

    let record: RefreshTokenRecord | null;
    try {
      record = await this.refreshTokens.findByDigest(digestToken(refreshToken));
    } catch (error) {
      this.logger.warn('Failed to look up refresh token during logout', { userId, error });
      return { revoked: false };
    }

    if (!record || record.userId !== userId) {
      return { revoked: false };
    }

    options.signal?.throwIfAborted();
    const outcome = await this.revocation.revoke(refreshToken, record);
    if (outcome === 'failed') {
      this.logger.error('Refresh token could not be revoked during logout', { userId, recordId: record.id });
      return { revoked: false };
    }

    return { revoked: outcome !== 'already_consumed' };
  }
}
