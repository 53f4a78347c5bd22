import { storeCall } from '../errors.js';
import type { Logger, RefreshTokenStore } from '../ports.js';

export class PurgeExpiredTokensUseCase {
  constructor(
    private readonly refreshTokens: RefreshTokenStore,
    private readonly logger: Logger
  ) {}

  async execute(now = new Date()): Promise<number> {
    const removed = await storeCall('refreshTokens.deleteExpired', () => this.refreshTokens.deleteExpired(now));
    if (removed > 0) {
      this.logger.info(`Purged ${removed} expired refresh token(s)`);
    }
    return removed;
  }
}
