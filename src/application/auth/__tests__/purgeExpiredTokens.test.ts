import { describe, it, expect, beforeEach, vi } from 'vitest';
import { InMemoryRefreshTokenStore } from '../../../infra/memory/inMemoryRefreshTokenStore.js';
import { UnavailableError } from '../../errors.js';
import { PurgeExpiredTokensUseCase } from '../purgeExpiredTokens.js';
import { createTestLogger } from './fixtures.js';

describe('PurgeExpiredTokensUseCase', () => {
  let refreshTokens: InMemoryRefreshTokenStore;
  let logger: ReturnType<typeof createTestLogger>;
  let useCase: PurgeExpiredTokensUseCase;

  beforeEach(async () => {
    refreshTokens = new InMemoryRefreshTokenStore();
    logger = createTestLogger();
    useCase = new PurgeExpiredTokensUseCase(refreshTokens, logger);

    await refreshTokens.create({ userId: 'u1', tokenDigest: 'd1', expiresAt: new Date('2026-01-01T00:00:00Z') });
    await refreshTokens.create({ userId: 'u1', tokenDigest: 'd2', expiresAt: new Date('2026-01-02T00:00:00Z') });
    await refreshTokens.create({ userId: 'u2', tokenDigest: 'd3', expiresAt: new Date('2026-02-01T00:00:00Z') });
  });

  it('should remove only records that expired before now', async () => {
    const removed = await useCase.execute(new Date('2026-01-02T00:00:00Z'));

    expect(removed).toBe(1);
    expect(await refreshTokens.findByDigest('d1')).toBeNull();
    expect(await refreshTokens.findByDigest('d2')).not.toBeNull();
    expect(logger.info).toHaveBeenCalledWith('Purged 1 expired refresh token(s)');
  });

  it('should stay quiet when nothing expired', async () => {
    expect(await useCase.execute(new Date('2025-12-31T00:00:00Z'))).toBe(0);
    expect(logger.info).not.toHaveBeenCalled();
  });

  it('should report a store outage as unavailable', async () => {
    vi.spyOn(refreshTokens, 'deleteExpired').mockRejectedValueOnce(new Error('connection refused'));

    await expect(useCase.execute()).rejects.toBeInstanceOf(UnavailableError);
  });
});
