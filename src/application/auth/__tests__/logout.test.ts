import { describe, it, expect, beforeEach, vi } from 'vitest';
import { digestToken } from '../../../domain/auth/tokenDigest.js';
import { UnauthorizedError } from '../../errors.js';
import { TokenDenylist } from '../tokenDenylist.js';
import type { AuthResult } from '../tokenIssuer.js';
import { createTestAuthService } from './fixtures.js';

describe('logout', () => {
  let ctx: ReturnType<typeof createTestAuthService>;
  let issued: AuthResult;

  beforeEach(async () => {
    ctx = createTestAuthService();
    issued = await ctx.authService.register({ email: 'a@example.com', password: 'Passw0rd' });
  });

  it("should revoke the caller's refresh token", async () => {
    const result = await ctx.authService.logout({ userId: issued.user.id, refreshToken: issued.refreshToken });

    expect(result).toEqual({ revoked: true });
    expect(await ctx.refreshTokens.findByDigest(digestToken(issued.refreshToken))).toBeNull();
    expect(await ctx.revocations.exists(TokenDenylist.key(issued.refreshToken))).toBe(true);
    await expect(ctx.authService.refresh({ refreshToken: issued.refreshToken })).rejects.toBeInstanceOf(
      UnauthorizedError
    );
  });

  it('should do nothing without a refresh token', async () => {
    expect(await ctx.authService.logout({ userId: issued.user.id })).toEqual({ revoked: false });
    expect(ctx.refreshTokens.size).toBe(1);
  });

  it('should not revoke a token belonging to another user', async () => {
    const other = await ctx.authService.register({ email: 'b@example.com', password: 'Passw0rd' });

    const result = await ctx.authService.logout({ userId: other.user.id, refreshToken: issued.refreshToken });

    expect(result).toEqual({ revoked: false });
    expect(await ctx.refreshTokens.findByDigest(digestToken(issued.refreshToken))).not.toBeNull();
  });

  it('should treat an unknown token as a no-op', async () => {
    const result = await ctx.authService.logout({ userId: issued.user.id, refreshToken: 'not-a-token' });

    expect(result).toEqual({ revoked: false });
  });

  it('should report nothing revoked when logging out twice', async () => {
    await ctx.authService.logout({ userId: issued.user.id, refreshToken: issued.refreshToken });

    const second = await ctx.authService.logout({ userId: issued.user.id, refreshToken: issued.refreshToken });

    expect(second).toEqual({ revoked: false });
  });

  it('should log and succeed when the lookup fails', async () => {
    vi.spyOn(ctx.refreshTokens, 'findByDigest').mockRejectedValueOnce(new Error('connection refused'));

    const result = await ctx.authService.logout({ userId: issued.user.id, refreshToken: issued.refreshToken });

    expect(result).toEqual({ revoked: false });
    expect(ctx.logger.warn).toHaveBeenCalledWith(
      'Failed to look up refresh token during logout',
      expect.objectContaining({ userId: issued.user.id })
    );
  });

  it('should log and succeed when revocation fails entirely', async () => {
    vi.spyOn(ctx.revocations, 'setWithTtl').mockRejectedValueOnce(new Error('connection reset'));
    vi.spyOn(ctx.refreshTokens, 'deleteByDigest').mockRejectedValueOnce(new Error('write timeout'));

    const result = await ctx.authService.logout({ userId: issued.user.id, refreshToken: issued.refreshToken });

    expect(result).toEqual({ revoked: false });
    expect(ctx.logger.error).toHaveBeenCalledWith(
      'Refresh token could not be revoked during logout',
      expect.objectContaining({ userId: issued.user.id })
    );
  });
});
