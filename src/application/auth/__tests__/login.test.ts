import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { digestToken } from '../../../domain/auth/tokenDigest.js';
import { UnauthorizedError, UnavailableError } from '../../errors.js';
import { INVALID_CREDENTIALS } from '../login.js';
import { createTestAuthService } from './fixtures.js';

describe('login', () => {
  let ctx: ReturnType<typeof createTestAuthService>;
  let userId: string;

  beforeEach(async () => {
    ctx = createTestAuthService();
    const registered = await ctx.authService.register({ email: 'a@example.com', password: 'Passw0rd' });
    userId = registered.user.id;
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should issue a new pair and record the login time', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-03-01T12:00:00Z'));

    const result = await ctx.authService.login({ email: 'a@example.com', password: 'Passw0rd' });

    expect(result.user).toEqual({ id: userId, email: 'a@example.com' });
    expect(await ctx.refreshTokens.findByDigest(digestToken(result.refreshToken))).not.toBeNull();
    expect(ctx.refreshTokens.size).toBe(2);
    expect((await ctx.users.findById(userId))?.lastLoginAt).toEqual(new Date('2026-03-01T12:00:00Z'));
  });

  it('should match the email case-insensitively', async () => {
    const result = await ctx.authService.login({ email: '  A@Example.COM', password: 'Passw0rd' });

    expect(result.user.id).toBe(userId);
  });

  it('should reject a wrong password', async () => {
    await expect(ctx.authService.login({ email: 'a@example.com', password: 'Wrong1234' })).rejects.toThrow(
      new UnauthorizedError(INVALID_CREDENTIALS)
    );
  });

  it('should reject an unknown email with the same message', async () => {
    await expect(ctx.authService.login({ email: 'b@example.com', password: 'Passw0rd' })).rejects.toThrow(
      new UnauthorizedError(INVALID_CREDENTIALS)
    );
  });

  it('should reject an inactive user with the same message', async () => {
    ctx.users.setActive(userId, false);

    await expect(ctx.authService.login({ email: 'a@example.com', password: 'Passw0rd' })).rejects.toThrow(
      new UnauthorizedError(INVALID_CREDENTIALS)
    );
  });

  it('should still log in when the last-login update fails', async () => {
    vi.spyOn(ctx.users, 'updateLastLogin').mockRejectedValueOnce(new Error('write timeout'));

    const result = await ctx.authService.login({ email: 'a@example.com', password: 'Passw0rd' });

    expect(result.user.id).toBe(userId);
    expect(ctx.logger.warn).toHaveBeenCalledWith('Failed to update last login', expect.objectContaining({ userId }));
  });

  it('should report a user store outage as unavailable', async () => {
    vi.spyOn(ctx.users, 'findByEmail').mockRejectedValueOnce(new Error('connection refused'));

    await expect(
      ctx.authService.login({ email: 'a@example.com', password: 'Passw0rd' })
    ).rejects.toBeInstanceOf(UnavailableError);
  });

  it('should report a refresh store outage as unavailable and return no pair', async () => {
    vi.spyOn(ctx.refreshTokens, 'create').mockRejectedValueOnce(new Error('connection refused'));

    await expect(
      ctx.authService.login({ email: 'a@example.com', password: 'Passw0rd' })
    ).rejects.toBeInstanceOf(UnavailableError);
    expect(ctx.refreshTokens.size).toBe(1);
  });

  it('should not touch the user when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      ctx.authService.login({ email: 'a@example.com', password: 'Passw0rd' }, { signal: controller.signal })
    ).rejects.toMatchObject({ name: 'AbortError' });
    expect((await ctx.users.findById(userId))?.lastLoginAt).toBeNull();
    expect(ctx.refreshTokens.size).toBe(1);
  });
});
