import { vi } from 'vitest';
import type { PasswordHasher } from '../../../domain/auth/password.js';
import { TokenCodec } from '../../../domain/auth/tokenCodec.js';
import { InMemoryRefreshTokenStore } from '../../../infra/memory/inMemoryRefreshTokenStore.js';
import { InMemoryRevocationStore } from '../../../infra/memory/inMemoryRevocationStore.js';
import { InMemoryUserStore } from '../../../infra/memory/inMemoryUserStore.js';
import { createAuthService } from '../authService.js';

export const TEST_SECRET = 'test-secret-that-is-at-least-32-chars';
export const ACCESS_TTL_SECONDS = 900;
export const REFRESH_TTL_SECONDS = 7 * 24 * 60 * 60;

/**
 * Reversible stand-in for argon2 so service tests stay fast.
 */
export const fakePasswords: PasswordHasher = {
  hash: async (plain) => `hashed:${plain}`,
  verify: async (plain, digest) => digest === `hashed:${plain}`,
};

export function createTestLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function createTestCodec(): TokenCodec {
  return new TokenCodec({
    secret: TEST_SECRET,
    accessTokenTtlSeconds: ACCESS_TTL_SECONDS,
    refreshTokenTtlSeconds: REFRESH_TTL_SECONDS,
  });
}

export function createTestAuthService() {
  const users = new InMemoryUserStore();
  const refreshTokens = new InMemoryRefreshTokenStore();
  const revocations = new InMemoryRevocationStore();
  const logger = createTestLogger();
  const codec = createTestCodec();

  const authService = createAuthService({
    users,
    refreshTokens,
    revocations,
    codec,
    passwords: fakePasswords,
    logger,
  });

  return { authService, users, refreshTokens, revocations, logger, codec };
}
