import { describe, it, expect, afterEach, vi } from 'vitest';
import jwt from 'jsonwebtoken';
import { TokenCodec } from '../tokenCodec.js';
import { TokenError, type TokenErrorReason } from '../errors.js';

const SECRET = 'test-secret-that-is-at-least-32-chars';

function reasonOf(fn: () => unknown): TokenErrorReason | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof TokenError) {
      return error.reason;
    }
    throw error;
  }
  return undefined;
}

function base64url(value: object): string {
  return Buffer.from(JSON.stringify(value)).toString('base64url');
}

describe('TokenCodec', () => {
  const codec = new TokenCodec({
    secret: SECRET,
    accessTokenTtlSeconds: 900,
    refreshTokenTtlSeconds: 604800,
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should reject a secret shorter than 32 characters', () => {
    expect(
      () => new TokenCodec({ secret: 'short', accessTokenTtlSeconds: 900, refreshTokenTtlSeconds: 604800 })
    ).toThrow('Signing secret must be at least 32 characters long');
  });

  it('should round-trip access token claims', () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    const now = Math.floor(Date.now() / 1000);

    const claims = codec.verifyAccess(codec.issueAccess('user-1', 'a@example.com'));

    expect(claims).toEqual({
      subjectId: 'user-1',
      email: 'a@example.com',
      issuedAt: now,
      expiresAt: now + 900,
    });
  });

  it('should round-trip refresh token claims with a token id', () => {
    const claims = codec.verifyRefresh(codec.issueRefresh('user-1'));

    expect(claims.subjectId).toBe('user-1');
    expect(claims.tokenId).toMatch(/^[0-9a-f-]{36}$/);
    expect(claims.expiresAt - claims.issuedAt).toBe(604800);
  });

  it('should give refresh tokens issued in the same second distinct values', () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));

    expect(codec.issueRefresh('user-1')).not.toBe(codec.issueRefresh('user-1'));
  });

  it('should not accept a refresh token as an access token', () => {
    expect(reasonOf(() => codec.verifyAccess(codec.issueRefresh('user-1')))).toBe('wrong_type');
  });

  it('should not accept an access token as a refresh token', () => {
    expect(reasonOf(() => codec.verifyRefresh(codec.issueAccess('user-1', 'a@example.com')))).toBe('wrong_type');
  });

  it('should report expiry once the lifetime has passed', () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    const token = codec.issueAccess('user-1', 'a@example.com');

    vi.setSystemTime(new Date('2026-01-01T00:15:01Z'));

    expect(reasonOf(() => codec.verifyAccess(token))).toBe('expired');
  });

  it('should reject a token signed with another secret', () => {
    const other = new TokenCodec({
      secret: 'another-test-secret-of-32-characters',
      accessTokenTtlSeconds: 900,
      refreshTokenTtlSeconds: 604800,
    });

    expect(reasonOf(() => codec.verifyAccess(other.issueAccess('user-1', 'a@example.com')))).toBe(
      'invalid_signature'
    );
  });

  it('should reject an unsigned token', () => {
    const now = Math.floor(Date.now() / 1000);
    const token = `${base64url({ alg: 'none', typ: 'JWT' })}.${base64url({
      sub: 'user-1',
      email: 'a@example.com',
      iat: now,
      exp: now + 900,
    })}.`;

    expect(reasonOf(() => codec.verifyAccess(token))).toBe('unsupported_algorithm');
  });

  it('should reject a token signed with a different HMAC algorithm', () => {
    const token = jwt.sign({ sub: 'user-1', email: 'a@example.com' }, SECRET, {
      algorithm: 'HS512',
      expiresIn: 900,
    });

    expect(reasonOf(() => codec.verifyAccess(token))).toBe('unsupported_algorithm');
  });

  it('should report garbage as malformed', () => {
    expect(reasonOf(() => codec.verifyAccess('not-a-token'))).toBe('malformed');
  });

  it('should report missing claims as malformed', () => {
    const token = jwt.sign({ sub: 'user-1' }, SECRET, { algorithm: 'HS256', expiresIn: 900 });

    expect(reasonOf(() => codec.verifyAccess(token))).toBe('malformed');
  });
});
