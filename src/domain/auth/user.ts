/**
 * User identity record. `passwordHash` never leaves the application layer;
 * outward views go through {@link toProfile}.
 */
export interface User {
  readonly id: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly isActive: boolean;
  readonly isEmailVerified: boolean;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly lastLoginAt: Date | null;
}

export interface NewUser {
  email: string;
  passwordHash: string;
}

/**
 * Durable proof that a refresh token was issued and not yet consumed.
 * Only the SHA-256 digest of the raw token is stored.
 */
export interface RefreshTokenRecord {
  readonly id: string;
  readonly userId: string;
  readonly tokenDigest: string;
  readonly expiresAt: Date;
  readonly createdAt: Date;
  readonly deviceInfo: string | null;
  readonly ipAddress: string | null;
}

export interface NewRefreshTokenRecord {
  userId: string;
  tokenDigest: string;
  expiresAt: Date;
  deviceInfo?: string | null;
  ipAddress?: string | null;
}

// Linked external identity. Stored only; no flow reads it yet.
export interface OAuthProvider {
  readonly id: string;
  readonly userId: string;
  readonly provider: string;
  readonly providerUserId: string;
  readonly email: string | null;
  readonly createdAt: Date;
}

export interface NewOAuthProvider {
  userId: string;
  provider: string;
  providerUserId: string;
  email?: string | null;
}

export interface UserSummary {
  id: string;
  email: string;
}

export interface UserProfile {
  id: string;
  email: string;
  createdAt: Date;
  updatedAt: Date;
  lastLoginAt: Date | null;
  isEmailVerified: boolean;
}

export function toSummary(user: User): UserSummary {
  return { id: user.id, email: user.email };
}

export function toProfile(user: User): UserProfile {
  return {
    id: user.id,
    email: user.email,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
    lastLoginAt: user.lastLoginAt,
    isEmailVerified: user.isEmailVerified,
  };
}
