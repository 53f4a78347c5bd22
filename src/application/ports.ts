import type {
  NewOAuthProvider,
  NewRefreshTokenRecord,
  NewUser,
  OAuthProvider,
  RefreshTokenRecord,
  User,
} from '../domain/auth/user.js';

export type Logger = Pick<Console, 'info' | 'warn' | 'error'>;

/**
 * Durable user records. Reads resolve to `null` when nothing matches;
 * `create` throws DuplicateRecordError on a taken email and
 * `updateLastLogin` throws RecordNotFoundError on an unknown id.
 */
export interface UserStore {
  create(user: NewUser): Promise<User>;
  findByEmail(email: string): Promise<User | null>;
  findById(id: string): Promise<User | null>;
  updateLastLogin(id: string, at: Date): Promise<void>;
}

export interface RefreshTokenStore {
  create(record: NewRefreshTokenRecord): Promise<RefreshTokenRecord>;
  findByDigest(digest: string): Promise<RefreshTokenRecord | null>;
  /** Resolves to true only for the caller whose delete removed the row. */
  deleteByDigest(digest: string): Promise<boolean>;
  /** Removes every record that expired before `now`; resolves to the count. */
  deleteExpired(now: Date): Promise<number>;
}

export interface OAuthProviderStore {
  create(link: NewOAuthProvider): Promise<OAuthProvider>;
  findByProvider(provider: string, providerUserId: string): Promise<OAuthProvider | null>;
  findByUserId(userId: string): Promise<OAuthProvider[]>;
  delete(id: string): Promise<boolean>;
}

export interface ScoredAdmission {
  admitted: boolean;
  /** Members left in the collection after the step. */
  count: number;
  lowestScore: number | null;
}

/**
 * Fast keyed store with TTLs and sorted collections. Scores are epoch
 * milliseconds wherever the callers in this codebase use them.
 */
export interface RevocationStore {
  setWithTtl(key: string, ttlMs: number): Promise<void>;
  exists(key: string): Promise<boolean>;
  /** Removes members scored strictly below `score`. */
  removeScoredBelow(key: string, score: number): Promise<void>;
  /** Counts members scored at or above `min`. */
  countScoredAbove(key: string, min: number): Promise<number>;
  /**
   * One atomic step: drop members scored below `minScore`, then add
   * `member` at `score` and reset the key TTL to `ttlMs` only while fewer
   * than `limit` members remain.
   */
  admitScored(
    key: string,
    admission: { minScore: number; score: number; member: string; limit: number; ttlMs: number }
  ): Promise<ScoredAdmission>;
}

export interface OperationOptions {
  signal?: AbortSignal;
}

export interface ClientMetadata {
  userAgent?: string;
  ipAddress?: string;
}
