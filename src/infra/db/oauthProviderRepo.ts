import type { NewOAuthProvider, OAuthProvider } from '../../domain/auth/user.js';
import { DuplicateRecordError } from '../../application/errors.js';
import type { OAuthProviderStore } from '../../application/ports.js';
import { isUniqueViolation, type Queryable } from './pool.js';

interface OAuthProviderRow {
  id: string;
  user_id: string;
  provider: string;
  provider_user_id: string;
  email: string | null;
  created_at: Date;
}

const PROVIDER_COLUMNS = 'id, user_id, provider, provider_user_id, email, created_at';

function toProvider(row: OAuthProviderRow): OAuthProvider {
  return {
    id: row.id,
    userId: row.user_id,
    provider: row.provider,
    providerUserId: row.provider_user_id,
    email: row.email,
    createdAt: row.created_at,
  };
}

/**
 * Links between users and external identity providers. No login flow uses
 * these yet.
 */
export class OAuthProviderRepo implements OAuthProviderStore {
  constructor(private readonly db: Queryable) {}

  async create(link: NewOAuthProvider): Promise<OAuthProvider> {
    try {
      const result = await this.db.query<OAuthProviderRow>(
        `INSERT INTO oauth_providers (user_id, provider, provider_user_id, email)
         VALUES ($1, $2, $3, $4)
         RETURNING ${PROVIDER_COLUMNS}`,
        [link.userId, link.provider, link.providerUserId, link.email ?? null]
      );
      return toProvider(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateRecordError('oauth provider', 'OAuth provider connection already exists');
      }
      throw error;
    }
  }

  async findByProvider(provider: string, providerUserId: string): Promise<OAuthProvider | null> {
    const result = await this.db.query<OAuthProviderRow>(
      `SELECT ${PROVIDER_COLUMNS} FROM oauth_providers
       WHERE provider = $1 AND provider_user_id = $2`,
      [provider, providerUserId]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toProvider(result.rows[0]);
  }

  async findByUserId(userId: string): Promise<OAuthProvider[]> {
    const result = await this.db.query<OAuthProviderRow>(
      `SELECT ${PROVIDER_COLUMNS} FROM oauth_providers
       WHERE user_id = $1
       ORDER BY created_at DESC`,
      [userId]
    );
    return result.rows.map(toProvider);
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db.query('DELETE FROM oauth_providers WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
