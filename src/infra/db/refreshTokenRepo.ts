import type { NewRefreshTokenRecord, RefreshTokenRecord } from '../../domain/auth/user.js';
import { DuplicateRecordError } from '../../application/errors.js';
import type { RefreshTokenStore } from '../../application/ports.js';
import { isUniqueViolation, type Queryable } from './pool.js';

interface RefreshTokenRow {
  id: string;
  user_id: string;
  token_hash: string;
  expires_at: Date;
  created_at: Date;
  device_info: string | null;
  ip_address: string | null;
}

const TOKEN_COLUMNS = 'id, user_id, token_hash, expires_at, created_at, device_info, ip_address';

function toRecord(row: RefreshTokenRow): RefreshTokenRecord {
  return {
    id: row.id,
    userId: row.user_id,
    tokenDigest: row.token_hash,
    expiresAt: row.expires_at,
    createdAt: row.created_at,
    deviceInfo: row.device_info,
    ipAddress: row.ip_address,
  };
}

export class RefreshTokenRepo implements RefreshTokenStore {
  constructor(private readonly db: Queryable) {}

  async create(record: NewRefreshTokenRecord): Promise<RefreshTokenRecord> {
    try {
      const result = await this.db.query<RefreshTokenRow>(
        `INSERT INTO refresh_tokens (user_id, token_hash, expires_at, device_info, ip_address)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING ${TOKEN_COLUMNS}`,
        [record.userId, record.tokenDigest, record.expiresAt, record.deviceInfo ?? null, record.ipAddress ?? null]
      );
      return toRecord(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateRecordError('refresh token', 'Token with this hash already exists');
      }
      throw error;
    }
  }

  async findByDigest(digest: string): Promise<RefreshTokenRecord | null> {
    const result = await this.db.query<RefreshTokenRow>(
      `SELECT ${TOKEN_COLUMNS} FROM refresh_tokens WHERE token_hash = $1`,
      [digest]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toRecord(result.rows[0]);
  }

  async deleteByDigest(digest: string): Promise<boolean> {
    const result = await this.db.query('DELETE FROM refresh_tokens WHERE token_hash = $1', [digest]);
    return (result.rowCount ?? 0) > 0;
  }

  async deleteExpired(now: Date): Promise<number> {
    const result = await this.db.query('DELETE FROM refresh_tokens WHERE expires_at < $1', [now]);
    return result.rowCount ?? 0;
  }
}
