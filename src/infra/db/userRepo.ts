import type { NewUser, User } from '../../domain/auth/user.js';
import { DuplicateRecordError, RecordNotFoundError } from '../../application/errors.js';
import type { UserStore } from '../../application/ports.js';
import { isUniqueViolation, type Queryable } from './pool.js';

interface UserRow {
  id: string;
  email: string;
  password_hash: string;
  is_active: boolean;
  is_email_verified: boolean;
  created_at: Date;
  updated_at: Date;
  last_login_at: Date | null;
}

const USER_COLUMNS =
  'id, email, password_hash, is_active, is_email_verified, created_at, updated_at, last_login_at';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.password_hash,
    isActive: row.is_active,
    isEmailVerified: row.is_email_verified,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    lastLoginAt: row.last_login_at,
  };
}

export class UserRepo implements UserStore {
  constructor(private readonly db: Queryable) {}

  async findByEmail(email: string): Promise<User | null> {
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`,
      [email]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toUser(result.rows[0]);
  }

  async findById(id: string): Promise<User | null> {
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toUser(result.rows[0]);
  }

  async create(user: NewUser): Promise<User> {
    try {
      const result = await this.db.query<UserRow>(
        `INSERT INTO users (email, password_hash)
         VALUES ($1, $2)
         RETURNING ${USER_COLUMNS}`,
        [user.email, user.passwordHash]
      );
      return toUser(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateRecordError('user', 'User with this email already exists');
      }
      throw error;
    }
  }

  async updateLastLogin(id: string, at: Date): Promise<void> {
    const result = await this.db.query(
      'UPDATE users SET last_login_at = $2 WHERE id = $1',
      [id, at]
    );

    if (result.rowCount === 0) {
      throw new RecordNotFoundError('user');
    }
  }
}
