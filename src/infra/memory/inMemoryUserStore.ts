import { randomUUID } from 'crypto';
import type { NewUser, User } from '../../domain/auth/user.js';
import { DuplicateRecordError, RecordNotFoundError } from '../../application/errors.js';
import type { UserStore } from '../../application/ports.js';

export class InMemoryUserStore implements UserStore {
  private readonly byId = new Map<string, User>();

  async create(input: NewUser): Promise<User> {
    if (await this.findByEmail(input.email)) {
      throw new DuplicateRecordError('user');
    }
    const now = new Date();
    const user: User = {
      id: randomUUID(),
      email: input.email,
      passwordHash: input.passwordHash,
      isActive: true,
      isEmailVerified: false,
      createdAt: now,
      updatedAt: now,
      lastLoginAt: null,
    };
    this.byId.set(user.id, user);
    return user;
  }

  async findByEmail(email: string): Promise<User | null> {
    for (const user of this.byId.values()) {
      if (user.email === email) {
        return user;
      }
    }
    return null;
  }

  async findById(id: string): Promise<User | null> {
    return this.byId.get(id) ?? null;
  }

  async updateLastLogin(id: string, at: Date): Promise<void> {
    const user = this.byId.get(id);
    if (!user) {
      throw new RecordNotFoundError('user');
    }
    this.byId.set(id, { ...user, lastLoginAt: at, updatedAt: at });
  }

  /** Test helper: flips the active flag of an existing user. */
  setActive(id: string, isActive: boolean): void {
    const user = this.byId.get(id);
    if (user) {
      this.byId.set(id, { ...user, isActive });
    }
  }
}
