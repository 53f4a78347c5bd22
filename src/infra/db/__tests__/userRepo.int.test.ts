import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import type { Pool } from 'pg';
import { randomUUID } from 'crypto';
import { DuplicateRecordError, RecordNotFoundError } from '../../../application/errors.js';
import { migrate } from '../migrate.js';
import { createPool } from '../pool.js';
import { UserRepo } from '../userRepo.js';

const describeDb = process.env.DATABASE_URL ? describe : describe.skip;

describeDb('UserRepo', () => {
  let pool: Pool;
  let repo: UserRepo;

  beforeAll(async () => {
    pool = createPool(process.env.DATABASE_URL ?? '', console);
    await migrate(pool);
    repo = new UserRepo(pool);
  });

  afterEach(async () => {
    await pool.query("DELETE FROM users WHERE email LIKE '%@userrepo.test'");
  });

  afterAll(async () => {
    await pool.end();
  });

  it('should create an active, unverified user', async () => {
    const user = await repo.create({ email: 'a@userrepo.test', passwordHash: 'hash' });

    expect(user.email).toBe('a@userrepo.test');
    expect(user.isActive).toBe(true);
    expect(user.isEmailVerified).toBe(false);
    expect(user.lastLoginAt).toBeNull();
    expect(await repo.findById(user.id)).toEqual(user);
    expect(await repo.findByEmail('a@userrepo.test')).toEqual(user);
  });

  it('should return null for unknown users', async () => {
    expect(await repo.findById(randomUUID())).toBeNull();
    expect(await repo.findByEmail('missing@userrepo.test')).toBeNull();
  });

  it('should reject a duplicate email', async () => {
    await repo.create({ email: 'dup@userrepo.test', passwordHash: 'hash' });

    await expect(repo.create({ email: 'dup@userrepo.test', passwordHash: 'hash' })).rejects.toBeInstanceOf(
      DuplicateRecordError
    );
  });

  it('should record the last login', async () => {
    const user = await repo.create({ email: 'login@userrepo.test', passwordHash: 'hash' });
    const at = new Date('2026-02-01T10:00:00Z');

    await repo.updateLastLogin(user.id, at);

    expect((await repo.findById(user.id))?.lastLoginAt).toEqual(at);
  });

  it('should report an update of an unknown user', async () => {
    await expect(repo.updateLastLogin(randomUUID(), new Date())).rejects.toBeInstanceOf(RecordNotFoundError);
  });
});
