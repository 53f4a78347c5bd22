import { randomUUID } from 'crypto';
import type { NewRefreshTokenRecord, RefreshTokenRecord } from '../../domain/auth/user.js';
import { DuplicateRecordError } from '../../application/errors.js';
import type { RefreshTokenStore } from '../../application/ports.js';

export class InMemoryRefreshTokenStore implements RefreshTokenStore {
  private readonly byDigest = new Map<string, RefreshTokenRecord>();

  get size(): number {
    return this.byDigest.size;
  }

  async create(input: NewRefreshTokenRecord): Promise<RefreshTokenRecord> {
    if (this.byDigest.has(input.tokenDigest)) {
      throw new DuplicateRecordError('refresh token');
    }
    const record: RefreshTokenRecord = {
      id: randomUUID(),
      userId: input.userId,
      tokenDigest: input.tokenDigest,
      expiresAt: input.expiresAt,
      createdAt: new Date(),
      deviceInfo: input.deviceInfo ?? null,
      ipAddress: input.ipAddress ?? null,
    };
    this.byDigest.set(record.tokenDigest, record);
    return record;
  }

  async findByDigest(digest: string): Promise<RefreshTokenRecord | null> {
    return this.byDigest.get(digest) ?? null;
  }

  async deleteByDigest(digest: string): Promise<boolean> {
    return this.byDigest.delete(digest);
  }

  async deleteExpired(now: Date): Promise<number> {
    let removed = 0;
    for (const [digest, record] of this.byDigest) {
      if (record.expiresAt.getTime() < now.getTime()) {
        this.byDigest.delete(digest);
        removed++;
      }
    }
    return removed;
  }
}
