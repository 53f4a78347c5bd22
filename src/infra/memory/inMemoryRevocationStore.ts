import type { RevocationStore, ScoredAdmission } from '../../application/ports.js';

interface FlagEntry {
  kind: 'flag';
  expiresAt: number | null;
}

interface SortedEntry {
  kind: 'sorted';
  members: Map<string, number>;
  expiresAt: number | null;
}

type Entry = FlagEntry | SortedEntry;

/**
 * Single-process stand-in for the Redis revocation store. Expiry is
 * evaluated lazily against `Date.now()`, so fake timers drive it.
 */
export class InMemoryRevocationStore implements RevocationStore {
  private readonly entries = new Map<string, Entry>();

  async setWithTtl(key: string, ttlMs: number): Promise<void> {
    this.entries.set(key, { kind: 'flag', expiresAt: Date.now() + ttlMs });
  }

  async exists(key: string): Promise<boolean> {
    return this.live(key) !== undefined;
  }

  async removeScoredBelow(key: string, score: number): Promise<void> {
    const entry = this.live(key);
    if (entry?.kind === 'sorted') {
      this.trim(key, entry, score);
    }
  }

  async countScoredAbove(key: string, min: number): Promise<number> {
    const entry = this.live(key);
    if (entry?.kind !== 'sorted') {
      return 0;
    }
    let count = 0;
    for (const memberScore of entry.members.values()) {
      if (memberScore >= min) {
        count++;
      }
    }
    return count;
  }

  // No await between the trim and the add: callers on the same key see each other's members.
  async admitScored(
    key: string,
    admission: { minScore: number; score: number; member: string; limit: number; ttlMs: number }
  ): Promise<ScoredAdmission> {
    const existing = this.live(key);
    if (existing && existing.kind !== 'sorted') {
      throw new Error(`WRONGTYPE ${key} does not hold a sorted set`);
    }
    const entry: SortedEntry = existing ?? { kind: 'sorted', members: new Map(), expiresAt: null };
    this.trim(key, entry, admission.minScore);

    const admitted = entry.members.size < admission.limit;
    if (admitted) {
      entry.members.set(admission.member, admission.score);
      entry.expiresAt = Date.now() + admission.ttlMs;
      this.entries.set(key, entry);
    }

    const count = entry.members.size;
    return { admitted, count, lowestScore: count === 0 ? null : Math.min(...entry.members.values()) };
  }

  private trim(key: string, entry: SortedEntry, score: number): void {
    for (const [member, memberScore] of entry.members) {
      if (memberScore < score) {
        entry.members.delete(member);
      }
    }
    if (entry.members.size === 0) {
      this.entries.delete(key);
    }
  }

  private live(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (entry && entry.expiresAt !== null && entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}
