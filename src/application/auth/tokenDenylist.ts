import type { RevocationStore } from '../ports.js';

const MIN_TTL_MS = 1000;

/**
 * Denylist of raw token strings. An entry lives exactly as long as the
 * token it denies could still verify.
 */
export class TokenDenylist {
  constructor(private readonly store: RevocationStore) {}

  static key(token: string): string {
    return `blacklist:token:${token}`;
  }

  async add(token: string, remainingMs: number): Promise<void> {
    await this.store.setWithTtl(TokenDenylist.key(token), Math.max(MIN_TTL_MS, Math.ceil(remainingMs)));
  }

  async has(token: string): Promise<boolean> {
    return await this.store.exists(TokenDenylist.key(token));
  }
}
