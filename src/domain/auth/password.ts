import { argon2id, hash, verify } from 'argon2';

export interface PasswordHasher {
  hash(plainPassword: string): Promise<string>;
  verify(plainPassword: string, digest: string): Promise<boolean>;
}

/**
 * Password hashing using Argon2id. `timeCost` is the configured cost factor.
 */
export class Password implements PasswordHasher {
  constructor(private readonly timeCost = 3) {}

  /**
   * Hash a plain text password.
   */
  async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword, { type: argon2id, timeCost: this.timeCost });
  }

  /**
   * Verify a plain password against a hash. A digest argon2 cannot parse
   * counts as a mismatch.
   */
  async verify(plainPassword: string, digest: string): Promise<boolean> {
    try {
      return await verify(digest, plainPassword);
    } catch {
      return false;
    }
  }
}
