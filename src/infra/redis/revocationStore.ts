import type { Redis } from 'ioredis';
import type { RevocationStore, ScoredAdmission } from '../../application/ports.js';

// KEYS[1] set; ARGV: minScore, score, member, limit, ttlMs
const ADMIT_SCRIPT = `
redis.call('ZREMRANGEBYSCORE', KEYS[1], '-inf', '(' .. ARGV[1])
local count = redis.call('ZCARD', KEYS[1])
local admitted = 0
if count < tonumber(ARGV[4]) then
  redis.call('ZADD', KEYS[1], ARGV[2], ARGV[3])
  redis.call('PEXPIRE', KEYS[1], ARGV[5])
  count = count + 1
  admitted = 1
end
local lowest = redis.call('ZRANGE', KEYS[1], 0, 0, 'WITHSCORES')
return {admitted, count, lowest[2] or ''}
`;

/**
 * Revocation store over Redis. Every method is a single-key command or
 * script, so Redis serializes concurrent callers per key.
 */
export class RedisRevocationStore implements RevocationStore {
  constructor(private readonly redis: Redis) {}

  async setWithTtl(key: string, ttlMs: number): Promise<void> {
    await this.redis.set(key, '1', 'PX', ttlMs);
  }

  async exists(key: string): Promise<boolean> {
    return (await this.redis.exists(key)) > 0;
  }

  async removeScoredBelow(key: string, score: number): Promise<void> {
    await this.redis.zremrangebyscore(key, '-inf', `(${score}`);
  }

  async countScoredAbove(key: string, min: number): Promise<number> {
    return await this.redis.zcount(key, min, '+inf');
  }

  async admitScored(
    key: string,
    admission: { minScore: number; score: number; member: string; limit: number; ttlMs: number }
  ): Promise<ScoredAdmission> {
    const reply: unknown = await this.redis.eval(
      ADMIT_SCRIPT,
      1,
      key,
      admission.minScore,
      admission.score,
      admission.member,
      admission.limit,
      admission.ttlMs
    );
    if (!Array.isArray(reply) || reply.length !== 3) {
      throw new Error(`Unexpected admission reply for ${key}`);
    }
    const [admitted, count, lowest] = reply;
    if (typeof admitted !== 'number' || typeof count !== 'number' || typeof lowest !== 'string') {
      throw new Error(`Unexpected admission reply for ${key}`);
    }
    return { admitted: admitted === 1, count, lowestScore: lowest === '' ? null : Number(lowest) };
  }
}
