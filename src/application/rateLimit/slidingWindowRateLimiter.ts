import { randomUUID } from 'crypto';
import type { RevocationStore } from '../ports.js';

// Extra TTL so an abandoned key outlives its newest entry before expiring
const KEY_TTL_MARGIN_MS = 60 * 1000;

export interface RateLimitDecision {
  allowed: boolean;
  /** Milliseconds until the oldest entry leaves the window; 0 when allowed. */
  retryAfterMs: number;
}

/**
 * Sliding-window-log limiter. Each admitted request is a member of the
 * sorted set `ratelimit:<key>` scored by its admission time in epoch ms.
 */
export class SlidingWindowRateLimiter {
  constructor(private readonly store: RevocationStore) {}

  static key(clientKey: string): string {
    return `ratelimit:${clientKey}`;
  }

  /**
   * Trims, counts and records in one store step, so concurrent calls for the
   * same key never admit more than `limit` requests per window.
   */
  async allow(clientKey: string, limit: number, windowMs: number): Promise<RateLimitDecision> {
    const now = Date.now();
    const admission = await this.store.admitScored(SlidingWindowRateLimiter.key(clientKey), {
      minScore: now - windowMs,
      score: now,
      member: `${now}-${randomUUID()}`,
      limit,
      ttlMs: windowMs + KEY_TTL_MARGIN_MS,
    });

    if (admission.admitted) {
      return { allowed: true, retryAfterMs: 0 };
    }
    const oldest = admission.lowestScore;
    const retryAfterMs = oldest === null ? windowMs : Math.max(0, windowMs - (now - oldest));
    return { allowed: false, retryAfterMs };
  }

  /**
   * Requests still admissible in the current window. Trims expired entries
   * but records nothing.
   */
  async getRemainingRequests(clientKey: string, limit: number, windowMs: number): Promise<number> {
    const count = await this.countInWindow(SlidingWindowRateLimiter.key(clientKey), Date.now(), windowMs);
    return Math.max(0, limit - count);
  }

  private async countInWindow(key: string, now: number, windowMs: number): Promise<number> {
    const windowStart = now - windowMs;
    await this.store.removeScoredBelow(key, windowStart);
    return await this.store.countScoredAbove(key, windowStart);
  }
}
