import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { SlidingWindowRateLimiter } from '../../../application/rateLimit/slidingWindowRateLimiter.js';
import { RateLimitedError } from '../../../application/errors.js';
import type { Logger } from '../../../application/ports.js';

export interface RateLimitOptions {
  /** Namespaces the counter, e.g. `login`. */
  name: string;
  limit: number;
  windowMs: number;
  keyGenerator?: (req: Request) => string;
}

export function clientIp(req: Request): string {
  return req.ip || req.socket.remoteAddress || 'unknown';
}

/**
 * Admission control for sensitive endpoints. A limiter outage lets the
 * request through and logs a warning.
 */
export function rateLimit(
  limiter: SlidingWindowRateLimiter,
  options: RateLimitOptions,
  logger: Logger
): RequestHandler {
  const { name, limit, windowMs, keyGenerator = clientIp } = options;

  return (req: Request, res: Response, next: NextFunction): void => {
    const key = `${name}:${keyGenerator(req)}`;

    const check = async (): Promise<void> => {
      const decision = await limiter.allow(key, limit, windowMs);
      const remaining = await limiter.getRemainingRequests(key, limit, windowMs);

      res.setHeader('X-RateLimit-Limit', String(limit));
      res.setHeader('X-RateLimit-Remaining', String(remaining));

      if (!decision.allowed) {
        throw new RateLimitedError(Math.max(1, Math.ceil(decision.retryAfterMs / 1000)));
      }
    };

    check().then(
      () => next(),
      (error: unknown) => {
        if (error instanceof RateLimitedError) {
          next(error);
          return;
        }
        logger.warn(`Rate limiter unavailable for ${name}, allowing request`, error);
        next();
      }
    );
  };
}
