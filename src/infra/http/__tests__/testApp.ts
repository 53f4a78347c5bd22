import type { Response } from 'supertest';
import { SlidingWindowRateLimiter } from '../../../application/rateLimit/slidingWindowRateLimiter.js';
import { createTestAuthService } from '../../../application/auth/__tests__/fixtures.js';
import { createApp, type HealthCheck } from '../app.js';

export interface TestAppOptions {
  requests?: number;
  secureCookie?: boolean;
  healthChecks?: HealthCheck[];
  healthTimeoutMs?: number;
  allowedOrigins?: string[];
}

export function createTestApp(options: TestAppOptions = {}) {
  const ctx = createTestAuthService();
  const app = createApp({
    authService: ctx.authService,
    rateLimiter: new SlidingWindowRateLimiter(ctx.revocations),
    rateLimit: { requests: options.requests ?? 100, windowMs: 60_000 },
    refreshCookie: { path: '/api/auth/refresh', secure: options.secureCookie ?? false },
    cors: {
      allowedOrigins: options.allowedOrigins ?? ['http://localhost:3000'],
      allowedMethods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    },
    healthChecks: options.healthChecks ?? [],
    healthTimeoutMs: options.healthTimeoutMs,
    logger: ctx.logger,
  });
  return { ...ctx, app };
}

export function setCookies(res: Response): string[] {
  const header: unknown = res.headers['set-cookie'];
  return Array.isArray(header) ? header.filter((c): c is string => typeof c === 'string') : [];
}

/** Raw value of the refresh_token cookie set by the response, if any. */
export function refreshCookieOf(res: Response): string | undefined {
  const cookie = setCookies(res).find((c) => c.startsWith('refresh_token='));
  return cookie?.slice('refresh_token='.length).split(';')[0];
}
