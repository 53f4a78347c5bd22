import express from 'express';
import cookieParser from 'cookie-parser';
import type { AuthService } from '../../application/auth/authService.js';
import type { SlidingWindowRateLimiter } from '../../application/rateLimit/slidingWindowRateLimiter.js';
import type { Logger } from '../../application/ports.js';
import { cors, type CorsOptions } from './middleware/cors.js';
import { createErrorHandler, type ErrorResponse } from './middleware/errorHandler.js';
import { requestLogger } from './middleware/requestLogger.js';
import { createAuthRoutes } from './routes/auth.js';
import { createSwaggerRoutes } from './routes/swagger.js';

export interface HealthCheck {
  name: string;
  check: () => Promise<unknown>;
}

export interface AppDeps {
  authService: AuthService;
  rateLimiter: SlidingWindowRateLimiter;
  rateLimit: { requests: number; windowMs: number };
  refreshCookie: { path: string; secure: boolean };
  cors: CorsOptions;
  healthChecks: HealthCheck[];
  logger: Logger;
  /** Passed to Express `trust proxy`; leave unset when not behind a proxy. */
  trustProxy?: boolean;
  healthTimeoutMs?: number;
}

/**
 * Helper to add timeout to a promise.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let id: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    id = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(id));
}

export function createApp(deps: AppDeps) {
  const { logger, healthChecks, healthTimeoutMs = 2000 } = deps;
  const app = express();

  if (deps.trustProxy !== undefined) {
    app.set('trust proxy', deps.trustProxy);
  }

  app.use(requestLogger(logger));
  app.use(cors(deps.cors));
  app.use(express.json());
  app.use(cookieParser());

  // Health check endpoint (no auth required)
  app.get('/healthz', (_req, res) => {
    void Promise.allSettled(
      healthChecks.map((h) => withTimeout(h.check(), healthTimeoutMs))
    ).then((results) => {
      const failed = healthChecks.filter((_, i) => results[i].status === 'rejected').map((h) => h.name);
      if (failed.length === 0) {
        res.status(200).json({ status: 'ok' });
        return;
      }
      logger.warn(`Health check failed: ${failed.join(', ')}`);
      const response: ErrorResponse = {
        error: 'Unavailable',
        message: 'Service temporarily unavailable',
        details: { failed },
      };
      res.status(503).json(response);
    });
  });

  app.use(createSwaggerRoutes());

  app.use(
    '/api/auth',
    createAuthRoutes({
      authService: deps.authService,
      rateLimiter: deps.rateLimiter,
      rateLimit: deps.rateLimit,
      refreshCookie: deps.refreshCookie,
      logger,
    })
  );

  // Error handler (must be last)
  app.use(createErrorHandler(logger));

  return app;
}
