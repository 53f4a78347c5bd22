import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ApplicationError, RateLimitedError, type ErrorCategory } from '../../../application/errors.js';
import type { Logger } from '../../../application/ports.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  error: ErrorCategory | 'Internal';
  message: string;
  details?: object;
}

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
  InvalidInput: 400,
  Unauthorized: 401,
  Conflict: 409,
  RateLimited: 429,
  Unavailable: 503,
};

export function createErrorHandler(logger: Logger) {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof ZodError) {
      const response: ErrorResponse = {
        error: 'InvalidInput',
        message: 'Validation failed',
        details: {
          issues: err.errors.map((e) => ({
            path: e.path.join('.'),
            message: e.message,
          })),
        },
      };
      res.status(400).json(response);
      return;
    }

    if (err instanceof ApplicationError) {
      const status = STATUS_BY_CATEGORY[err.category];
      if (status >= 500) {
        logger.error('Request failed:', err);
      }
      if (err instanceof RateLimitedError) {
        res.setHeader('Retry-After', String(err.retryAfterSeconds));
      }
      const response: ErrorResponse = {
        error: err.category,
        // Store error text stays in the logs
        message: status >= 500 ? 'Service temporarily unavailable' : err.message,
      };
      res.status(status).json(response);
      return;
    }

    // Body parser failures carry their own 4xx status
    if (isClientError(err)) {
      const response: ErrorResponse = { error: 'InvalidInput', message: 'Malformed request body' };
      res.status(400).json(response);
      return;
    }

    logger.error('Unhandled error:', err);
    const response: ErrorResponse = {
      error: 'Internal',
      message: 'Internal server error',
    };
    res.status(500).json(response);
  };
}

function isClientError(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  );
}
