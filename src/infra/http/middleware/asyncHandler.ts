import type { NextFunction, RequestHandler, Response } from 'express';
import type { AuthRequest } from './auth.js';

/**
 * Wrap an async Express handler so it returns void (no-misused-promises)
 * and forwards errors to next(). Handlers see the request as an
 * {@link AuthRequest}; the fields stay unset on public routes.
 */
export function asyncHandler(
  fn: (req: AuthRequest, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    void fn(req, res, next).catch(next);
  };
}
