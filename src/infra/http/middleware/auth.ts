import type { Request, Response, NextFunction } from 'express';
import type { AuthService } from '../../../application/auth/authService.js';
import { UnauthorizedError } from '../../../application/errors.js';
import { requestSignal } from './requestSignal.js';

export interface AuthRequest extends Request {
  userId?: string;
}

const BEARER_PREFIX = 'Bearer ';

export function authMiddleware(authService: AuthService) {
  return (req: AuthRequest, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith(BEARER_PREFIX)) {
      next(new UnauthorizedError('Missing or invalid authorization header'));
      return;
    }

    const token = authHeader.substring(BEARER_PREFIX.length).trim();

    authService
      .validateAccess(token, { signal: requestSignal(res) })
      .then((claims) => {
        req.userId = claims.subjectId;
        next();
      })
      .catch(next);
  };
}

/**
 * Subject id set by {@link authMiddleware}; throws if the route was mounted
 * without it.
 */
export function requireUserId(req: AuthRequest): string {
  if (!req.userId) {
    throw new UnauthorizedError();
  }
  return req.userId;
}
