import { Router, type CookieOptions, type Request, type Response } from 'express';
import { z } from 'zod';
import type { AuthService } from '../../../application/auth/authService.js';
import type { AuthResult } from '../../../application/auth/tokenIssuer.js';
import type { SlidingWindowRateLimiter } from '../../../application/rateLimit/slidingWindowRateLimiter.js';
import { InvalidInputError } from '../../../application/errors.js';
import type { ClientMetadata, Logger } from '../../../application/ports.js';
import type { UserProfile } from '../../../domain/auth/user.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { authMiddleware, requireUserId } from '../middleware/auth.js';
import { clientIp, rateLimit } from '../middleware/rateLimit.js';
import { requestSignal } from '../middleware/requestSignal.js';
import { validateBody } from '../middleware/validate.js';

/**
 * @openapi
 * /api/auth/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string, minLength: 8 }
 *     responses:
 *       201:
 *         description: User created; refresh token set as an httpOnly cookie
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/AuthResponse' }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       409:
 *         description: Email already exists
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       429:
 *         description: Too many requests
 *
 * /api/auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Login and receive an access token
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated; refresh token set as an httpOnly cookie
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/AuthResponse' }
 *       401:
 *         description: Invalid credentials
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       429:
 *         description: Too many requests
 *
 * /api/auth/refresh:
 *   post:
 *     tags: [Auth]
 *     summary: Rotate the refresh token cookie and receive a new access token
 *     responses:
 *       200:
 *         description: New token pair
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/AuthResponse' }
 *       400:
 *         description: No refresh token cookie
 *       401:
 *         description: Refresh token invalid, expired or already used
 *
 * /api/auth/logout:
 *   post:
 *     tags: [Auth]
 *     summary: Revoke the refresh token cookie
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: Logged out }
 *       401: { description: Unauthorized }
 *
 * /api/auth/me:
 *   get:
 *     tags: [Auth]
 *     summary: Current user profile
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: Profile
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/UserProfile' }
 *       401: { description: Unauthorized }
 */

export const REFRESH_COOKIE = 'refresh_token';

const registerBodySchema = z.object({
  email: z.string(),
  password: z.string(),
});

const loginBodySchema = z.object({
  email: z.string().min(1),
  password: z.string().min(1),
});

export interface AuthRoutesOptions {
  authService: AuthService;
  rateLimiter: SlidingWindowRateLimiter;
  rateLimit: { requests: number; windowMs: number };
  refreshCookie: { path: string; secure: boolean };
  logger: Logger;
}

export function toAuthResponse(result: AuthResult) {
  return {
    access_token: result.accessToken,
    token_type: result.tokenType,
    expires_in: result.expiresIn,
    user: { id: result.user.id, email: result.user.email },
  };
}

export function toProfileResponse(profile: UserProfile) {
  return {
    id: profile.id,
    email: profile.email,
    created_at: profile.createdAt.toISOString(),
    updated_at: profile.updatedAt.toISOString(),
    last_login_at: profile.lastLoginAt ? profile.lastLoginAt.toISOString() : null,
    is_email_verified: profile.isEmailVerified,
  };
}

function clientMetadata(req: Request): ClientMetadata {
  return { userAgent: req.get('user-agent'), ipAddress: clientIp(req) };
}

function readRefreshCookie(req: Request): string | undefined {
  const cookies: unknown = req.cookies;
  if (typeof cookies !== 'object' || cookies === null || !(REFRESH_COOKIE in cookies)) {
    return undefined;
  }
  const value: unknown = Reflect.get(cookies, REFRESH_COOKIE);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function createAuthRoutes(options: AuthRoutesOptions) {
  const { authService, rateLimiter, logger } = options;
  const router = Router();

  const cookieOptions: CookieOptions = {
    httpOnly: true,
    secure: options.refreshCookie.secure,
    sameSite: 'strict',
    path: options.refreshCookie.path,
  };

  const setRefreshCookie = (res: Response, result: AuthResult): void => {
    res.cookie(REFRESH_COOKIE, result.refreshToken, {
      ...cookieOptions,
      maxAge: result.refreshExpiresIn * 1000,
    });
  };

  const limitCredentials = (name: string) =>
    rateLimit(
      rateLimiter,
      { name, limit: options.rateLimit.requests, windowMs: options.rateLimit.windowMs },
      logger
    );

  router.post(
    '/register',
    limitCredentials('register'),
    validateBody(registerBodySchema),
    asyncHandler(async (req, res) => {
      const body = registerBodySchema.parse(req.body);
      const result = await authService.register(
        { ...body, client: clientMetadata(req) },
        { signal: requestSignal(res) }
      );
      setRefreshCookie(res, result);
      res.status(201).json(toAuthResponse(result));
    })
  );

  router.post(
    '/login',
    limitCredentials('login'),
    validateBody(loginBodySchema),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const result = await authService.login(
        { ...body, client: clientMetadata(req) },
        { signal: requestSignal(res) }
      );
      setRefreshCookie(res, result);
      res.status(200).json(toAuthResponse(result));
    })
  );

  router.post(
    '/refresh',
    asyncHandler(async (req, res) => {
      const refreshToken = readRefreshCookie(req);
      if (!refreshToken) {
        throw new InvalidInputError('Refresh token not found in cookie');
      }
      const result = await authService.refresh(
        { refreshToken, client: clientMetadata(req) },
        { signal: requestSignal(res) }
      );
      setRefreshCookie(res, result);
      res.status(200).json(toAuthResponse(result));
    })
  );

  router.post(
    '/logout',
    authMiddleware(authService),
    asyncHandler(async (req, res) => {
      await authService.logout(
        { userId: requireUserId(req), refreshToken: readRefreshCookie(req) },
        { signal: requestSignal(res) }
      );
      res.clearCookie(REFRESH_COOKIE, cookieOptions);
      res.status(200).json({ message: 'Logged out successfully' });
    })
  );

  router.get(
    '/me',
    authMiddleware(authService),
    asyncHandler(async (req, res) => {
      const profile = await authService.getProfile(requireUserId(req), { signal: requestSignal(res) });
      res.status(200).json(toProfileResponse(profile));
    })
  );

  return router;
}
