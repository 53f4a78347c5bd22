import type { Request, Response, NextFunction, RequestHandler } from 'express';

export interface CorsOptions {
  /** Exact origins, or `*` for any. */
  allowedOrigins: readonly string[];
  allowedMethods: readonly string[];
  allowedHeaders: readonly string[];
}

const PREFLIGHT_MAX_AGE_SECONDS = 86400;

/**
 * Credentialed CORS. An allowed origin is echoed back rather than `*`, since
 * browsers drop credentials on a wildcard.
 */
export function cors(options: CorsOptions): RequestHandler {
  const anyOrigin = options.allowedOrigins.includes('*');
  const methods = options.allowedMethods.join(', ');
  const headers = options.allowedHeaders.join(', ');

  const isAllowed = (origin: string): boolean => anyOrigin || options.allowedOrigins.includes(origin);

  return (req: Request, res: Response, next: NextFunction): void => {
    const origin = req.get('Origin');
    res.vary('Origin');

    if (origin !== undefined && isAllowed(origin)) {
      res.setHeader('Access-Control-Allow-Origin', origin);
      res.setHeader('Access-Control-Allow-Credentials', 'true');
      res.setHeader('Access-Control-Allow-Methods', methods);
      res.setHeader('Access-Control-Allow-Headers', headers);
    }

    if (req.method !== 'OPTIONS') {
      next();
      return;
    }
    if (origin !== undefined && !isAllowed(origin)) {
      res.status(403).end();
      return;
    }
    res.setHeader('Access-Control-Max-Age', String(PREFLIGHT_MAX_AGE_SECONDS));
    res.status(204).end();
  };
}
