import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { Logger } from '../../../application/ports.js';
import { clientIp } from './rateLimit.js';

export function requestLogger(logger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const startedAt = Date.now();
    // Captured now: routers rewrite req.url while the request is inside them
    const { method, path } = req;

    res.on('finish', () => {
      logger.info('HTTP request', {
        method,
        path,
        status: res.statusCode,
        durationMs: Date.now() - startedAt,
        ip: clientIp(req),
      });
    });
    next();
  };
}
