import rateLimit from 'express-rate-limit';
import type { ErrorResponse } from '@mediapress/api-contracts';
import { logger } from '../utils/logger.js';

/** Per-IP limiter for the routes that enqueue work. */
export function createProcessingLimiter(maxPerMinute: number) {
  const body: ErrorResponse = {
    success: false,
    error: { code: 'TOO_MANY_REQUESTS', message: 'Too many requests, please try again later.' },
  };

  return rateLimit({
    windowMs: 60 * 1000,
    limit: maxPerMinute,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res, _next, options) => {
      logger.warn('security.rate_limit.blocked', {
        ip: req.ip,
        path: req.path,
        method: req.method,
      });
      res.status(options.statusCode).json(body);
    },
  });
}
