import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { recordHttpRequest } from '../utils/metrics.js';

// Health checks and scrapes would dominate the histogram otherwise.
const DEFAULT_SKIP_PATHS = ['/metrics', '/health'];

export function resolveRouteLabel(req: Request): string {
  const routePath: unknown = req.route?.path;
  const baseUrl = req.baseUrl || '';
  if (typeof routePath === 'string') return `${baseUrl}${routePath}` || 'unknown';
  if (baseUrl) return baseUrl;
  return 'unmatched';
}

export function createMetricsMiddleware(opts: { skipPaths?: string[] } = {}): RequestHandler {
  const skip = new Set(opts.skipPaths ?? DEFAULT_SKIP_PATHS);

  return (req: Request, res: Response, next: NextFunction) => {
    if (skip.has(req.path)) return next();
    const start = process.hrtime.bigint();

    res.on('finish', () => {
      recordHttpRequest({
        method: req.method,
        route: resolveRouteLabel(req),
        status: res.statusCode,
        durationSeconds: Number(process.hrtime.bigint() - start) / 1_000_000_000,
      });
    });

    next();
  };
}
