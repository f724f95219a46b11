import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'crypto';
import { logger } from '../utils/logger.js';
import { runWithRequestContext, type RequestContextStore } from '../utils/asyncContext.js';

export type RequestLogOptions = {
  /** Share of ordinary requests logged, 0..1. */
  sampleRate: number;
  slowMs: number;
};

function shouldSample(rate: number): boolean {
  if (!Number.isFinite(rate)) return true;
  if (rate >= 1) return true;
  if (rate <= 0) return false;
  return Math.random() < rate;
}

function getOrCreateRequestId(req: Request): string {
  const incoming = req.headers['x-request-id'] ?? req.headers['x-correlation-id'];
  const fromHeader = Array.isArray(incoming) ? incoming[0] : incoming;
  if (fromHeader && fromHeader.trim().length > 0) return fromHeader.trim();
  return randomUUID();
}

export function createRequestContext(opts: RequestLogOptions) {
  return function requestContext(req: Request, res: Response, next: NextFunction) {
    const requestId = getOrCreateRequestId(req);
    res.locals.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);

    const store: RequestContextStore = { requestId, taskIds: [] };
    const start = process.hrtime.bigint();

    res.on('finish', () => {
      const durationMs = Math.round(Number(process.hrtime.bigint() - start) / 1_000_000);
      const status = res.statusCode;

      const base = {
        requestId,
        method: req.method,
        path: req.path,
        status,
        durationMs,
        ...(store.taskIds.length > 0 ? { taskIds: store.taskIds } : {}),
      };

      // Always log 5xx, and always log slow requests.
      if (status >= 500) {
        logger.error('http.request', base);
        return;
      }
      if (durationMs >= opts.slowMs) {
        logger.warn('http.slow', { ...base, slowMs: opts.slowMs });
        return;
      }

      if (shouldSample(opts.sampleRate)) {
        logger.info('http.request', { ...base, sampleRate: opts.sampleRate });
      }
    });

    runWithRequestContext(store, () => next());
  };
}
