import type { Express, NextFunction, Request, Response } from 'express';
import type { ErrorResponse } from '@mediapress/api-contracts';
import type { ProcessingOrchestrator } from '../services/processing/ProcessingOrchestrator.js';
import { createImagesRouter } from '../api/images/router.js';
import { createCompressionRouter } from '../api/compression/router.js';
import { createProcessingLimiter } from '../middleware/rateLimit.js';
import { metricsRegistry } from '../utils/metrics.js';
import { logger, errorMessage } from '../utils/logger.js';

export const SERVICE_NAME = 'mediapress';
export const SERVICE_VERSION = '1.0.0';

export type RouteDeps = {
  orchestrator: ProcessingOrchestrator;
  rateLimitPerMinute: number;
};

export function setupRoutes(app: Express, deps: RouteDeps) {
  const { orchestrator } = deps;

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      service: SERVICE_NAME,
      status: 'running',
      version: SERVICE_VERSION,
      sourceBucket: orchestrator.sourceBucket,
      destBucket: orchestrator.destBucket,
      endpoints: {
        health: '/health',
        metrics: '/metrics',
        listImages: '/images/list',
        processImage: '/images/process/{key}',
        batchProcess: '/images/batch-process',
        imageStatus: '/images/status/{key}',
        compressionStats: '/compression/stats',
      },
    });
  });

  app.get('/health', async (_req: Request, res: Response, next: NextFunction) => {
    let storageOk: boolean;
    try {
      storageOk = await orchestrator.ping();
    } catch (error) {
      next(error);
      return;
    }
    if (!storageOk) {
      const body: ErrorResponse = {
        success: false,
        error: {
          code: 'STORAGE_UNAVAILABLE',
          message: 'Object storage is unavailable',
          details: { sourceBucket: orchestrator.sourceBucket, destBucket: orchestrator.destBucket },
        },
      };
      res.status(503).json(body);
      return;
    }
    res.json({
      status: 'healthy',
      storage: 'ok',
      sourceBucket: orchestrator.sourceBucket,
      destBucket: orchestrator.destBucket,
      pool: orchestrator.listCapabilities().pool,
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/metrics', async (_req: Request, res: Response) => {
    try {
      const registry = metricsRegistry();
      res.setHeader('Content-Type', registry.contentType);
      res.send(await registry.metrics());
    } catch (error) {
      logger.error('metrics.render_failed', { errorMessage: errorMessage(error) });
      res.status(500).end();
    }
  });

  app.use('/images', createImagesRouter(orchestrator, createProcessingLimiter(deps.rateLimitPerMinute)));
  app.use('/compression', createCompressionRouter(orchestrator));
}
