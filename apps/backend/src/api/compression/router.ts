import { Router, type Request, type Response, type NextFunction } from 'express';
import type { CompressionStatsResponse } from '@mediapress/api-contracts';
import type { ProcessingOrchestrator } from '../../services/processing/ProcessingOrchestrator.js';
import { apiErrorHandler } from '../middleware/apiErrorHandler.js';

export function createCompressionRouter(orchestrator: ProcessingOrchestrator) {
  const router = Router();

  router.get('/stats', (_req: Request, res: Response<CompressionStatsResponse>, next: NextFunction) => {
    try {
      const response: CompressionStatsResponse = { success: true, data: orchestrator.listCapabilities() };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  router.use(apiErrorHandler);

  return router;
}
