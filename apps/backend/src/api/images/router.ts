import { Router, type Request, type RequestHandler } from 'express';
import {
  type BatchProcessQuery,
  type BatchProcessResponse,
  type ErrorResponse,
  type ImageStatusParams,
  type ImageStatusResponse,
  type ListImagesQuery,
  type ListImagesResponse,
  type ProcessImageParams,
  type ProcessImageQuery,
  type ProcessImageResponse,
  BatchProcessQuerySchema,
  ImageStatusParamsSchema,
  ListImagesQuerySchema,
  ProcessImageParamsSchema,
  ProcessImageQuerySchema,
} from '@mediapress/api-contracts';
import type { ProcessingOrchestrator } from '../../services/processing/ProcessingOrchestrator.js';
import { apiErrorHandler } from '../middleware/apiErrorHandler.js';
import { validateRequest } from '../middleware/validation.js';
import { createImageHandlers } from './handlers.js';

type NoParams = Record<string, never>;

export function createImagesRouter(orchestrator: ProcessingOrchestrator, processingLimiter: RequestHandler) {
  const router = Router();
  const handlers = createImageHandlers(orchestrator);

  // Mounted on the paths rather than per route: the limiter is typed for untyped requests.
  router.use(['/process', '/batch-process'], processingLimiter);

  router.get<NoParams, ListImagesResponse | ErrorResponse, unknown, ListImagesQuery>(
    '/list',
    validateRequest<NoParams, ListImagesQuery, unknown, ListImagesResponse>({
      query: ListImagesQuerySchema,
    }),
    handlers.listImages
  );

  // `:key(*)` keeps slashes, so nested keys such as "2024/site-a/fox.jpg" match.
  router.post<ProcessImageParams, ProcessImageResponse | ErrorResponse, unknown, ProcessImageQuery>(
    '/process/:key(*)',
    validateRequest<ProcessImageParams, ProcessImageQuery, unknown, ProcessImageResponse>({
      params: ProcessImageParamsSchema,
      query: ProcessImageQuerySchema,
    }),
    handlers.processImage
  );

  router.post<NoParams, BatchProcessResponse | ErrorResponse, unknown, BatchProcessQuery>(
    '/batch-process',
    validateRequest<NoParams, BatchProcessQuery, unknown, BatchProcessResponse>({
      query: BatchProcessQuerySchema,
    }),
    handlers.batchProcess
  );

  router.get<ImageStatusParams, ImageStatusResponse | ErrorResponse>(
    '/status/:key(*)',
    validateRequest<ImageStatusParams, Request['query'], unknown, ImageStatusResponse>({
      params: ImageStatusParamsSchema,
    }),
    handlers.imageStatus
  );

  router.use(apiErrorHandler);

  return router;
}
