import type { Request, Response, NextFunction } from 'express';
import type {
  BatchProcessQuery,
  BatchProcessResponse,
  ImageStatusParams,
  ImageStatusResponse,
  ListImagesQuery,
  ListImagesResponse,
  ProcessImageParams,
  ProcessImageQuery,
  ProcessImageResponse,
} from '@mediapress/api-contracts';
import type { ProcessingOrchestrator } from '../../services/processing/ProcessingOrchestrator.js';

type NoParams = Record<string, never>;

export function createImageHandlers(orchestrator: ProcessingOrchestrator) {
  async function listImages(
    req: Request<NoParams, ListImagesResponse, unknown, ListImagesQuery>,
    res: Response<ListImagesResponse>,
    next: NextFunction
  ) {
    try {
      const { maxFiles, fileType } = req.query;
      const files = await orchestrator.listImages(maxFiles, fileType);

      const response: ListImagesResponse = {
        success: true,
        data: {
          bucket: orchestrator.sourceBucket,
          totalFiles: files.length,
          maxRequested: maxFiles,
          fileTypeFilter: fileType ?? null,
          files,
        },
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  }

  async function processImage(
    req: Request<ProcessImageParams, ProcessImageResponse, unknown, ProcessImageQuery>,
    res: Response<ProcessImageResponse>,
    next: NextFunction
  ) {
    try {
      const { key } = req.params;
      const { compress, quality } = req.query;
      const result = await orchestrator.startProcessing(key, compress, quality);

      const response: ProcessImageResponse = {
        success: true,
        data: {
          sourceKey: result.sourceKey,
          destKey: result.destKey,
          action: result.action,
          compressed: result.compressed,
          quality: result.tier,
          taskId: result.taskId,
          reason: result.reason,
        },
      };
      res.status(result.action === 'queued' ? 202 : 200).json(response);
    } catch (error) {
      next(error);
    }
  }

  async function batchProcess(
    req: Request<NoParams, BatchProcessResponse, unknown, BatchProcessQuery>,
    res: Response<BatchProcessResponse>,
    next: NextFunction
  ) {
    try {
      const { maxFiles, fileType, compress, quality } = req.query;
      const batch = await orchestrator.startBatch({ maxFiles, extension: fileType, compress, tier: quality });

      const response: BatchProcessResponse = {
        success: true,
        data: {
          filesFound: batch.found,
          filesQueued: batch.queued,
          filesAlreadyProcessed: batch.alreadyProcessed,
          filesRejected: batch.rejected,
          compress,
          quality,
        },
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  }

  async function imageStatus(
    req: Request<ImageStatusParams, ImageStatusResponse>,
    res: Response<ImageStatusResponse>,
    next: NextFunction
  ) {
    try {
      const status = await orchestrator.getStatus(req.params.key);
      const response: ImageStatusResponse = { success: true, data: status };
      res.json(response);
    } catch (error) {
      next(error);
    }
  }

  return { listImages, processImage, batchProcess, imageStatus };
}
