import path from 'path';
import type { AppConfig } from './config/env.js';
import { createObjectStorage, type ObjectStorage } from './storage/index.js';
import { CompressionService } from './services/compression/CompressionService.js';
import { ProcessingPool } from './services/processing/ProcessingPool.js';
import { TaskRegistry } from './services/processing/TaskRegistry.js';
import { ProcessingOrchestrator } from './services/processing/ProcessingOrchestrator.js';

export type Services = {
  storage: ObjectStorage;
  compression: CompressionService;
  pool: ProcessingPool;
  registry: TaskRegistry;
  orchestrator: ProcessingOrchestrator;
};

export function createCompressionService(config: Pick<AppConfig, 'ffmpeg' | 'video'>, outputDir: string) {
  return CompressionService.create({
    outputDir,
    ffmpegTimeoutMs: config.ffmpeg.timeoutMs,
    lowPriority: config.ffmpeg.lowPriority,
    video: {
      reencode: {
        codec: config.video.codec,
        preset: config.video.preset,
        crf: config.video.crf,
        audioBitrate: config.video.audioBitrate,
      },
      skipThresholdBytes: config.video.skipThresholdBytes,
    },
  });
}

/** Wires the service graph; `storage` can be swapped (tests pass an in-memory one). */
export function createServices(config: AppConfig, overrides: { storage?: ObjectStorage } = {}): Services {
  const storage = overrides.storage ?? createObjectStorage(config);
  const compression = createCompressionService(config, path.join(config.workDir, 'output'));
  const pool = new ProcessingPool({
    concurrency: config.processing.concurrency,
    maxQueue: config.processing.maxQueue,
    taskTimeoutMs: config.processing.taskTimeoutMs,
  });
  const registry = new TaskRegistry();
  const orchestrator = new ProcessingOrchestrator({
    storage,
    compression,
    pool,
    registry,
    settings: {
      sourceBucket: config.sourceBucket,
      destBucket: config.destBucket,
      workDir: path.join(config.workDir, 'tasks'),
      maxCompressFileSize: config.processing.maxCompressFileSize,
      minCompressionSaving: config.processing.minCompressionSaving,
      dedupeAcrossVariants: config.processing.dedupeAcrossVariants,
      video: { ...config.video },
    },
  });
  return { storage, compression, pool, registry, orchestrator };
}
