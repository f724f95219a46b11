import fs from 'fs';
import path from 'path';
import {
  CompressionMethodSchema,
  ObjectKeySchema,
  type CompressionOutcomeDto,
  type ProcessedVariantInfo,
  type ProcessingAction,
  type QualityPreset,
  type QualityTier,
  type TaskSummary,
} from '@mediapress/api-contracts';
import type { ObjectStorage, MediaFile } from '../../storage/types.js';
import { AppError } from '../../shared/errors.js';
import { logger, errorMessage } from '../../utils/logger.js';
import { recordProcessingTask } from '../../utils/metrics.js';
import { getRequestContext } from '../../utils/asyncContext.js';
import type { CompressionService, SupportedExtensions } from '../compression/CompressionService.js';
import { calculateCompressionRatio, getFileSize, roundRatio } from '../compression/fileUtils.js';
import { buildCompressionSettings, DEFAULT_TIER, listQualityPresets, parseQualityTier } from '../compression/settings.js';
import { allDestinationKeys, destinationKey } from './destinationKeys.js';
import type { PoolStats, ProcessingPool } from './ProcessingPool.js';
import { toTaskSummary, type TaskRecord, type TaskRegistry } from './TaskRegistry.js';

export type ProcessingResult = {
  sourceKey: string;
  destKey: string;
  action: ProcessingAction;
  compressed: boolean;
  tier: QualityTier;
  taskId: string | null;
  reason: string | null;
};

export type BatchResult = {
  found: number;
  queued: number;
  alreadyProcessed: number;
  rejected: number;
  results: ProcessingResult[];
};

export type ImageStatus = {
  imageKey: string;
  sourceExists: boolean;
  sourceSize: number | null;
  processed: boolean;
  processedVariants: ProcessedVariantInfo[];
  compressionRatio: number | null;
  task: TaskSummary | null;
};

export type VideoSettingsInfo = {
  codec: string;
  preset: string;
  crf: number;
  audioBitrate: string;
  skipThresholdBytes: number;
};

export type Capabilities = {
  supportedExtensions: SupportedExtensions;
  tiers: QualityPreset[];
  defaultTier: QualityTier;
  methods: Array<CompressionOutcomeDto['method']>;
  video: VideoSettingsInfo;
  pool: PoolStats;
};

export type OrchestratorSettings = {
  sourceBucket: string;
  destBucket: string;
  workDir: string;
  maxCompressFileSize: number;
  minCompressionSaving: number;
  dedupeAcrossVariants: boolean;
  video: VideoSettingsInfo;
};

export type ProcessingOrchestratorDeps = {
  storage: ObjectStorage;
  compression: CompressionService;
  pool: ProcessingPool;
  registry: TaskRegistry;
  settings: OrchestratorSettings;
};

type PreparedUpload = {
  uploadPath: string;
  /** Compressor output, when one was produced; removed at cleanup. */
  derivedPath: string | null;
  outcome?: CompressionOutcomeDto;
};

function parseObjectKey(key: string): string {
  const parsed = ObjectKeySchema.safeParse(key);
  if (!parsed.success) {
    throw new AppError('VALIDATION_ERROR', 'Invalid object key', {
      details: { key, issues: parsed.error.issues.map((i) => i.message) },
    });
  }
  return parsed.data;
}

function abortMessage(signal: AbortSignal): string {
  return signal.reason instanceof Error ? signal.reason.message : 'aborted';
}

/**
 * Admits per-key work (download, optional compression, upload, cleanup) onto the pool.
 * A destination key is never admitted while it exists or is already in flight.
 */
export class ProcessingOrchestrator {
  private readonly storage: ObjectStorage;
  private readonly compression: CompressionService;
  private readonly pool: ProcessingPool;
  private readonly registry: TaskRegistry;
  private readonly settings: OrchestratorSettings;
  /** destKey -> task id */
  private readonly inFlight = new Map<string, string>();
  /** Bumped whenever a task leaves `inFlight`. */
  private settledTasks = 0;

  constructor(deps: ProcessingOrchestratorDeps) {
    this.storage = deps.storage;
    this.compression = deps.compression;
    this.pool = deps.pool;
    this.registry = deps.registry;
    this.settings = deps.settings;
  }

  get sourceBucket(): string {
    return this.settings.sourceBucket;
  }

  get destBucket(): string {
    return this.settings.destBucket;
  }

  async startProcessing(key: string, compress: boolean, tier: QualityTier): Promise<ProcessingResult> {
    const sourceKey = parseObjectKey(key);
    const quality = parseQualityTier(tier);

    if (!(await this.storage.exists(this.settings.sourceBucket, sourceKey))) {
      throw new AppError('NOT_FOUND', `Image not found: ${sourceKey}`, { details: { key: sourceKey } });
    }
    return this.admit(sourceKey, compress, quality);
  }

  async startBatch(params: {
    maxFiles: number;
    extension?: string;
    compress: boolean;
    tier: QualityTier;
  }): Promise<BatchResult> {
    const quality = parseQualityTier(params.tier);
    const files = await this.storage.list(this.settings.sourceBucket, params.maxFiles, params.extension);

    const results: ProcessingResult[] = [];
    const seen = new Set<string>();
    for (const file of files) {
      if (seen.has(file.key)) continue;
      seen.add(file.key);
      results.push(await this.admit(file.key, params.compress, quality));
    }

    const batch: BatchResult = {
      found: files.length,
      queued: results.filter((r) => r.action === 'queued').length,
      alreadyProcessed: results.filter((r) => r.action === 'skipped').length,
      rejected: results.filter((r) => r.action === 'failed').length,
      results,
    };
    logger.info('processing.batch.admitted', {
      found: batch.found,
      queued: batch.queued,
      alreadyProcessed: batch.alreadyProcessed,
      rejected: batch.rejected,
      compress: params.compress,
      tier: quality,
    });
    return batch;
  }

  async getStatus(key: string): Promise<ImageStatus> {
    const imageKey = parseObjectKey(key);
    const sourceSize = await this.storage.size(this.settings.sourceBucket, imageKey);
    if (sourceSize === null) {
      throw new AppError('NOT_FOUND', 'Image not found in source bucket', { details: { key: imageKey } });
    }

    const processedVariants: ProcessedVariantInfo[] = [];
    for (const candidate of allDestinationKeys(imageKey)) {
      const size = await this.storage.size(this.settings.destBucket, candidate.key);
      if (size !== null) processedVariants.push({ variant: candidate.variant, key: candidate.key, size });
    }

    const compressed = processedVariants.find((v) => v.variant === 'compressed');
    const compressionRatio =
      compressed?.size && sourceSize > 0 ? roundRatio(calculateCompressionRatio(sourceSize, compressed.size)) : null;

    const task = this.registry.latestForSource(imageKey);
    return {
      imageKey,
      sourceExists: true,
      sourceSize,
      processed: processedVariants.length > 0,
      processedVariants,
      compressionRatio,
      task: task ? toTaskSummary(task) : null,
    };
  }

  listCapabilities(): Capabilities {
    return {
      supportedExtensions: this.compression.supportedExtensions(),
      tiers: listQualityPresets(),
      defaultTier: DEFAULT_TIER,
      methods: CompressionMethodSchema.options.filter((m) => m !== 'none'),
      video: { ...this.settings.video },
      pool: this.pool.stats(),
    };
  }

  async listImages(maxFiles: number, extension?: string): Promise<MediaFile[]> {
    return this.storage.list(this.settings.sourceBucket, maxFiles, extension);
  }

  async ping(): Promise<boolean> {
    const [source, dest] = await Promise.all([
      this.storage.ping(this.settings.sourceBucket),
      this.storage.ping(this.settings.destBucket),
    ]);
    return source && dest;
  }

  private async isAlreadyProcessed(sourceKey: string, compress: boolean): Promise<boolean> {
    const keys = this.settings.dedupeAcrossVariants
      ? allDestinationKeys(sourceKey).map((v) => v.key)
      : [destinationKey(sourceKey, compress)];
    for (const key of keys) {
      if (await this.storage.exists(this.settings.destBucket, key)) return true;
    }
    return false;
  }

  private joinInFlight(sourceKey: string, destKey: string, compress: boolean): ProcessingResult | null {
    const runningId = this.inFlight.get(destKey);
    if (!runningId) return null;
    const running = this.registry.get(runningId);
    return {
      sourceKey,
      destKey,
      action: 'queued',
      compressed: compress,
      tier: running ? running.tier : DEFAULT_TIER,
      taskId: runningId,
      reason: 'already_in_flight',
    };
  }

  private async admit(sourceKey: string, compress: boolean, tier: QualityTier): Promise<ProcessingResult> {
    const destKey = destinationKey(sourceKey, compress);
    const base = { sourceKey, destKey, compressed: compress, tier };

    const joined = this.joinInFlight(sourceKey, destKey, compress);
    if (joined) return joined;

    // A task finishing while the existence check is pending makes its answer stale: check again.
    for (;;) {
      const settledBefore = this.settledTasks;
      if (await this.isAlreadyProcessed(sourceKey, compress)) {
        logger.info('processing.skipped', { sourceKey, destKey, reason: 'already_processed' });
        return { ...base, action: 'skipped', taskId: null, reason: 'already_processed' };
      }
      const running = this.joinInFlight(sourceKey, destKey, compress);
      if (running) return running;
      if (settledBefore === this.settledTasks) break;
    }

    const record = this.registry.create({ sourceKey, destKey, compress, tier });
    const submitted = this.pool.submit(destKey, (signal) => this.runTask(record, signal));

    if (submitted === 'accepted') {
      this.inFlight.set(destKey, record.id);
      getRequestContext()?.taskIds.push(record.id);
      logger.info('processing.task.queued', { taskId: record.id, sourceKey, destKey, compress, tier });
      return { ...base, action: 'queued', taskId: record.id, reason: null };
    }

    this.registry.discard(record.id);
    if (submitted === 'duplicate') {
      return { ...base, action: 'queued', taskId: null, reason: 'already_in_flight' };
    }
    const reason = submitted === 'queue_full' ? 'queue_full' : 'shutting_down';
    return { ...base, action: 'failed', taskId: null, reason };
  }

  private async runTask(record: TaskRecord, signal: AbortSignal): Promise<void> {
    const taskDir = path.join(this.settings.workDir, record.id);
    let downloaded: string | null = null;
    let derived: string | null = null;
    let outcome: CompressionOutcomeDto | undefined;
    let failure: string | null = null;

    try {
      signal.throwIfAborted();
      this.registry.transition(record.id, 'downloading');
      downloaded = await this.storage.download(this.settings.sourceBucket, record.sourceKey, taskDir, signal);
      signal.throwIfAborted();
      if (!downloaded) throw new Error('download_failed');

      let uploadPath = downloaded;
      if (record.compress) {
        this.registry.transition(record.id, 'compressing');
        const prepared = await this.prepareCompressed(downloaded, record, signal);
        uploadPath = prepared.uploadPath;
        derived = prepared.derivedPath;
        outcome = prepared.outcome;
        signal.throwIfAborted();
      }

      this.registry.transition(record.id, 'uploading');
      const uploaded = await this.storage.upload(uploadPath, this.settings.destBucket, record.destKey, signal);
      signal.throwIfAborted();
      if (!uploaded) throw new Error('upload_failed');
    } catch (error) {
      failure = signal.aborted ? abortMessage(signal) : errorMessage(error);
    } finally {
      this.registry.transition(record.id, 'cleaning_up');
      await this.cleanup(record, taskDir, downloaded, derived);
      this.inFlight.delete(record.destKey);
      this.settledTasks += 1;

      if (failure) {
        this.registry.transition(record.id, 'failed', { outcome, errorMessage: failure });
        recordProcessingTask('failed');
        logger.warn('processing.task.failed', { taskId: record.id, sourceKey: record.sourceKey, errorMessage: failure });
      } else {
        this.registry.transition(record.id, 'done', { outcome });
        recordProcessingTask('done');
        logger.info('processing.task.done', {
          taskId: record.id,
          sourceKey: record.sourceKey,
          destKey: record.destKey,
          method: outcome?.method ?? null,
        });
      }
    }
  }

  /**
   * Falls back to the original when compression is skipped, fails, or saves too little.
   */
  private async prepareCompressed(localPath: string, record: TaskRecord, signal: AbortSignal): Promise<PreparedUpload> {
    const original: PreparedUpload = { uploadPath: localPath, derivedPath: null };

    const size = (await getFileSize(localPath)) ?? 0;
    if (size > this.settings.maxCompressFileSize) {
      logger.info('processing.compression_skipped', {
        taskId: record.id,
        reason: 'too_large',
        size,
        maxCompressFileSize: this.settings.maxCompressFileSize,
      });
      return original;
    }

    const family = this.compression.familyOf(localPath);
    if (!family) {
      logger.info('processing.compression_skipped', { taskId: record.id, reason: 'unsupported_format' });
      return original;
    }

    const result = await this.compression.compressFile(localPath, buildCompressionSettings(record.tier, family), {
      signal,
    });
    const outcome: CompressionOutcomeDto = {
      success: result.success,
      method: result.method,
      originalSize: result.originalSize,
      resultSize: result.resultSize,
      compressionRatio: roundRatio(calculateCompressionRatio(result.originalSize, result.resultSize)),
    };

    if (!result.success || !result.outputPath) {
      logger.info('processing.compression_failed_using_original', { taskId: record.id, failure: result.failure });
      return { ...original, outcome };
    }

    const saving = result.originalSize > 0 ? 1 - result.resultSize / result.originalSize : 0;
    if (saving < this.settings.minCompressionSaving) {
      logger.info('processing.compression_discarded', {
        taskId: record.id,
        saving: roundRatio(saving * 100),
        minCompressionSaving: this.settings.minCompressionSaving,
      });
      return { ...original, derivedPath: result.outputPath, outcome };
    }

    return { uploadPath: result.outputPath, derivedPath: result.outputPath, outcome };
  }

  private async cleanup(record: TaskRecord, taskDir: string, downloaded: string | null, derived: string | null) {
    if (downloaded) await this.storage.deleteLocal(downloaded);
    if (derived && derived !== downloaded) await this.storage.deleteLocal(derived);
    try {
      await fs.promises.rm(taskDir, { recursive: true, force: true });
    } catch (error) {
      logger.warn('processing.cleanup_failed', { taskId: record.id, taskDir, errorMessage: errorMessage(error) });
    }
  }
}
