import fs from 'fs';
import path from 'path';
import { logger, errorMessage } from '../../utils/logger.js';
import { recordCompression } from '../../utils/metrics.js';
import { FfmpegRunError, runFfmpegCli } from '../../utils/media/ffmpegCli.js';
import { reencodeVideo, type ReencodeParams } from '../../utils/media/videoTranscoding.js';
import {
  buildOutputPath,
  calculateCompressionRatio,
  ensureDir,
  extensionOf,
  getFileSize,
  isNonEmptyFile,
  normalizeExtension,
  roundRatio,
  safeUnlink,
} from './fileUtils.js';
import {
  UnsupportedFormatError,
  type CompressOptions,
  type CompressionMethod,
  type CompressionOutcome,
  type CompressionSettings,
  type Compressor,
} from './types.js';

export const VIDEO_EXTENSIONS = ['.mp4', '.avi', '.mov', '.mkv', '.webm', '.flv'] as const;

export const DEFAULT_VIDEO_SKIP_THRESHOLD_BYTES = 5_000_000;

export type VideoCompressorOptions = {
  outputDir: string;
  reencode?: Partial<ReencodeParams>;
  skipThresholdBytes?: number;
  ffmpegTimeoutMs?: number;
  lowPriority?: boolean;
};

const DEFAULT_REENCODE: ReencodeParams = {
  codec: 'libx264',
  preset: 'medium',
  crf: 23,
  audioBitrate: '96k',
};

/**
 * Stream remux first; small files are passed through unchanged; everything else
 * gets a full re-encode. Quality tiers do not change the video path.
 */
export class VideoCompressor implements Compressor {
  readonly family = 'video' as const;
  readonly extensions: readonly string[] = VIDEO_EXTENSIONS;
  private readonly outputDir: string;
  private readonly reencodeParams: ReencodeParams;
  private readonly skipThresholdBytes: number;
  private readonly ffmpegTimeoutMs?: number;
  private readonly lowPriority: boolean;
  private outputDirReady: Promise<void> | null = null;

  constructor(opts: VideoCompressorOptions) {
    this.outputDir = opts.outputDir;
    this.reencodeParams = { ...DEFAULT_REENCODE, ...opts.reencode };
    this.skipThresholdBytes = opts.skipThresholdBytes ?? DEFAULT_VIDEO_SKIP_THRESHOLD_BYTES;
    this.ffmpegTimeoutMs = opts.ffmpegTimeoutMs;
    this.lowPriority = opts.lowPriority ?? false;
  }

  supportsFormat(extension: string): boolean {
    return this.extensions.includes(normalizeExtension(extension));
  }

  async compress(inputPath: string, _settings: CompressionSettings, opts: CompressOptions = {}): Promise<CompressionOutcome> {
    const ext = extensionOf(inputPath);
    if (!this.supportsFormat(ext)) {
      throw new UnsupportedFormatError(ext);
    }

    const originalSize = await getFileSize(inputPath);
    if (originalSize === null) {
      return this.failed(0, 'input_missing');
    }

    await this.ensureOutputDir();
    const outputPath = buildOutputPath(this.outputDir, inputPath);

    if (await this.tryStreamCopy(inputPath, outputPath, originalSize, opts.signal)) {
      return this.succeeded(inputPath, outputPath, originalSize, 'stream-copy');
    }

    if (originalSize > 0 && originalSize < this.skipThresholdBytes) {
      const copyPath = path.join(this.outputDir, path.basename(inputPath));
      try {
        await fs.promises.copyFile(inputPath, copyPath);
        return this.succeeded(inputPath, copyPath, originalSize, 'skip-copy');
      } catch (error) {
        logger.warn('compression.video.skip_copy_failed', { inputPath, errorMessage: errorMessage(error) });
        await safeUnlink(copyPath);
        return this.failed(originalSize, 'compression_failed');
      }
    }

    if (opts.signal?.aborted) {
      return this.failed(originalSize, 'compression_failed');
    }

    try {
      await reencodeVideo(inputPath, outputPath, this.reencodeParams, {
        timeoutMs: this.ffmpegTimeoutMs,
        lowPriority: this.lowPriority,
        signal: opts.signal,
      });
    } catch (error) {
      logger.warn('compression.video.reencode_failed', {
        inputPath,
        reason: error instanceof FfmpegRunError ? error.reason : 'unknown',
        errorMessage: errorMessage(error),
      });
      await safeUnlink(outputPath);
      return this.failed(originalSize, 'compression_failed');
    }

    if (!(await isNonEmptyFile(outputPath))) {
      await safeUnlink(outputPath);
      return this.failed(originalSize, 'compression_failed');
    }
    return this.succeeded(inputPath, outputPath, originalSize, 're-encode');
  }

  private ensureOutputDir(): Promise<void> {
    if (!this.outputDirReady) {
      this.outputDirReady = ensureDir(this.outputDir).catch((error: unknown) => {
        this.outputDirReady = null;
        throw error;
      });
    }
    return this.outputDirReady;
  }

  /** Accepted only when the remuxed container is strictly smaller. */
  private async tryStreamCopy(
    inputPath: string,
    outputPath: string,
    originalSize: number,
    signal?: AbortSignal
  ): Promise<boolean> {
    try {
      await runFfmpegCli(['-i', inputPath, '-c', 'copy', '-avoid_negative_ts', 'make_zero', '-y', outputPath], {
        timeoutMs: this.ffmpegTimeoutMs,
        lowPriority: this.lowPriority,
        signal,
      });
    } catch (error) {
      logger.debug('compression.video.remux_failed', {
        inputPath,
        reason: error instanceof FfmpegRunError ? error.reason : 'unknown',
      });
      await safeUnlink(outputPath);
      return false;
    }

    const size = await getFileSize(outputPath);
    if (size !== null && size > 0 && size < originalSize) return true;

    logger.debug('compression.video.remux_rejected', { inputPath, originalSize, remuxSize: size });
    await safeUnlink(outputPath);
    return false;
  }

  private async succeeded(
    inputPath: string,
    outputPath: string,
    originalSize: number,
    method: CompressionMethod
  ): Promise<CompressionOutcome> {
    const resultSize = (await getFileSize(outputPath)) ?? 0;
    logger.info('compression.video.done', {
      inputPath,
      method,
      originalSize,
      resultSize,
      ratio: roundRatio(calculateCompressionRatio(originalSize, resultSize)),
    });
    recordCompression({ kind: this.family, method, success: true, originalSize, resultSize });
    return { success: true, method, originalSize, resultSize, outputPath };
  }

  private failed(originalSize: number, failure: 'input_missing' | 'compression_failed'): CompressionOutcome {
    recordCompression({ kind: this.family, method: 'none', success: false, originalSize, resultSize: originalSize });
    return { success: false, method: 'none', originalSize, resultSize: originalSize, outputPath: null, failure };
  }
}
