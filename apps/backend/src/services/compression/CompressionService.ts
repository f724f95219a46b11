import fs from 'fs';
import path from 'path';
import { logger, errorMessage } from '../../utils/logger.js';
import { ImageCompressor } from './ImageCompressor.js';
import { VideoCompressor, type VideoCompressorOptions } from './VideoCompressor.js';
import { calculateCompressionRatio, extensionOf, getFileSize, roundRatio } from './fileUtils.js';
import { buildCompressionSettings, DEFAULT_TIER } from './settings.js';
import {
  UnsupportedFormatError,
  type CompressOptions,
  type CompressionMethod,
  type CompressionOutcome,
  type CompressionSettings,
  type Compressor,
  type MediaFamily,
  type QualityTier,
} from './types.js';

export type BatchRecord = {
  inputFile: string;
  outputFile: string | null;
  originalSize: number;
  compressedSize: number;
  /** Percent saved, rounded to two decimals. */
  compressionRatio: number;
  method: CompressionMethod;
  success: boolean;
};

export type SupportedExtensions = Record<MediaFamily, string[]>;

export type CompressionServiceOptions = {
  outputDir: string;
  ffmpegTimeoutMs?: number;
  lowPriority?: boolean;
  video?: Pick<VideoCompressorOptions, 'reencode' | 'skipThresholdBytes'>;
};

export class CompressionService {
  private readonly compressors: readonly Compressor[];

  /** Order matters: the first compressor whose supportsFormat matches wins. */
  constructor(compressors: readonly Compressor[]) {
    this.compressors = compressors;
  }

  static create(opts: CompressionServiceOptions): CompressionService {
    return new CompressionService([
      new ImageCompressor({
        outputDir: opts.outputDir,
        ffmpegTimeoutMs: opts.ffmpegTimeoutMs,
        lowPriority: opts.lowPriority,
      }),
      new VideoCompressor({
        outputDir: opts.outputDir,
        ffmpegTimeoutMs: opts.ffmpegTimeoutMs,
        lowPriority: opts.lowPriority,
        reencode: opts.video?.reencode,
        skipThresholdBytes: opts.video?.skipThresholdBytes,
      }),
    ]);
  }

  findCompressor(extension: string): Compressor | null {
    return this.compressors.find((c) => c.supportsFormat(extension)) ?? null;
  }

  familyOf(filePath: string): MediaFamily | null {
    return this.findCompressor(extensionOf(filePath))?.family ?? null;
  }

  supportedExtensions(): SupportedExtensions {
    const out: SupportedExtensions = { image: [], video: [] };
    for (const compressor of this.compressors) {
      out[compressor.family].push(...compressor.extensions);
    }
    return out;
  }

  /**
   * Compresses one file. Never throws for a missing input or an unknown extension:
   * both come back as a failed outcome.
   */
  async compressFile(
    inputPath: string,
    settings?: CompressionSettings,
    opts: CompressOptions = {}
  ): Promise<CompressionOutcome> {
    const originalSize = await getFileSize(inputPath);
    if (originalSize === null) {
      logger.warn('compression.input_missing', { inputPath });
      return failedOutcome(0, 'input_missing');
    }

    const compressor = this.findCompressor(extensionOf(inputPath));
    if (!compressor) {
      logger.warn('compression.unsupported_format', { inputPath, extension: extensionOf(inputPath) });
      return failedOutcome(originalSize, 'unsupported_format');
    }

    const effective = settings ?? buildCompressionSettings(DEFAULT_TIER, compressor.family);
    try {
      return await compressor.compress(inputPath, effective, opts);
    } catch (error) {
      if (error instanceof UnsupportedFormatError) {
        return failedOutcome(originalSize, 'unsupported_format');
      }
      logger.error('compression.failed', { inputPath, errorMessage: errorMessage(error) });
      return failedOutcome(originalSize, 'compression_failed');
    }
  }

  /** Regular files directly inside `dir`, in name order. Subdirectories are not visited. */
  async compressDirectory(dir: string, tier: QualityTier = DEFAULT_TIER): Promise<BatchRecord[]> {
    const entries = await fs.promises.readdir(dir, { withFileTypes: true }).catch((error: unknown) => {
      logger.warn('compression.directory_unreadable', { dir, errorMessage: errorMessage(error) });
      return null;
    });
    if (!entries) return [];

    const files = entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();

    const records: BatchRecord[] = [];
    for (const name of files) {
      records.push(await this.compressToRecord(path.join(dir, name), tier));
    }
    return records;
  }

  async compressMultiple(paths: readonly string[], tier: QualityTier = DEFAULT_TIER): Promise<BatchRecord[]> {
    const records: BatchRecord[] = [];
    for (const p of paths) {
      const stats = await fs.promises.stat(p).catch(() => null);
      if (stats?.isDirectory()) {
        records.push(...(await this.compressDirectory(p, tier)));
      } else {
        records.push(await this.compressToRecord(p, tier));
      }
    }
    return records;
  }

  private async compressToRecord(inputPath: string, tier: QualityTier): Promise<BatchRecord> {
    const compressor = this.findCompressor(extensionOf(inputPath));
    const settings = compressor ? buildCompressionSettings(tier, compressor.family) : undefined;
    const outcome = await this.compressFile(inputPath, settings);
    return toBatchRecord(inputPath, outcome);
  }
}

export function toBatchRecord(inputPath: string, outcome: CompressionOutcome): BatchRecord {
  return {
    inputFile: inputPath,
    outputFile: outcome.outputPath,
    originalSize: outcome.originalSize,
    compressedSize: outcome.resultSize,
    compressionRatio: roundRatio(calculateCompressionRatio(outcome.originalSize, outcome.resultSize)),
    method: outcome.method,
    success: outcome.success,
  };
}

function failedOutcome(originalSize: number, failure: CompressionOutcome['failure']): CompressionOutcome {
  return { success: false, method: 'none', originalSize, resultSize: originalSize, outputPath: null, failure };
}
