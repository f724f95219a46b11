import sharp from 'sharp';
import { logger, errorMessage } from '../../utils/logger.js';
import { recordCompression } from '../../utils/metrics.js';
import { FfmpegRunError, runFfmpegCli } from '../../utils/media/ffmpegCli.js';
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

export const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.tiff', '.tif', '.webp', '.bmp'] as const;

export type ImageCompressorOptions = {
  outputDir: string;
  ffmpegTimeoutMs?: number;
  lowPriority?: boolean;
};

/**
 * ffmpeg arguments for the formats that have an external-encoder path
 * (jpeg, png, webp); null for the rest.
 */
export function buildExternalEncoderArgs(
  extension: string,
  inputPath: string,
  outputPath: string,
  settings: CompressionSettings
): string[] | null {
  const ext = normalizeExtension(extension);
  let codecArgs: string[];
  if (ext === '.jpg' || ext === '.jpeg') {
    codecArgs = ['-c:v', 'mjpeg', '-q:v', String(settings.encoderQuality), '-huffman', 'optimal'];
  } else if (ext === '.png') {
    codecArgs = ['-c:v', 'png', '-compression_level', String(settings.losslessLevel), '-pred', 'mixed'];
  } else if (ext === '.webp') {
    codecArgs = ['-c:v', 'libwebp', '-lossless', '1', '-compression_level', '6'];
  } else {
    return null;
  }
  return ['-i', inputPath, ...codecArgs, '-y', outputPath];
}

export class ImageCompressor implements Compressor {
  readonly family = 'image' as const;
  readonly extensions: readonly string[] = IMAGE_EXTENSIONS;
  private readonly outputDir: string;
  private readonly ffmpegTimeoutMs?: number;
  private readonly lowPriority: boolean;
  private outputDirReady: Promise<void> | null = null;

  constructor(opts: ImageCompressorOptions) {
    this.outputDir = opts.outputDir;
    this.ffmpegTimeoutMs = opts.ffmpegTimeoutMs;
    this.lowPriority = opts.lowPriority ?? false;
  }

  supportsFormat(extension: string): boolean {
    return this.extensions.includes(normalizeExtension(extension));
  }

  async compress(inputPath: string, settings: CompressionSettings, opts: CompressOptions = {}): Promise<CompressionOutcome> {
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

    if (await this.tryExternalEncoder(ext, inputPath, outputPath, settings, opts.signal)) {
      return this.succeeded(inputPath, outputPath, originalSize, 'external-encoder');
    }

    if (opts.signal?.aborted) {
      return this.failed(originalSize, 'compression_failed');
    }

    if (await this.tryLibraryFallback(ext, inputPath, outputPath, settings)) {
      return this.succeeded(inputPath, outputPath, originalSize, 'library-fallback');
    }

    return this.failed(originalSize, 'compression_failed');
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

  private async tryExternalEncoder(
    ext: string,
    inputPath: string,
    outputPath: string,
    settings: CompressionSettings,
    signal?: AbortSignal
  ): Promise<boolean> {
    const args = buildExternalEncoderArgs(ext, inputPath, outputPath, settings);
    if (!args) return false;

    try {
      await runFfmpegCli(args, { timeoutMs: this.ffmpegTimeoutMs, lowPriority: this.lowPriority, signal });
    } catch (error) {
      logger.debug('compression.image.ffmpeg_failed', {
        inputPath,
        reason: error instanceof FfmpegRunError ? error.reason : 'unknown',
        errorMessage: errorMessage(error),
      });
      await safeUnlink(outputPath);
      return false;
    }

    if (!(await isNonEmptyFile(outputPath))) {
      logger.debug('compression.image.ffmpeg_empty_output', { inputPath });
      await safeUnlink(outputPath);
      return false;
    }
    return true;
  }

  private async tryLibraryFallback(
    ext: string,
    inputPath: string,
    outputPath: string,
    settings: CompressionSettings
  ): Promise<boolean> {
    try {
      // failOn 'none' keeps truncated images decodable.
      let pipeline = sharp(inputPath, { failOn: 'none' });

      if (ext === '.png') {
        pipeline = pipeline.png({ compressionLevel: settings.losslessLevel, adaptiveFiltering: true });
      } else if (ext === '.jpg' || ext === '.jpeg') {
        const meta = await pipeline.metadata();
        if (meta.hasAlpha) {
          pipeline = pipeline.flatten({ background: '#ffffff' });
        }
        pipeline = pipeline.jpeg({ quality: settings.lossyQuality, progressive: true, optimiseCoding: true });
      } else if (ext === '.tiff' || ext === '.tif') {
        pipeline = pipeline.tiff({ compression: 'lzw' });
      } else if (ext === '.webp') {
        pipeline = pipeline.webp({ lossless: true, quality: 100 });
      } else {
        const meta = await pipeline.metadata();
        if (!meta.format) throw new Error('unknown_image_format');
        pipeline = pipeline.toFormat(meta.format);
      }

      await pipeline.toFile(outputPath);
    } catch (error) {
      logger.warn('compression.image.fallback_failed', { inputPath, errorMessage: errorMessage(error) });
      await safeUnlink(outputPath);
      return false;
    }

    if (!(await isNonEmptyFile(outputPath))) {
      await safeUnlink(outputPath);
      return false;
    }
    return true;
  }

  private async succeeded(
    inputPath: string,
    outputPath: string,
    originalSize: number,
    method: CompressionMethod
  ): Promise<CompressionOutcome> {
    const resultSize = (await getFileSize(outputPath)) ?? 0;
    logger.info('compression.image.done', {
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
