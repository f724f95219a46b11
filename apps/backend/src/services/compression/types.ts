import type { CompressionMethod, MediaFamily, QualityTier } from '@mediapress/api-contracts';

export type { CompressionMethod, MediaFamily, QualityTier };

/** Frozen per call; never shared or mutated between tasks. */
export type CompressionSettings = Readonly<{
  family: MediaFamily;
  tier: QualityTier;
  /** 1-100, higher is better (library JPEG quality). */
  lossyQuality: number;
  /** 0-9, higher is smaller/slower (PNG zlib level). */
  losslessLevel: number;
  /** ffmpeg `-q:v` scale, lower is better. */
  encoderQuality: number;
}>;

export type CompressionFailure = 'unsupported_format' | 'input_missing' | 'compression_failed';

export type CompressionOutcome = {
  success: boolean;
  method: CompressionMethod;
  originalSize: number;
  resultSize: number;
  /** Existing, non-empty file when `success` is true; null otherwise. */
  outputPath: string | null;
  failure?: CompressionFailure;
};

export interface Compressor {
  readonly family: MediaFamily;
  readonly extensions: readonly string[];
  supportsFormat(extension: string): boolean;
  /** Throws UnsupportedFormatError for an extension it does not handle. */
  compress(inputPath: string, settings: CompressionSettings, opts?: CompressOptions): Promise<CompressionOutcome>;
}

export type CompressOptions = {
  signal?: AbortSignal;
};

export class UnsupportedFormatError extends Error {
  public readonly extension: string;

  constructor(extension: string) {
    super(`Unsupported format: ${extension || '(none)'}`);
    this.name = 'UnsupportedFormatError';
    this.extension = extension;
  }
}
