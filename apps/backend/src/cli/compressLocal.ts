import path from 'path';
import type { AppConfig } from '../config/env.js';
import { createCompressionService } from '../container.js';
import type { BatchRecord } from '../services/compression/CompressionService.js';
import { DEFAULT_TIER, isQualityTier, QUALITY_TIERS } from '../services/compression/settings.js';
import type { QualityTier } from '../services/compression/types.js';

export type CompressLocalOptions = {
  paths: string[];
  tier: QualityTier;
  outputDir: string;
  help: boolean;
};

export const USAGE = [
  'Usage: compress-local <file-or-directory>... [--quality=low|medium|high] [--out=<dir>]',
  '',
  'Compresses local files with the same pipeline the service uses.',
  'Directories are processed non-recursively. Exits non-zero when any file fails.',
].join('\n');

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export function parseCompressArgs(argv: string[], cwd: string = process.cwd()): CompressLocalOptions {
  let tier: QualityTier = DEFAULT_TIER;
  let outputDir = path.resolve(cwd, 'compressed');
  const paths: string[] = [];
  let help = false;

  for (const arg of argv) {
    if (arg === '--help' || arg === '-h') {
      help = true;
    } else if (arg.startsWith('--quality=')) {
      const value = arg.slice('--quality='.length);
      if (!isQualityTier(value)) {
        throw new CliUsageError(`Invalid quality "${value}". Expected one of: ${QUALITY_TIERS.join(', ')}`);
      }
      tier = value;
    } else if (arg.startsWith('--out=')) {
      const value = arg.slice('--out='.length);
      if (!value) throw new CliUsageError('--out needs a directory');
      outputDir = path.resolve(cwd, value);
    } else if (arg.startsWith('--')) {
      throw new CliUsageError(`Unknown option ${arg}`);
    } else {
      paths.push(path.resolve(cwd, arg));
    }
  }

  if (!help && paths.length === 0) {
    throw new CliUsageError('No input files given');
  }
  return { paths, tier, outputDir, help };
}

export function formatRecord(record: BatchRecord): string {
  const name = path.basename(record.inputFile);
  if (!record.success) {
    return `FAIL  ${name}`;
  }
  return `OK    ${name}  ${record.originalSize} -> ${record.compressedSize} bytes (${record.compressionRatio}% saved, ${record.method})`;
}

/** Returns the process exit code. */
export async function runCompressLocal(
  opts: CompressLocalOptions,
  config: Pick<AppConfig, 'ffmpeg' | 'video'>,
  print: (line: string) => void
): Promise<number> {
  if (opts.help) {
    print(USAGE);
    return 0;
  }

  const service = createCompressionService(config, opts.outputDir);
  const records = await service.compressMultiple(opts.paths, opts.tier);

  for (const record of records) {
    print(formatRecord(record));
  }

  const succeeded = records.filter((r) => r.success);
  const saved = succeeded.reduce((sum, r) => sum + Math.max(0, r.originalSize - r.compressedSize), 0);
  print(`\n${succeeded.length}/${records.length} files compressed, ${saved} bytes saved -> ${opts.outputDir}`);

  return records.length > 0 && succeeded.length === records.length ? 0 : 1;
}
