import fs from 'fs';
import path from 'path';
import { logger } from '../../utils/logger.js';

export function normalizeExtension(extension: string): string {
  const trimmed = String(extension || '').trim().toLowerCase();
  if (!trimmed) return '';
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

export function extensionOf(filePath: string): string {
  return normalizeExtension(path.extname(filePath));
}

export async function getFileSize(filePath: string): Promise<number | null> {
  try {
    const stats = await fs.promises.stat(filePath);
    return stats.isFile() ? stats.size : null;
  } catch {
    return null;
  }
}

export async function isNonEmptyFile(filePath: string): Promise<boolean> {
  const size = await getFileSize(filePath);
  return size !== null && size > 0;
}

/** Percentage saved; 0 when the original is empty. */
export function calculateCompressionRatio(originalSize: number, compressedSize: number): number {
  if (originalSize === 0) return 0;
  return (1 - compressedSize / originalSize) * 100;
}

export function roundRatio(ratio: number): number {
  return Math.round(ratio * 100) / 100;
}

export function buildOutputPath(outputDir: string, inputPath: string, prefix = 'compressed_'): string {
  return path.join(outputDir, `${prefix}${path.basename(inputPath)}`);
}

export async function ensureDir(dir: string): Promise<void> {
  await fs.promises.mkdir(dir, { recursive: true });
}

export async function safeUnlink(filePath: string): Promise<void> {
  try {
    await fs.promises.unlink(filePath);
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') return;
    logger.warn('fs.unlink_failed', { path: filePath, errorMessage: err.message });
  }
}
