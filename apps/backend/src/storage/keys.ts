import path from 'path';
import { randomUUID } from 'crypto';
import { normalizeExtension } from '../services/compression/fileUtils.js';
import { IMAGE_EXTENSIONS } from '../services/compression/ImageCompressor.js';
import type { MediaFile } from './types.js';

export function keyExtension(key: string): string {
  return normalizeExtension(path.posix.extname(key));
}

export function keyFilename(key: string): string {
  return path.posix.basename(key);
}

export function isImageKey(key: string): boolean {
  return IMAGE_EXTENSIONS.some((ext) => ext === keyExtension(key));
}

/** Unique per call so concurrent downloads of same-named keys never share a path. */
export function tempDownloadPath(destDir: string, key: string): string {
  return path.join(destDir, `${randomUUID()}${keyExtension(key)}`);
}

export function toMediaFile(key: string, size: number, lastModified: Date | null | undefined): MediaFile {
  return {
    key,
    filename: keyFilename(key),
    size,
    lastModified: lastModified ? lastModified.toISOString() : null,
    extension: keyExtension(key),
  };
}
