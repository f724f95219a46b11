import { normalizeExtension } from '../services/compression/fileUtils.js';

const CONTENT_TYPES: Readonly<Record<string, string>> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.webp': 'image/webp',
  '.tiff': 'image/tiff',
  '.tif': 'image/tiff',
  '.bmp': 'image/bmp',
};

/** Undefined for extensions outside the table; the upload then carries no content type. */
export function contentTypeFor(extension: string): string | undefined {
  return CONTENT_TYPES[normalizeExtension(extension)];
}
