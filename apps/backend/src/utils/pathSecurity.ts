import path from 'path';

/**
 * Resolves `filePath` against `baseDir` and returns the absolute path, or throws when it
 * would land outside `baseDir`.
 */
export function validatePathWithinDirectory(filePath: string, baseDir: string): string {
  if (!filePath) {
    throw new Error('Invalid file path: must be a non-empty string');
  }

  const normalizedBaseDir = path.normalize(path.resolve(baseDir));
  const normalizedFilePath = path.normalize(path.resolve(normalizedBaseDir, filePath));
  const relativePath = path.relative(normalizedBaseDir, normalizedFilePath);

  if (!relativePath || relativePath.startsWith('..') || path.isAbsolute(relativePath)) {
    throw new Error(`Path traversal detected: ${filePath} resolves outside allowed directory ${baseDir}`);
  }

  return normalizedFilePath;
}
