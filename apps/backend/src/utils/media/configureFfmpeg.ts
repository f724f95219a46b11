import ffmpeg from 'fluent-ffmpeg';
import ffmpegInstaller from '@ffmpeg-installer/ffmpeg';
import fs from 'fs';

function fileExists(p: string): boolean {
  try {
    return fs.existsSync(p);
  } catch {
    return false;
  }
}

export function installerFfmpegPath(): string {
  // The installer resolves a platform package at load time; its path can be empty.
  const resolved: unknown = ffmpegInstaller.path;
  return typeof resolved === 'string' ? resolved : '';
}

/**
 * Point fluent-ffmpeg at a concrete binary.
 *
 * The @ffmpeg-installer binary can be missing even when the package is installed
 * (install scripts skipped, unsupported platform); fluent-ffmpeg then keeps
 * resolving ffmpeg from PATH. An explicit FFMPEG_PATH wins over the installer.
 */
export function configureFfmpegPath(opts: { ffmpegPath?: string } = {}): string | null {
  const explicit = String(opts.ffmpegPath || '').trim();
  const candidate = explicit || installerFfmpegPath();
  if (!candidate || !fileExists(candidate)) return null;
  ffmpeg.setFfmpegPath(candidate);
  return candidate;
}
