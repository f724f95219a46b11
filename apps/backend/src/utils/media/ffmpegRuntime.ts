import { configureFfmpegPath } from './configureFfmpeg.js';

let ffmpegPath: string | null = null;
let configured = false;

export function initFfmpegRuntime(opts: { ffmpegPath?: string } = {}): string | null {
  ffmpegPath = configureFfmpegPath(opts);
  configured = true;
  return ffmpegPath;
}

/** Resolved on first use unless startup already called `initFfmpegRuntime`. */
export function getFfmpegPath(): string {
  if (!configured) initFfmpegRuntime({ ffmpegPath: process.env.FFMPEG_PATH });
  // Bare command name: spawn resolves it from PATH.
  return ffmpegPath || 'ffmpeg';
}
