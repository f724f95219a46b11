import ffmpeg from 'fluent-ffmpeg';
import fs from 'fs';
import path from 'path';
import { getFfmpegPath } from './ffmpegRuntime.js';
import { clampInt, DEFAULT_FFMPEG_TIMEOUT_MS, FfmpegRunError, LOW_PRIORITY_NICENESS } from './ffmpegCli.js';

export type ReencodeParams = {
  codec: string;
  preset: string;
  crf: number;
  audioBitrate: string;
};

/**
 * Full video re-encode: configurable video encoder/preset/CRF, AAC audio and the
 * moov atom moved to the front for progressive download.
 */
export async function reencodeVideo(
  inputPath: string,
  outputPath: string,
  params: ReencodeParams,
  opts: { timeoutMs?: number; lowPriority?: boolean; signal?: AbortSignal } = {}
): Promise<void> {
  // Resolves the binary (and configures fluent-ffmpeg) on first use.
  getFfmpegPath();
  const timeoutMs = clampInt(
    opts.timeoutMs ?? DEFAULT_FFMPEG_TIMEOUT_MS,
    1_000,
    60 * 60_000,
    DEFAULT_FFMPEG_TIMEOUT_MS
  );
  await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });

  if (opts.signal?.aborted) {
    throw new FfmpegRunError('aborted', 'ffmpeg_aborted');
  }

  return await new Promise<void>((resolve, reject) => {
    let settled = false;
    const cmd = ffmpeg(inputPath)
      .videoCodec(params.codec)
      .audioCodec('aac')
      .audioBitrate(params.audioBitrate)
      .outputOptions(['-preset', params.preset, '-crf', String(params.crf), '-movflags', '+faststart']);
    if (opts.lowPriority) cmd.renice(LOW_PRIORITY_NICENESS);

    const finish = (error: Error | null) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      opts.signal?.removeEventListener('abort', onAbort);
      if (error) reject(error);
      else resolve();
    };

    const kill = () => {
      try {
        cmd.kill('SIGKILL');
      } catch {
        // process already gone
      }
    };

    const onAbort = () => {
      kill();
      finish(new FfmpegRunError('aborted', 'ffmpeg_aborted'));
    };

    const timer = setTimeout(() => {
      kill();
      finish(new FfmpegRunError('timeout', `ffmpeg_timeout_${timeoutMs}`));
    }, timeoutMs);

    opts.signal?.addEventListener('abort', onAbort, { once: true });

    cmd
      .on('end', () => finish(null))
      .on('error', (err: NodeJS.ErrnoException) => {
        const reason = err.code === 'ENOENT' || /cannot find ffmpeg/i.test(err.message) ? 'not_found' : 'exit';
        finish(new FfmpegRunError(reason, err.message));
      })
      .save(outputPath);
  });
}
