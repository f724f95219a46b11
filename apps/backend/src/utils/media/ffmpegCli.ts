import { spawn } from 'node:child_process';
import { getFfmpegPath } from './ffmpegRuntime.js';

export const DEFAULT_FFMPEG_TIMEOUT_MS = 90_000;

export type FfmpegFailureReason = 'not_found' | 'exit' | 'timeout' | 'aborted';

export class FfmpegRunError extends Error {
  public readonly reason: FfmpegFailureReason;
  public readonly exitCode: number | null;
  public readonly stderr: string;

  constructor(reason: FfmpegFailureReason, message: string, opts: { exitCode?: number | null; stderr?: string } = {}) {
    super(message);
    this.name = 'FfmpegRunError';
    this.reason = reason;
    this.exitCode = opts.exitCode ?? null;
    this.stderr = opts.stderr ?? '';
  }
}

export type FfmpegRunOptions = {
  timeoutMs?: number;
  lowPriority?: boolean;
  signal?: AbortSignal;
};

export function clampInt(n: number, min: number, max: number, fallback: number): number {
  if (!Number.isFinite(n)) return fallback;
  if (n < min) return min;
  if (n > max) return max;
  return Math.floor(n);
}

/** ionice idle class plus nice 10 on Linux; elsewhere the command runs unchanged. */
/** `nice` level for background encodes. */
export const LOW_PRIORITY_NICENESS = 10;

export function lowPriorityCommand(
  command: string,
  args: string[],
  platform: NodeJS.Platform = process.platform
): { cmd: string; args: string[] } {
  if (platform !== 'linux') return { cmd: command, args };
  return { cmd: 'ionice', args: ['-c3', 'nice', '-n', String(LOW_PRIORITY_NICENESS), command, ...args] };
}

// Keep only the tail: ffmpeg repeats its banner and progress on stderr.
const STDERR_LIMIT = 4_000;

function runOnce(cmd: string, args: string[], timeoutMs: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new FfmpegRunError('aborted', 'ffmpeg_aborted'));
      return;
    }

    const child = spawn(cmd, args, { stdio: ['ignore', 'ignore', 'pipe'] });
    let stderr = '';
    let settled = false;

    const finish = (error: FfmpegRunError | null) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      if (error) reject(error);
      else resolve();
    };

    const kill = () => {
      try {
        child.kill('SIGKILL');
      } catch {
        // already exited
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

    signal?.addEventListener('abort', onAbort, { once: true });

    child.stderr?.on('data', (chunk: Buffer) => {
      stderr = (stderr + chunk.toString('utf8')).slice(-STDERR_LIMIT);
    });

    child.on('error', (err: NodeJS.ErrnoException) => {
      const reason: FfmpegFailureReason = err.code === 'ENOENT' ? 'not_found' : 'exit';
      finish(new FfmpegRunError(reason, `ffmpeg_spawn_failed: ${err.message}`));
    });

    child.on('close', (code) => {
      if (code === 0) {
        finish(null);
        return;
      }
      finish(new FfmpegRunError('exit', `ffmpeg_exit_${code}`, { exitCode: code, stderr }));
    });
  });
}

/**
 * Runs the ffmpeg CLI with the given arguments (input and output included).
 * Rejects with FfmpegRunError on a missing binary, non-zero exit, timeout or abort.
 */
export async function runFfmpegCli(args: string[], opts: FfmpegRunOptions = {}): Promise<void> {
  const ffmpegPath = getFfmpegPath();
  const timeoutMs = clampInt(
    opts.timeoutMs ?? DEFAULT_FFMPEG_TIMEOUT_MS,
    1_000,
    60 * 60_000,
    DEFAULT_FFMPEG_TIMEOUT_MS
  );
  const fullArgs = ['-hide_banner', '-loglevel', 'error', ...args];

  if (!opts.lowPriority) {
    return runOnce(ffmpegPath, fullArgs, timeoutMs, opts.signal);
  }

  const lowPriority = lowPriorityCommand(ffmpegPath, fullArgs);
  try {
    await runOnce(lowPriority.cmd, lowPriority.args, timeoutMs, opts.signal);
  } catch (error) {
    // ionice/nice missing on this host: run ffmpeg directly.
    if (error instanceof FfmpegRunError && error.reason === 'not_found' && lowPriority.cmd !== ffmpegPath) {
      await runOnce(ffmpegPath, fullArgs, timeoutMs, opts.signal);
      return;
    }
    throw error;
  }
}
