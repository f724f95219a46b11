import '../src/config/loadEnv.js';
import { getConfig } from '../src/config/env.js';
import {
  CliUsageError,
  parseCompressArgs,
  runCompressLocal,
  USAGE,
  type CompressLocalOptions,
} from '../src/cli/compressLocal.js';
import { initFfmpegRuntime } from '../src/utils/media/ffmpegRuntime.js';
import { logger, errorMessage } from '../src/utils/logger.js';

/**
 * Compress local files or directories without touching object storage.
 *
 * Usage:
 *   npm run compress:local -- ./photos/fox.jpg ./photos --quality=high --out=./out
 */
async function main() {
  let options: CompressLocalOptions;
  try {
    options = parseCompressArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`${error.message}\n\n${USAGE}`);
      process.exitCode = 2;
      return;
    }
    throw error;
  }

  const config = getConfig();
  initFfmpegRuntime({ ffmpegPath: config.ffmpeg.path });
  process.exitCode = await runCompressLocal(options, config, (line) => console.log(line));
}

main().catch((error) => {
  logger.error('compress_local.failed', { errorMessage: errorMessage(error) });
  process.exitCode = 1;
});
