import './config/loadEnv.js';
import { createServer } from 'http';
import { getConfig } from './config/env.js';
import { createApp } from './app.js';
import { createServices } from './container.js';
import { setupShutdownHandlers } from './server/shutdown.js';
import { initFfmpegRuntime } from './utils/media/ffmpegRuntime.js';
import { logger, errorMessage } from './utils/logger.js';

function startServer() {
  const config = getConfig();

  const ffmpegPath = initFfmpegRuntime({ ffmpegPath: config.ffmpeg.path });
  logger.info('ffmpeg.runtime', { ffmpegPath: ffmpegPath ?? 'PATH' });

  const services = createServices(config);
  const app = createApp({ orchestrator: services.orchestrator, http: config.http });
  const httpServer = createServer(app);

  setupShutdownHandlers({
    httpServer,
    shutdownTimeoutMs: config.http.shutdownTimeoutMs,
    httpDrainTimeoutMs: Math.min(10_000, config.http.shutdownTimeoutMs),
    stopProcessing: (timeoutMs) => services.pool.shutdown(timeoutMs),
  });

  httpServer.listen(config.port, () => {
    logger.info('server.started', {
      port: config.port,
      nodeEnv: config.nodeEnv,
      storage: services.storage.kind,
      sourceBucket: config.sourceBucket,
      destBucket: config.destBucket,
      concurrency: config.processing.concurrency,
    });
  });
}

try {
  startServer();
} catch (error) {
  logger.error('server.start_failed', { errorMessage: errorMessage(error) });
  process.exit(1);
}
