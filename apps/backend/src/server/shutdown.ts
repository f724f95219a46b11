import type { Server as HttpServer } from 'http';
import type { Socket } from 'net';
import { logger, errorMessage } from '../utils/logger.js';

type ShutdownDeps = {
  httpServer: HttpServer;
  shutdownTimeoutMs: number;
  httpDrainTimeoutMs: number;
  /** Aborts running processing tasks and waits up to `timeoutMs`; resolves false on timeout. */
  stopProcessing: (timeoutMs: number) => Promise<boolean>;
};

async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  if (!Number.isFinite(ms) || ms <= 0) return await promise;
  let timer: NodeJS.Timeout | null = null;
  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timer = setTimeout(() => reject(new Error(`${label}_timeout_${ms}`)), ms);
      }),
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

export function setupShutdownHandlers(deps: ShutdownDeps) {
  const { httpServer } = deps;
  const activeHttpConnections = new Set<Socket>();
  let shuttingDown = false;

  httpServer.on('connection', (socket) => {
    activeHttpConnections.add(socket);
    socket.on('close', () => {
      activeHttpConnections.delete(socket);
    });
  });

  async function closeHttpServerWithDrain(timeoutMs: number): Promise<void> {
    if (!httpServer.listening) return;
    await new Promise<void>((resolve) => {
      let settled = false;
      const done = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve();
      };

      const timer = setTimeout(() => {
        logger.warn('shutdown.http_drain_timeout', {
          timeoutMs,
          openConnections: activeHttpConnections.size,
        });
        for (const socket of activeHttpConnections) {
          socket.destroy();
        }
        done();
      }, timeoutMs);
      timer.unref();

      httpServer.close((err) => {
        if (err) logger.error('shutdown.http_close_failed', { errorMessage: err.message });
        done();
      });
      httpServer.closeIdleConnections();
    });
  }

  async function runShutdownStep(label: string, deadlineAt: number, action: (budgetMs: number) => Promise<void>) {
    const budget = Math.max(0, deadlineAt - Date.now() - 250);
    if (budget <= 0) {
      logger.warn('shutdown.step_skipped', { step: label, reason: 'deadline_reached' });
      return;
    }
    try {
      await withTimeout(action(budget), budget, `shutdown_${label}`);
    } catch (error) {
      logger.warn(`shutdown.${label}_failed`, { errorMessage: errorMessage(error), timeoutMs: budget });
    }
  }

  async function shutdown(signal: NodeJS.Signals): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info('shutdown.start', {
      signal,
      timeoutMs: deps.shutdownTimeoutMs,
      httpDrainTimeoutMs: deps.httpDrainTimeoutMs,
    });

    const deadlineAt = Date.now() + deps.shutdownTimeoutMs;
    const timer = setTimeout(() => {
      logger.error('shutdown.timeout', { signal, timeoutMs: deps.shutdownTimeoutMs });
      process.exit(1);
    }, deps.shutdownTimeoutMs);
    timer.unref();

    // Stop taking requests first so nothing new is admitted while tasks are aborted.
    await runShutdownStep('http_drain', deadlineAt, (budgetMs) =>
      closeHttpServerWithDrain(Math.min(deps.httpDrainTimeoutMs, budgetMs))
    );

    await runShutdownStep('processing_stop', deadlineAt, async (budgetMs) => {
      const drained = await deps.stopProcessing(budgetMs);
      if (!drained) logger.warn('shutdown.processing_not_drained', { timeoutMs: budgetMs });
    });

    clearTimeout(timer);
    logger.info('shutdown.complete', { signal });
    process.exit(0);
  }

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}
