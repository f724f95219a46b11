import { Semaphore } from '../../utils/semaphore.js';
import { logger, errorMessage } from '../../utils/logger.js';
import { setProcessingPoolMetrics } from '../../utils/metrics.js';

export type PoolTask = (signal: AbortSignal) => Promise<void>;

export type SubmitResult = 'accepted' | 'duplicate' | 'queue_full' | 'closed';

export type ProcessingPoolOptions = {
  concurrency: number;
  maxQueue: number;
  taskTimeoutMs: number;
};

export type PoolStats = {
  concurrency: number;
  running: number;
  queued: number;
};

export class TaskTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`task_timeout_${timeoutMs}`);
    this.name = 'TaskTimeoutError';
  }
}

export class PoolShutdownError extends Error {
  constructor() {
    super('pool_shutdown');
    this.name = 'PoolShutdownError';
  }
}

type Entry = {
  controller: AbortController;
  done: Promise<void>;
};

/**
 * Bounded in-process worker pool. Tasks are keyed by id; an id already in flight is
 * not admitted twice. Each task receives a signal that aborts on timeout or shutdown.
 */
export class ProcessingPool {
  private readonly semaphore: Semaphore;
  private readonly maxQueue: number;
  private readonly taskTimeoutMs: number;
  private readonly entries = new Map<string, Entry>();
  private pending = 0;
  private active = 0;
  private closed = false;

  constructor(opts: ProcessingPoolOptions) {
    this.semaphore = new Semaphore(opts.concurrency);
    this.maxQueue = Math.max(0, Math.floor(opts.maxQueue));
    this.taskTimeoutMs = opts.taskTimeoutMs;
  }

  stats(): PoolStats {
    return { concurrency: this.semaphore.limit, running: this.active, queued: this.pending };
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  submit(id: string, task: PoolTask): SubmitResult {
    if (this.closed) return 'closed';
    if (this.entries.has(id)) return 'duplicate';

    const freeSlots = this.semaphore.limit - this.active;
    const waitingAfterAdmit = this.pending + 1 - freeSlots;
    if (waitingAfterAdmit > this.maxQueue) {
      logger.warn('processing.pool.queue_full', { id, ...this.stats(), maxQueue: this.maxQueue });
      return 'queue_full';
    }

    const controller = new AbortController();
    this.pending += 1;
    this.publishMetrics();

    const done = this.run(id, task, controller).catch((error: unknown) => {
      logger.error('processing.pool.internal_error', { id, errorMessage: errorMessage(error) });
    });
    this.entries.set(id, { controller, done });
    return 'accepted';
  }

  /** Resolves once nothing is queued or running. */
  async drain(): Promise<void> {
    while (this.entries.size > 0) {
      await Promise.all([...this.entries.values()].map((entry) => entry.done));
    }
  }

  /**
   * Stops admitting work, aborts every queued and running task and waits up to
   * `timeoutMs` for them to finish. Returns false when the wait timed out.
   */
  async shutdown(timeoutMs: number): Promise<boolean> {
    this.closed = true;
    for (const entry of this.entries.values()) {
      entry.controller.abort(new PoolShutdownError());
    }

    let timer: NodeJS.Timeout | null = null;
    try {
      return await Promise.race([
        this.drain().then(() => true),
        new Promise<boolean>((resolve) => {
          timer = setTimeout(() => resolve(false), timeoutMs);
        }),
      ]);
    } finally {
      if (timer) clearTimeout(timer);
    }
  }

  private async run(id: string, task: PoolTask, controller: AbortController): Promise<void> {
    const release = await this.semaphore.acquire();
    this.pending -= 1;
    this.active += 1;
    this.publishMetrics();

    const timer = setTimeout(() => controller.abort(new TaskTimeoutError(this.taskTimeoutMs)), this.taskTimeoutMs);
    try {
      await task(controller.signal);
    } catch (error) {
      logger.error('processing.pool.task_failed', { id, errorMessage: errorMessage(error) });
    } finally {
      clearTimeout(timer);
      this.active -= 1;
      release();
      this.entries.delete(id);
      this.publishMetrics();
    }
  }

  private publishMetrics(): void {
    setProcessingPoolMetrics({ running: this.active, queued: this.pending });
  }
}
