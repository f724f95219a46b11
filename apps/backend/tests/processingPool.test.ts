import { describe, expect, it } from 'vitest';
import { PoolShutdownError, ProcessingPool, TaskTimeoutError } from '../src/services/processing/ProcessingPool.js';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 10));

function untilAborted(signal: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    if (signal.aborted) resolve();
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

describe('ProcessingPool', () => {
  it('runs at most `concurrency` tasks at once', async () => {
    const pool = new ProcessingPool({ concurrency: 2, maxQueue: 10, taskTimeoutMs: 5_000 });
    let running = 0;
    let peak = 0;
    const gates = [deferred(), deferred(), deferred()];

    gates.forEach((gate, i) => {
      pool.submit(`t${i}`, async () => {
        running += 1;
        peak = Math.max(peak, running);
        await gate.promise;
        running -= 1;
      });
    });

    await tick();
    expect(pool.stats()).toEqual({ concurrency: 2, running: 2, queued: 1 });

    gates.forEach((gate) => gate.resolve());
    await pool.drain();
    expect(peak).toBe(2);
    expect(pool.stats()).toEqual({ concurrency: 2, running: 0, queued: 0 });
  });

  it('refuses an id that is already in flight', async () => {
    const pool = new ProcessingPool({ concurrency: 1, maxQueue: 10, taskTimeoutMs: 5_000 });
    const gate = deferred();
    expect(pool.submit('same', () => gate.promise)).toBe('accepted');
    expect(pool.submit('same', async () => undefined)).toBe('duplicate');
    expect(pool.has('same')).toBe(true);
    gate.resolve();
    await pool.drain();
    expect(pool.has('same')).toBe(false);
    expect(pool.submit('same', async () => undefined)).toBe('accepted');
    await pool.drain();
  });

  it('rejects work beyond the queue bound', async () => {
    const pool = new ProcessingPool({ concurrency: 1, maxQueue: 1, taskTimeoutMs: 5_000 });
    const gate = deferred();
    expect(pool.submit('a', () => gate.promise)).toBe('accepted');
    expect(pool.submit('b', () => gate.promise)).toBe('accepted');
    expect(pool.submit('c', () => gate.promise)).toBe('queue_full');
    gate.resolve();
    await pool.drain();
  });

  it('keeps running after a task throws', async () => {
    const pool = new ProcessingPool({ concurrency: 1, maxQueue: 10, taskTimeoutMs: 5_000 });
    const ran: string[] = [];
    pool.submit('bad', async () => {
      throw new Error('boom');
    });
    pool.submit('good', async () => {
      ran.push('good');
    });
    await pool.drain();
    expect(ran).toEqual(['good']);
  });

  it('aborts a task that exceeds its timeout', async () => {
    const pool = new ProcessingPool({ concurrency: 1, maxQueue: 10, taskTimeoutMs: 20 });
    let reason: unknown = null;
    pool.submit('slow', async (signal) => {
      await untilAborted(signal);
      reason = signal.reason;
    });
    await pool.drain();
    expect(reason).toBeInstanceOf(TaskTimeoutError);
    expect(reason instanceof Error ? reason.message : '').toBe('task_timeout_20');
  });

  it('aborts queued and running work on shutdown and closes admission', async () => {
    const pool = new ProcessingPool({ concurrency: 1, maxQueue: 10, taskTimeoutMs: 60_000 });
    const reasons: unknown[] = [];
    const task = async (signal: AbortSignal) => {
      await untilAborted(signal);
      reasons.push(signal.reason);
    };
    pool.submit('a', task);
    pool.submit('b', task);

    await expect(pool.shutdown(1_000)).resolves.toBe(true);
    expect(reasons).toHaveLength(2);
    expect(reasons.every((r) => r instanceof PoolShutdownError)).toBe(true);
    expect(pool.submit('c', task)).toBe('closed');
  });

  it('reports a shutdown that outlives its deadline', async () => {
    const pool = new ProcessingPool({ concurrency: 1, maxQueue: 10, taskTimeoutMs: 60_000 });
    const gate = deferred();
    pool.submit('stuck', () => gate.promise);

    await expect(pool.shutdown(10)).resolves.toBe(false);
    gate.resolve();
    await pool.drain();
  });
});
