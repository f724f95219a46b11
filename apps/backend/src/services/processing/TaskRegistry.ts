import { randomUUID } from 'crypto';
import type { CompressionOutcomeDto, QualityTier, TaskState, TaskSummary } from '@mediapress/api-contracts';

export type TaskRecord = {
  id: string;
  sourceKey: string;
  destKey: string;
  compress: boolean;
  tier: QualityTier;
  state: TaskState;
  history: Array<{ state: TaskState; at: Date }>;
  outcome?: CompressionOutcomeDto;
  errorMessage?: string;
  queuedAt: Date;
  finishedAt?: Date;
};

const TRANSITIONS: Readonly<Record<TaskState, readonly TaskState[]>> = {
  pending: ['downloading', 'cleaning_up'],
  downloading: ['compressing', 'uploading', 'cleaning_up'],
  compressing: ['uploading', 'cleaning_up'],
  uploading: ['cleaning_up'],
  cleaning_up: ['done', 'failed'],
  done: [],
  failed: [],
};

export function isTerminalState(state: TaskState): boolean {
  return state === 'done' || state === 'failed';
}

export class InvalidTransitionError extends Error {
  constructor(from: TaskState, to: TaskState) {
    super(`Invalid task transition: ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

/** In-memory task history for this process. Finished records beyond `maxFinished` are evicted oldest first. */
export class TaskRegistry {
  private readonly tasks = new Map<string, TaskRecord>();
  private readonly latestBySource = new Map<string, string>();
  private readonly maxFinished: number;

  constructor(opts: { maxFinished?: number } = {}) {
    this.maxFinished = opts.maxFinished ?? 1000;
  }

  create(params: { sourceKey: string; destKey: string; compress: boolean; tier: QualityTier }): TaskRecord {
    const now = new Date();
    const record: TaskRecord = {
      id: randomUUID(),
      ...params,
      state: 'pending',
      history: [{ state: 'pending', at: now }],
      queuedAt: now,
    };
    this.tasks.set(record.id, record);
    this.latestBySource.set(params.sourceKey, record.id);
    return record;
  }

  get(id: string): TaskRecord | null {
    return this.tasks.get(id) ?? null;
  }

  latestForSource(sourceKey: string): TaskRecord | null {
    const id = this.latestBySource.get(sourceKey);
    return id ? this.get(id) : null;
  }

  transition(id: string, to: TaskState, patch: Pick<TaskRecord, 'outcome' | 'errorMessage'> = {}): TaskRecord {
    const record = this.tasks.get(id);
    if (!record) throw new Error(`Unknown task: ${id}`);
    if (!TRANSITIONS[record.state].includes(to)) {
      throw new InvalidTransitionError(record.state, to);
    }

    const now = new Date();
    record.state = to;
    record.history.push({ state: to, at: now });
    if (patch.outcome) record.outcome = patch.outcome;
    if (patch.errorMessage) record.errorMessage = patch.errorMessage;
    if (isTerminalState(to)) {
      record.finishedAt = now;
      this.evictFinished();
    }
    return record;
  }

  /** Drops a record that never ran (admission was refused). */
  discard(id: string): void {
    const record = this.tasks.get(id);
    if (!record) return;
    this.tasks.delete(id);
    if (this.latestBySource.get(record.sourceKey) === id) {
      this.latestBySource.delete(record.sourceKey);
    }
  }

  size(): number {
    return this.tasks.size;
  }

  private evictFinished(): void {
    const finished = [...this.tasks.values()].filter((r) => isTerminalState(r.state));
    const excess = finished.length - this.maxFinished;
    if (excess <= 0) return;
    // Map iteration order is insertion order, so the first records are the oldest.
    for (const record of finished.slice(0, excess)) {
      this.discard(record.id);
    }
  }
}

export function toTaskSummary(record: TaskRecord): TaskSummary {
  return {
    id: record.id,
    destKey: record.destKey,
    state: record.state,
    tier: record.tier,
    compress: record.compress,
    queuedAt: record.queuedAt.toISOString(),
    finishedAt: record.finishedAt ? record.finishedAt.toISOString() : null,
    outcome: record.outcome ?? null,
    errorMessage: record.errorMessage ?? null,
  };
}
