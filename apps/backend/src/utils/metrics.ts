import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

const registry = new Registry();
collectDefaultMetrics({ register: registry, prefix: 'mediapress_' });

const httpRequestDuration = new Histogram({
  name: 'mediapress_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status'],
  buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [registry],
});

const compressionTotal = new Counter({
  name: 'mediapress_compression_total',
  help: 'Compression attempts by media kind, winning method and result',
  labelNames: ['kind', 'method', 'success'],
  registers: [registry],
});

const compressionSavedBytes = new Counter({
  name: 'mediapress_compression_saved_bytes_total',
  help: 'Bytes saved by successful compressions',
  labelNames: ['kind'],
  registers: [registry],
});

const processingTasksTotal = new Counter({
  name: 'mediapress_processing_tasks_total',
  help: 'Processing tasks by terminal state',
  labelNames: ['state'],
  registers: [registry],
});

const processingPool = new Gauge({
  name: 'mediapress_processing_pool',
  help: 'Processing pool occupancy',
  labelNames: ['state'],
  registers: [registry],
});

export function recordHttpRequest(params: { method: string; route: string; status: number; durationSeconds: number }) {
  httpRequestDuration.observe(
    { method: params.method, route: params.route, status: String(params.status) },
    params.durationSeconds
  );
}

export function recordCompression(params: {
  kind: string;
  method: string;
  success: boolean;
  originalSize: number;
  resultSize: number;
}) {
  compressionTotal.inc({ kind: params.kind, method: params.method, success: params.success ? 'true' : 'false' });
  if (params.success && params.resultSize < params.originalSize) {
    compressionSavedBytes.inc({ kind: params.kind }, params.originalSize - params.resultSize);
  }
}

export function recordProcessingTask(state: 'done' | 'failed') {
  processingTasksTotal.inc({ state });
}

export function setProcessingPoolMetrics(params: { running: number; queued: number }) {
  processingPool.set({ state: 'running' }, params.running);
  processingPool.set({ state: 'queued' }, params.queued);
}

export function metricsRegistry(): Registry {
  return registry;
}
