import { getRequestContext } from './asyncContext.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

const SERVICE = 'mediapress';

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in levelOrder;
}

function minLevel(): LogLevel {
  const raw = String(process.env.LOG_LEVEL || '').toLowerCase();
  if (isLogLevel(raw)) return raw;
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

export function isLevelEnabled(level: LogLevel): boolean {
  return levelOrder[level] >= levelOrder[minLevel()];
}

/** Error values in meta become `{ name, message }`; JSON.stringify would drop them to `{}`. */
function normalizeMeta(meta: LogMeta): LogMeta {
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    if (value === undefined) continue;
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
}

function contextFields(): LogMeta {
  const ctx = getRequestContext();
  if (!ctx) return {};
  return ctx.taskIds.length > 0 ? { requestId: ctx.requestId, taskIds: [...ctx.taskIds] } : { requestId: ctx.requestId };
}

export function formatLogLine(level: LogLevel, event: string, meta: LogMeta = {}): string {
  const payload = {
    ts: new Date().toISOString(),
    level,
    service: SERVICE,
    event,
    ...contextFields(),
    ...normalizeMeta(meta),
  };
  try {
    return JSON.stringify(payload) + '\n';
  } catch {
    return JSON.stringify({ ts: payload.ts, level, service: SERVICE, event, error: 'LOG_SERIALIZATION_FAILED' }) + '\n';
  }
}

export function log(level: LogLevel, event: string, meta: LogMeta = {}): void {
  if (!isLevelEnabled(level)) return;
  const line = formatLogLine(level, event, meta);
  // stdout/stderr directly so console overrides do not reroute log lines.
  if (level === 'error') {
    process.stderr.write(line);
  } else {
    process.stdout.write(line);
  }
}

export const logger = {
  debug: (event: string, meta?: LogMeta) => log('debug', event, meta),
  info: (event: string, meta?: LogMeta) => log('info', event, meta),
  warn: (event: string, meta?: LogMeta) => log('warn', event, meta),
  error: (event: string, meta?: LogMeta) => log('error', event, meta),
};

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
