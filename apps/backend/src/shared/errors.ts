import type { ApiErrorCode } from '@mediapress/api-contracts';

export const ERROR_CODES = {
  BAD_REQUEST: 'BAD_REQUEST',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  STORAGE_UNAVAILABLE: 'STORAGE_UNAVAILABLE',
  TOO_MANY_REQUESTS: 'TOO_MANY_REQUESTS',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const satisfies Record<ApiErrorCode, ApiErrorCode>;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  BAD_REQUEST: 'Bad request',
  VALIDATION_ERROR: 'Invalid request data',
  NOT_FOUND: 'Not found',
  STORAGE_UNAVAILABLE: 'Object storage is unavailable',
  TOO_MANY_REQUESTS: 'Too many requests',
  INTERNAL_ERROR: 'Internal server error',
};

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  BAD_REQUEST: 400,
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  STORAGE_UNAVAILABLE: 503,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_ERROR: 500,
};

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly status: number;
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message?: string, opts?: { details?: Record<string, unknown>; status?: number }) {
    super(message || ERROR_MESSAGES[code]);
    this.name = 'AppError';
    this.code = code;
    this.status = opts?.status ?? STATUS_BY_CODE[code];
    this.details = opts?.details;
  }
}

export function defaultErrorCodeForStatus(status: number): ErrorCode {
  // Other 4xx raised by body parsing (413, 415) keep their status under BAD_REQUEST.
  if (status === 400 || status === 413 || status === 415) return ERROR_CODES.BAD_REQUEST;
  if (status === 404) return ERROR_CODES.NOT_FOUND;
  if (status === 429) return ERROR_CODES.TOO_MANY_REQUESTS;
  if (status === 503) return ERROR_CODES.STORAGE_UNAVAILABLE;
  return ERROR_CODES.INTERNAL_ERROR;
}
