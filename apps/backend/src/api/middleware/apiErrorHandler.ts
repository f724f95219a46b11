import type { Request, Response, NextFunction } from 'express';
import type { ErrorResponse } from '@mediapress/api-contracts';
import { ZodError } from 'zod';
import { AppError, defaultErrorCodeForStatus, ERROR_MESSAGES } from '../../shared/errors.js';
import { logger } from '../../utils/logger.js';
import { validationErrorResponse } from './validation.js';

/** Status carried by body-parser and http-errors style errors. */
function statusOf(err: Error): number | null {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 600) {
    return err.status;
  }
  return null;
}

export function apiErrorHandler(err: Error, req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) {
    return next(err);
  }

  if (err instanceof AppError) {
    const response: ErrorResponse = {
      success: false,
      error: {
        code: err.code,
        message: err.message,
        ...(err.details ? { details: err.details } : {}),
      },
    };
    return res.status(err.status).json(response);
  }

  if (err instanceof ZodError) {
    return res.status(400).json(validationErrorResponse(err));
  }

  const status = statusOf(err);
  if (status !== null && status < 500) {
    const code = defaultErrorCodeForStatus(status);
    const response: ErrorResponse = { success: false, error: { code, message: ERROR_MESSAGES[code] } };
    return res.status(status).json(response);
  }

  logger.error('http.error', {
    method: req.method,
    path: req.path,
    errorName: err.name,
    errorMessage: err.message,
    // Stack can contain sensitive paths; keep it only outside production.
    ...(process.env.NODE_ENV === 'production' ? {} : { stack: err.stack }),
  });

  const response: ErrorResponse = {
    success: false,
    error: {
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    },
  };
  return res.status(500).json(response);
}
