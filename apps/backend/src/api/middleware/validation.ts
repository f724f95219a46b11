import type { NextFunction, Request, RequestHandler } from 'express';
import { ZodError, type ZodType, type ZodTypeDef } from 'zod';
import type { ErrorResponse } from '@mediapress/api-contracts';

interface ValidationSchemas<TParams, TQuery, TBody> {
  params?: ZodType<TParams, ZodTypeDef, unknown>;
  query?: ZodType<TQuery, ZodTypeDef, unknown>;
  body?: ZodType<TBody, ZodTypeDef, unknown>;
}

export function validationErrorResponse(error: ZodError): ErrorResponse {
  return {
    success: false,
    error: {
      code: 'VALIDATION_ERROR',
      message: 'Invalid request data',
      details: {
        issues: error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      },
    },
  };
}

export function validateRequest<
  TParams = Request['params'],
  TQuery = Request['query'],
  TBody = unknown,
  TResBody = unknown
>(
  schemas: ValidationSchemas<TParams, TQuery, TBody>
): RequestHandler<TParams, TResBody | ErrorResponse, TBody, TQuery> {
  return (req, res, next: NextFunction) => {
    try {
      if (schemas.params) {
        req.params = schemas.params.parse(req.params);
      }
      if (schemas.query) {
        req.query = schemas.query.parse(req.query);
      }
      if (schemas.body) {
        req.body = schemas.body.parse(req.body);
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        res.status(400).json(validationErrorResponse(error));
        return;
      }
      next(error);
    }
  };
}
