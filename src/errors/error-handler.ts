import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';

import { AppError } from './app-error.js';

interface ErrorBody {
  code: string;
  message: string;
  traceId: string;
  details?: unknown;
}

export function errorHandler(error: unknown, request: Request, response: Response, next: NextFunction): void {
  if (response.headersSent) {
    next(error);
    return;
  }

  const traceId = typeof response.locals.traceId === 'string' ? response.locals.traceId : 'unknown-trace';

  if (error instanceof AppError) {
    const payload: ErrorBody = {
      code: error.code,
      message: error.message,
      traceId
    };

    if (error.details !== undefined) {
      payload.details = error.details;
    }

    if (error.statusCode === 401) {
      response.setHeader('WWW-Authenticate', 'Bearer');
    }

    response.status(error.statusCode).json(payload);
    return;
  }

  if (error instanceof ZodError) {
    response.status(400).json({
      code: 'VALIDATION_ERROR',
      message: 'Request validation failed.',
      traceId,
      details: error.flatten()
    } satisfies ErrorBody);
    return;
  }

  if (error instanceof multer.MulterError) {
    response.status(400).json({
      code: 'UPLOAD_INVALID',
      message: `Upload rejected: ${error.message}`,
      traceId
    } satisfies ErrorBody);
    return;
  }

  if (error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed') {
    response.status(400).json({
      code: 'BODY_INVALID_JSON',
      message: 'Request body is not valid JSON.',
      traceId
    } satisfies ErrorBody);
    return;
  }

  console.error('unhandled_request_error', {
    traceId,
    method: request.method,
    path: request.path,
    error: error instanceof Error ? error.stack ?? error.message : String(error)
  });

  response.status(500).json({
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred.',
    traceId
  } satisfies ErrorBody);
}
