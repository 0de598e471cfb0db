import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { errorCounter } from '../metrics.js';

interface HttpErrorLike extends Error {
  status?: number;
  details?: unknown;
}

function toHttpError(err: unknown): HttpErrorLike {
  if (err instanceof ZodError) {
    return Object.assign(new Error('Invalid request'), { status: 400, details: err.issues });
  }
  if (err instanceof Error) {
    return err;
  }
  return new Error(String(err));
}

export function apiErrorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const error = toHttpError(err);
  const status = typeof error.status === 'number' ? error.status : 500;
  const requestId = req.context?.requestId ?? 'unknown';
  const message = status >= 500 ? 'Internal Server Error' : error.message;

  errorCounter.inc({ route: req.path, method: req.method, status });
  console.error({
    level: 'error',
    event: 'api.error',
    requestId,
    status,
    endpoint: req.originalUrl,
    method: req.method,
    latencyMs: Date.now() - (req.context?.startedAt ?? Date.now()),
    error: {
      message: error.message,
      stack: error.stack,
      details: error.details ?? null,
    },
  });

  res.status(status).json({
    error: message,
    requestId,
    details: error.details ?? error.message,
  });
}
