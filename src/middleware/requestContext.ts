import { randomUUID } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';

export function requestContext(req: Request, res: Response, next: NextFunction) {
  const requestId = (req.header('x-request-id') ?? '').trim() || randomUUID();
  const startedAt = Date.now();

  req.context = { requestId, startedAt };
  res.setHeader('X-Request-Id', requestId);

  res.on('finish', () => {
    console.log({
      level: 'info',
      event: 'request.completed',
      requestId,
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      latencyMs: Date.now() - startedAt,
    });
  });

  next();
}
