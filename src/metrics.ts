import client from 'prom-client';
import type { Request, Response } from 'express';

client.collectDefaultMetrics();

export const requestCounter = new client.Counter({
  name: 'requests_total',
  help: 'Total HTTP requests',
  labelNames: ['route', 'method'],
});

export const errorCounter = new client.Counter({
  name: 'errors_total',
  help: 'Total HTTP errors',
  labelNames: ['route', 'method', 'status'],
});

export const tokensConsumed = new client.Counter({
  name: 'tokens_consumed_total',
  help: 'Total tokens consumed across model calls',
});

export const chatRequests = new client.Counter({
  name: 'chat_requests_total',
  help: 'Chat calls handled by the memory chat service',
  labelNames: ['outcome'],
});

export function metricsHandler() {
  return async (_req: Request, res: Response) => {
    res.set('Content-Type', client.register.contentType);
    res.end(await client.register.metrics());
  };
}
