import express from 'express';
import cors from 'cors';
import { requestContext } from './middleware/requestContext.js';
import { apiErrorHandler } from './middleware/apiErrorHandler.js';
import { metricsHandler, requestCounter } from './metrics.js';
import { buildChatRouter } from './routes/chat.js';
import { buildMemoryRouter } from './routes/memory.js';
import type { MemoryChatRegistry } from './services/ServiceRegistry.js';

export interface AppOptions {
  registry: MemoryChatRegistry;
  serviceName: string;
  serviceVersion: string;
  allowedOrigins: string[] | '*';
}

export function createApp(options: AppOptions) {
  const app = express();
  const { registry, serviceName, serviceVersion } = options;

  app.use(
    cors({
      origin: options.allowedOrigins,
      credentials: options.allowedOrigins !== '*',
    }),
  );
  app.use(express.json());
  app.use(requestContext);

  app.use((req, _res, next) => {
    requestCounter.inc({ route: req.path, method: req.method });
    next();
  });

  app.get('/', (_req, res) => {
    res.json({ status: 'online', service: serviceName, version: serviceVersion });
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy', service: serviceName, version: serviceVersion });
  });

  app.get('/metrics', metricsHandler());

  app.use('/chat', buildChatRouter(registry));
  app.use('/memory', buildMemoryRouter(registry));

  app.use(apiErrorHandler);

  return app;
}
