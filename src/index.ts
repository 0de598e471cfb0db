import type { Server } from 'node:http';
import { loadConfig } from './config.js';
import { createPool, waitForDb } from './db.js';
import { createApp } from './app.js';
import { PgMemoryEngine } from './memory/PgMemoryEngine.js';
import { createOpenAIClient, isRetryableLLMError } from './llm/openaiClient.js';
import { RetryStrategy } from './runtime/RetryStrategy.js';
import { createMemoryChatRegistry } from './services/ServiceRegistry.js';

async function bootstrap() {
  const config = loadConfig();
  console.log(`[bootstrap] ${config.serviceName} starting...`);
  console.log(`[bootstrap] database: ${config.databaseUrl.slice(0, 50)}...`);
  console.log(`[bootstrap] OpenAI: ${config.openAiApiKey ? 'configured' : 'not configured'}`);

  const pool = createPool(config.databaseUrl);
  await waitForDb(pool);
  const engine = new PgMemoryEngine({ db: pool, recallLimit: config.memoryRecallLimit });

  const registry = createMemoryChatRegistry({
    databaseUrl: config.databaseUrl,
    apiKey: config.openAiApiKey,
    engine,
    llmFactory: createOpenAIClient,
    timeoutMs: config.llmTimeoutMs,
    retry: new RetryStrategy({
      maxAttempts: config.llmMaxAttempts,
      baseDelayMs: config.llmRetryBaseDelayMs,
      isRetryable: isRetryableLLMError,
    }),
  });

  const app = createApp({
    registry,
    serviceName: config.serviceName,
    serviceVersion: config.serviceVersion,
    allowedOrigins: config.allowedOrigins,
  });

  const server: Server = app.listen(config.port, () => {
    console.log(`[bootstrap] listening on port ${config.port}`);
  });

  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`[bootstrap] ${signal} received, shutting down...`);
    server.close((error) => {
      if (error) {
        console.error('[bootstrap] failed to close HTTP server', error);
      }
      engine
        .close()
        .then(() => process.exit(error ? 1 : 0))
        .catch((closeError: unknown) => {
          console.error('[bootstrap] failed to close memory engine', closeError);
          process.exit(1);
        });
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

bootstrap().catch((error) => {
  console.error('Failed to bootstrap server', error);
  process.exit(1);
});
