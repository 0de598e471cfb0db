import 'dotenv/config';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8002),
  DATABASE_URL: z.string().trim().min(1, 'DATABASE_URL is required'),
  OPENAI_API_KEY: z.string().trim().min(1, 'OPENAI_API_KEY is required'),
  ALLOWED_ORIGINS: z.string().default('*'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(45000),
  LLM_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  LLM_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(500),
  MEMORY_RECALL_LIMIT: z.coerce.number().int().min(0).default(5),
  SERVICE_NAME: z.string().default('Memory Chat Gateway'),
  SERVICE_VERSION: z.string().default('1.0.0')
});

export interface AppConfig {
  port: number;
  databaseUrl: string;
  openAiApiKey: string;
  allowedOrigins: string[] | '*';
  llmTimeoutMs: number;
  llmMaxAttempts: number;
  llmRetryBaseDelayMs: number;
  memoryRecallLimit: number;
  serviceName: string;
  serviceVersion: string;
}

/**
 * Reads the process configuration once. Missing credentials fail here, at startup,
 * instead of on the first chat request.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const missing = parsed.error.issues.map((issue) => issue.path.join('.'));
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid configuration (${details})`, missing);
  }

  const values = parsed.data;
  const origins = values.ALLOWED_ORIGINS.split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

  return {
    port: values.PORT,
    databaseUrl: values.DATABASE_URL,
    openAiApiKey: values.OPENAI_API_KEY,
    allowedOrigins: origins.length === 0 || origins.includes('*') ? '*' : origins,
    llmTimeoutMs: values.LLM_TIMEOUT_MS,
    llmMaxAttempts: values.LLM_MAX_ATTEMPTS,
    llmRetryBaseDelayMs: values.LLM_RETRY_BASE_DELAY_MS,
    memoryRecallLimit: values.MEMORY_RECALL_LIMIT,
    serviceName: values.SERVICE_NAME,
    serviceVersion: values.SERVICE_VERSION
  };
}
