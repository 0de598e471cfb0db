import { ConfigurationError, errorMessage } from '../errors.js';
import { RetryStrategy } from '../runtime/RetryStrategy.js';
import { deriveServiceKey, describeDatabase } from '../memory/serviceKey.js';
import type {
  ChatMessage,
  ChatResult,
  CompletionResult,
  EngineClient,
  EngineConnection,
  EngineOptions,
  LLMClient,
  LLMClientFactory,
  MemoryStats
} from '../memory/types.js';

export const DEFAULT_MODEL = 'gpt-4o-mini';

export interface MemoryChatServiceOptions {
  namespace: string;
  databaseUrl: string;
  apiKey: string;
  engine: EngineClient;
  llmFactory: LLMClientFactory;
  retry?: RetryStrategy;
  timeoutMs?: number;
}

export interface ChatRequest {
  message: string;
  userId?: string | null;
  model?: string;
  systemPrompt?: string | null;
  signal?: AbortSignal;
}

const LOG_PREFIX = '[memory-chat]';

/**
 * One namespace's view of the memory engine and the LLM. A `userId` narrows a single
 * call to `<namespace>_user_<userId>` through a connection scoped to that call; the
 * service's own namespace never changes.
 */
export class MemoryChatService {
  readonly namespace: string;
  private readonly databaseUrl: string;
  private readonly apiKey: string;
  private readonly engine: EngineClient;
  private readonly llmFactory: LLMClientFactory;
  private readonly retry: RetryStrategy;
  private readonly timeoutMs?: number;

  private llmClient: LLMClient | null = null;
  private baseConnection: Promise<EngineConnection> | null = null;

  constructor(options: MemoryChatServiceOptions) {
    const missing = [
      options.databaseUrl ? null : 'databaseUrl',
      options.apiKey ? null : 'apiKey'
    ].filter((key): key is string => key !== null);
    if (missing.length > 0) {
      throw new ConfigurationError(`Memory chat service is missing ${missing.join(', ')}`, missing);
    }

    this.namespace = options.namespace;
    this.databaseUrl = options.databaseUrl;
    this.apiKey = options.apiKey;
    this.engine = options.engine;
    this.llmFactory = options.llmFactory;
    this.retry = options.retry ?? new RetryStrategy({ maxAttempts: 1 });
    this.timeoutMs = options.timeoutMs;

    console.log(`${LOG_PREFIX} service initialised with namespace: ${this.namespace}`);
  }

  async chat(request: ChatRequest): Promise<ChatResult> {
    const { message, userId, systemPrompt, signal } = request;
    const model = request.model || DEFAULT_MODEL;
    const scoped = Boolean(userId);
    const namespace = scoped ? deriveServiceKey(this.namespace, userId) : this.namespace;

    const llm = this.ensureLLMClient();
    const connection = scoped
      ? await this.engine.ingestAndEnable(this.engineOptions(namespace))
      : await this.ensureBaseConnection();

    try {
      const messages: ChatMessage[] = [];
      if (systemPrompt) {
        messages.push({ role: 'system', content: systemPrompt });
      }
      messages.push({ role: 'user', content: message });

      let completion: CompletionResult;
      try {
        const prepared = await connection.prepare(messages);
        completion = await this.retry.execute(
          () => llm.complete(model, prepared, { signal, timeoutMs: this.timeoutMs }),
          (error, attempt) => {
            console.warn(`${LOG_PREFIX} completion attempt ${attempt} failed`, { namespace, model, error: errorMessage(error) });
          },
          signal
        );
      } catch (error) {
        console.error(`${LOG_PREFIX} chat error - namespace: ${namespace}`, errorMessage(error));
        return { success: false, error: errorMessage(error), namespace };
      }

      try {
        await connection.record({
          userMessage: message,
          assistantMessage: completion.content,
          model,
          usage: completion.usage
        });
      } catch (error) {
        console.warn(`${LOG_PREFIX} failed to record exchange - namespace: ${namespace}`, errorMessage(error));
      }

      console.log(`${LOG_PREFIX} chat successful - namespace: ${namespace}, tokens: ${completion.usage.totalTokens}`);
      return {
        success: true,
        response: completion.content,
        model,
        namespace,
        usage: completion.usage
      };
    } finally {
      if (scoped) {
        connection.release();
      }
    }
  }

  async stats(): Promise<MemoryStats> {
    await this.ensureBaseConnection();
    return {
      namespace: this.namespace,
      database: describeDatabase(this.databaseUrl),
      status: 'active'
    };
  }

  private engineOptions(namespace: string): EngineOptions {
    return { namespace, consciousIngest: true, autoIngest: true };
  }

  private ensureLLMClient(): LLMClient {
    if (!this.llmClient) {
      this.llmClient = this.llmFactory(this.apiKey);
      console.log(`${LOG_PREFIX} LLM client initialised`);
    }
    return this.llmClient;
  }

  private ensureBaseConnection(): Promise<EngineConnection> {
    if (!this.baseConnection) {
      this.baseConnection = this.engine.ingestAndEnable(this.engineOptions(this.namespace)).catch((error: unknown) => {
        this.baseConnection = null;
        throw error;
      });
    }
    return this.baseConnection;
  }
}
