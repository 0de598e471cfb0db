import { setTimeout as delay } from 'node:timers/promises';
import type {
  ChatMessage,
  CompletionOptions,
  CompletionResult,
  EngineClient,
  EngineConnection,
  EngineOptions,
  LLMClient,
  MemoryExchange
} from '../memory/types.js';

export class FakeConnection implements EngineConnection {
  readonly recorded: MemoryExchange[] = [];
  released = false;

  constructor(
    readonly options: EngineOptions,
    private readonly recalled: string | null
  ) {}

  get namespace() {
    return this.options.namespace;
  }

  async prepare(messages: ChatMessage[]) {
    if (this.released) {
      throw new Error('released');
    }
    if (!this.recalled) {
      return messages;
    }
    return [{ role: 'system' as const, content: this.recalled }, ...messages];
  }

  async record(exchange: MemoryExchange) {
    this.recorded.push(exchange);
  }

  release() {
    this.released = true;
  }
}

export class FakeEngine implements EngineClient {
  readonly connections: FakeConnection[] = [];
  failWith: Error | null = null;
  recalled: string | null = null;
  closed = false;

  async ingestAndEnable(options: EngineOptions) {
    if (this.failWith) {
      throw this.failWith;
    }
    const connection = new FakeConnection(options, this.recalled);
    this.connections.push(connection);
    return connection;
  }

  async close() {
    this.closed = true;
  }
}

export interface RecordedCompletion {
  model: string;
  messages: ChatMessage[];
  options?: CompletionOptions;
}

type Responder = (
  model: string,
  messages: ChatMessage[],
  options?: CompletionOptions
) => Promise<CompletionResult> | CompletionResult;

export class FakeLLM implements LLMClient {
  readonly calls: RecordedCompletion[] = [];

  constructor(private readonly responder: Responder = () => reply('ok')) {}

  async complete(model: string, messages: ChatMessage[], options?: CompletionOptions) {
    this.calls.push({ model, messages, options });
    return this.responder(model, messages, options);
  }
}

export function reply(content: string, promptTokens = 3, completionTokens = 2): CompletionResult {
  return {
    content,
    usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens }
  };
}

export async function delayedReply(ms: number, content: string) {
  await delay(ms);
  return reply(content);
}

export const TEST_DATABASE_URL = 'postgres://user:pw@host:5432/dbname';
export const TEST_API_KEY = 'test-secret';

export async function waitFor(condition: () => boolean, timeoutMs = 2000) {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error(`condition not met within ${timeoutMs}ms`);
    }
    await delay(10);
  }
}
