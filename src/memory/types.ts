export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface CompletionResult {
  content: string;
  usage: TokenUsage;
}

export interface CompletionOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface LLMClient {
  complete(model: string, messages: ChatMessage[], options?: CompletionOptions): Promise<CompletionResult>;
}

export type LLMClientFactory = (apiKey: string) => LLMClient;

export interface EngineOptions {
  namespace: string;
  /** Keep a short-term record of every exchange. */
  consciousIngest: boolean;
  /** Recall prior exchanges of the namespace before each call. */
  autoIngest: boolean;
}

export interface MemoryExchange {
  userMessage: string;
  assistantMessage: string;
  model: string;
  usage: TokenUsage;
}

export interface EngineConnection {
  readonly namespace: string;
  prepare(messages: ChatMessage[]): Promise<ChatMessage[]>;
  record(exchange: MemoryExchange): Promise<void>;
  release(): void;
}

export interface EngineClient {
  ingestAndEnable(options: EngineOptions): Promise<EngineConnection>;
  close(): Promise<void>;
}

export type ChatResult =
  | {
      success: true;
      response: string;
      model: string;
      namespace: string;
      usage: TokenUsage;
    }
  | {
      success: false;
      error: string;
      namespace: string;
    };

export interface MemoryStats {
  namespace: string;
  database: string;
  status: 'active';
}
