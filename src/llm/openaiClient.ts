import OpenAI, { type ClientOptions } from 'openai';
import type { ChatMessage, CompletionOptions, CompletionResult, LLMClient } from '../memory/types.js';

const RETRYABLE_STATUS = new Set([408, 409, 429]);

function toParams(messages: ChatMessage[]): OpenAI.Chat.Completions.ChatCompletionMessageParam[] {
  return messages.map((message) => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'assistant':
        return { role: 'assistant', content: message.content };
      default:
        return { role: 'user', content: message.content };
    }
  });
}

export type OpenAIChatClientOptions = Omit<ClientOptions, 'apiKey' | 'maxRetries'>;

export class OpenAIChatClient implements LLMClient {
  private readonly client: OpenAI;

  constructor(apiKey: string, clientOptions: OpenAIChatClientOptions = {}) {
    // Retries are owned by the caller's RetryStrategy.
    this.client = new OpenAI({ ...clientOptions, apiKey, maxRetries: 0 });
  }

  async complete(model: string, messages: ChatMessage[], options: CompletionOptions = {}): Promise<CompletionResult> {
    const response = await this.client.chat.completions.create(
      {
        model,
        messages: toParams(messages),
      },
      {
        signal: options.signal,
        // The SDK rejects a `timeout` key that is present but undefined.
        ...(options.timeoutMs !== undefined ? { timeout: options.timeoutMs } : {}),
      },
    );

    return {
      content: response.choices?.[0]?.message?.content ?? '',
      usage: {
        promptTokens: response.usage?.prompt_tokens ?? 0,
        completionTokens: response.usage?.completion_tokens ?? 0,
        totalTokens: response.usage?.total_tokens ?? 0,
      },
    };
  }
}

export function createOpenAIClient(apiKey: string): LLMClient {
  return new OpenAIChatClient(apiKey);
}

export function isRetryableLLMError(error: unknown): boolean {
  if (error instanceof OpenAI.APIUserAbortError) {
    return false;
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return true;
  }
  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    return typeof status === 'number' && (RETRYABLE_STATUS.has(status) || status >= 500);
  }
  return false;
}
