import { z } from 'zod';
import type {
  ChatMessage,
  EngineClient,
  EngineConnection,
  EngineOptions,
  MemoryExchange
} from './types.js';

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface EngineDatabase extends Queryable {
  end(): Promise<void>;
}

export interface PgMemoryEngineOptions {
  db: EngineDatabase;
  recallLimit?: number;
}

const DEFAULT_RECALL_LIMIT = 5;
const MAX_RECALLED_CHARS = 500;

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS memory_exchanges (
    id BIGSERIAL PRIMARY KEY,
    namespace TEXT NOT NULL,
    user_message TEXT NOT NULL,
    assistant_message TEXT NOT NULL,
    model TEXT NOT NULL,
    total_tokens INTEGER NOT NULL DEFAULT 0,
    metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );
  CREATE INDEX IF NOT EXISTS memory_exchanges_namespace_idx
    ON memory_exchanges (namespace, created_at DESC);
`;

const exchangeRowSchema = z.object({
  user_message: z.string(),
  assistant_message: z.string()
});

function truncate(value: string) {
  const normalised = value.trim().replace(/\s+/g, ' ');
  return normalised.length > MAX_RECALLED_CHARS ? `${normalised.slice(0, MAX_RECALLED_CHARS - 3)}...` : normalised;
}

export function buildMemoryContext(exchanges: Array<z.infer<typeof exchangeRowSchema>>): string {
  const lines = exchanges.map(
    (exchange) => `- User: ${truncate(exchange.user_message)}\n  Assistant: ${truncate(exchange.assistant_message)}`
  );
  return `Relevant memory from earlier conversations:\n${lines.join('\n')}`;
}

class PgEngineConnection implements EngineConnection {
  private released = false;

  constructor(
    private readonly db: Queryable,
    private readonly options: EngineOptions,
    private readonly recallLimit: number
  ) {}

  get namespace() {
    return this.options.namespace;
  }

  async prepare(messages: ChatMessage[]): Promise<ChatMessage[]> {
    this.assertActive();
    if (!this.options.autoIngest || this.recallLimit === 0) {
      return messages;
    }

    const { rows } = await this.db.query(
      `SELECT user_message, assistant_message
         FROM memory_exchanges
        WHERE namespace = $1
        ORDER BY created_at DESC, id DESC
        LIMIT $2`,
      [this.namespace, this.recallLimit]
    );
    const exchanges = rows.map((row) => exchangeRowSchema.parse(row)).reverse();
    if (exchanges.length === 0) {
      return messages;
    }

    const context: ChatMessage = { role: 'system', content: buildMemoryContext(exchanges) };
    const firstConversational = messages.findIndex((message) => message.role !== 'system');
    const insertAt = firstConversational === -1 ? messages.length : firstConversational;
    return [...messages.slice(0, insertAt), context, ...messages.slice(insertAt)];
  }

  async record(exchange: MemoryExchange): Promise<void> {
    this.assertActive();
    if (!this.options.consciousIngest && !this.options.autoIngest) {
      return;
    }

    await this.db.query(
      `INSERT INTO memory_exchanges (namespace, user_message, assistant_message, model, total_tokens, metadata)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [
        this.namespace,
        exchange.userMessage,
        exchange.assistantMessage,
        exchange.model,
        exchange.usage.totalTokens,
        {
          promptTokens: exchange.usage.promptTokens,
          completionTokens: exchange.usage.completionTokens,
          consciousIngest: this.options.consciousIngest,
          autoIngest: this.options.autoIngest
        }
      ]
    );
  }

  release() {
    this.released = true;
  }

  private assertActive() {
    if (this.released) {
      throw new Error(`Memory connection for namespace "${this.namespace}" has been released.`);
    }
  }
}

/**
 * Conversation memory kept in Postgres, partitioned by namespace. Each exchange is
 * stored after a successful completion and the latest ones are replayed as context.
 */
export class PgMemoryEngine implements EngineClient {
  private readonly db: EngineDatabase;
  private readonly recallLimit: number;
  private schemaReady: Promise<void> | null = null;

  constructor(options: PgMemoryEngineOptions) {
    this.db = options.db;
    this.recallLimit = Math.max(0, options.recallLimit ?? DEFAULT_RECALL_LIMIT);
  }

  async ingestAndEnable(options: EngineOptions): Promise<EngineConnection> {
    await this.ensureSchema();
    console.log(`[memory-engine] enabled for namespace: ${options.namespace}`);
    return new PgEngineConnection(this.db, options, this.recallLimit);
  }

  async close() {
    await this.db.end();
  }

  private ensureSchema() {
    if (!this.schemaReady) {
      this.schemaReady = this.db.query(SCHEMA_SQL).then(
        () => undefined,
        (error: unknown) => {
          this.schemaReady = null;
          throw error;
        }
      );
    }
    return this.schemaReady;
  }
}
