import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { CacheStore } from '../contracts/cacheStore';
import type { Message } from '../contracts/llm';
import { FAILURE_KINDS } from '../contracts/results';
import { createComponentLogger, type Logger } from '../logger';

export interface SessionStoreOptions {
  ttlSeconds: number;
  maxMessages: number;
  logger?: Logger;
}

const messageSchema = z.discriminatedUnion('role', [
  z.object({ role: z.literal('user'), text: z.string() }),
  z.object({
    role: z.literal('assistant'),
    text: z.string(),
    toolCalls: z.array(z.object({ id: z.string(), name: z.string(), arguments: z.record(z.unknown()) })),
  }),
  z.object({
    role: z.literal('tool'),
    toolCallId: z.string(),
    name: z.string(),
    result: z.object({
      id: z.string(),
      output: z.unknown(),
      error: z.object({ kind: z.enum(FAILURE_KINDS), message: z.string(), retriable: z.boolean() }).optional(),
    }),
  }),
]);

const historySchema = z.array(messageSchema);

function toMessage(m: z.infer<typeof messageSchema>): Message {
  if (m.role !== 'tool') return m;
  return {
    role: 'tool',
    toolCallId: m.toolCallId,
    name: m.name,
    result: { id: m.result.id, output: m.result.output ?? null, error: m.result.error },
  };
}

export function newSessionId(): string {
  return randomUUID();
}

/**
 * Keep at most `max` messages, starting at a user message so a tool
 * message is never separated from the assistant call that requested it.
 */
export function trimHistory(messages: Message[], max: number): Message[] {
  if (messages.length <= max) return messages;
  const tail = messages.slice(messages.length - max);
  const start = tail.findIndex((m) => m.role === 'user');
  return start === -1 ? [] : tail.slice(start);
}

/** Conversation history per session id, kept in the cache store under its own TTL. */
export class SessionStore {
  private readonly log: Logger;

  constructor(private readonly store: CacheStore, private readonly options: SessionStoreOptions) {
    this.log = options.logger ?? createComponentLogger('sessions');
  }

  async load(sessionId: string): Promise<Message[]> {
    let raw: string | null;
    try {
      raw = await this.store.get(this.key(sessionId));
    } catch (err) {
      this.log.error({ err, sessionId }, 'session read failed, starting empty');
      return [];
    }
    if (!raw) return [];

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.log.warn({ sessionId }, 'session record is not JSON, starting empty');
      return [];
    }
    const history = historySchema.safeParse(parsed);
    if (!history.success) {
      this.log.warn({ sessionId }, 'session record has an unexpected shape, starting empty');
      return [];
    }
    return history.data.map(toMessage);
  }

  async save(sessionId: string, messages: Message[]): Promise<void> {
    const trimmed = trimHistory(messages, this.options.maxMessages);
    try {
      await this.store.set(this.key(sessionId), JSON.stringify(trimmed), this.options.ttlSeconds * 1000);
    } catch (err) {
      this.log.error({ err, sessionId }, 'session write failed');
    }
  }

  async clear(sessionId: string): Promise<boolean> {
    return this.store.delete(this.key(sessionId));
  }

  private key(sessionId: string): string {
    return `mkt:session:${sessionId}`;
  }
}
