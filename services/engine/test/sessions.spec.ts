import { describe, expect, it } from 'vitest';
import { AgentLoop } from '../src/agent/loop';
import type { Message } from '../src/contracts/llm';
import { ChatService } from '../src/services/chat';
import { SessionStore, trimHistory } from '../src/sessions/sessionStore';
import { MemoryCacheStore } from '../src/storage/memoryCacheStore';
import { ScriptedModel } from './fakes';

const conversation: Message[] = [
  { role: 'user', text: 'AAPL?' },
  { role: 'assistant', text: '', toolCalls: [{ id: 'c1', name: 'get_quote', arguments: { symbol: 'AAPL' } }] },
  {
    role: 'tool',
    toolCallId: 'c1',
    name: 'get_quote',
    result: { id: 'c1', output: null, error: { kind: 'RateLimited', message: 'slow down', retriable: true } },
  },
  { role: 'assistant', text: 'The quote is unavailable right now.', toolCalls: [] },
  { role: 'user', text: 'And MSFT?' },
  { role: 'assistant', text: 'MSFT is at $410.', toolCalls: [] },
];

describe('trimHistory', () => {
  it('keeps short histories as they are', () => {
    expect(trimHistory(conversation, 6)).toBe(conversation);
  });

  it('cuts to the newest messages, starting at a user message', () => {
    expect(trimHistory(conversation, 4)).toEqual(conversation.slice(4));
  });

  it('drops everything when no user message is left in the window', () => {
    expect(trimHistory(conversation.slice(0, 4), 2)).toEqual([]);
  });
});

describe('SessionStore', () => {
  function setup(maxMessages = 40) {
    const store = new MemoryCacheStore({ now: () => 0 });
    return { store, sessions: new SessionStore(store, { ttlSeconds: 600, maxMessages }) };
  }

  it('round-trips a conversation under its own TTL', async () => {
    const { store, sessions } = setup();
    await sessions.save('s1', conversation);

    expect(await sessions.load('s1')).toEqual(conversation);
    expect(await store.ttl('mkt:session:s1')).toBe(600_000);
  });

  it('trims on save', async () => {
    const { sessions } = setup(4);
    await sessions.save('s1', conversation);
    expect(await sessions.load('s1')).toEqual(conversation.slice(4));
  });

  it('starts empty for unknown, unreadable or malformed sessions', async () => {
    const { store, sessions } = setup();
    expect(await sessions.load('missing')).toEqual([]);

    await store.set('mkt:session:bad-json', '{oops', 60_000);
    expect(await sessions.load('bad-json')).toEqual([]);

    await store.set('mkt:session:bad-shape', JSON.stringify([{ role: 'system', text: 'x' }]), 60_000);
    expect(await sessions.load('bad-shape')).toEqual([]);
  });

  it('clears a session', async () => {
    const { sessions } = setup();
    await sessions.save('s1', conversation);
    expect(await sessions.clear('s1')).toBe(true);
    expect(await sessions.load('s1')).toEqual([]);
  });
});

describe('ChatService', () => {
  const limits = { toolCallBudget: 6, elapsedBudgetMs: 5_000, perCallTimeoutMs: 1_000, maxModelAttempts: 1 };
  const tools = { listTools: () => [], invoke: async () => ({ id: 'unused', output: null }) };

  it('starts a session, then continues it with the stored history', async () => {
    const model = new ScriptedModel([
      { text: 'Hello! Which stock?', toolCalls: [] },
      { text: 'Looking at MSFT.', toolCalls: [] },
    ]);
    const sessions = new SessionStore(new MemoryCacheStore(), { ttlSeconds: 600, maxMessages: 40 });
    const chat = new ChatService(new AgentLoop({ model, tools, limits }), sessions);

    const first = await chat.chat('Hi');
    expect(first.response).toBe('Hello! Which stock?');
    expect(first.stopReason).toBe('final_answer');
    expect(first.sessionId).toMatch(/^[0-9a-f-]{36}$/);

    const second = await chat.chat('MSFT please', first.sessionId);
    expect(second.sessionId).toBe(first.sessionId);
    expect(model.requests[1]?.messages).toEqual([
      { role: 'user', text: 'Hi' },
      { role: 'assistant', text: 'Hello! Which stock?', toolCalls: [] },
      { role: 'user', text: 'MSFT please' },
    ]);
    expect(await sessions.load(first.sessionId)).toHaveLength(4);
  });

  it('forgets a session on reset', async () => {
    const model = new ScriptedModel([{ text: 'Hi there.', toolCalls: [] }]);
    const sessions = new SessionStore(new MemoryCacheStore(), { ttlSeconds: 600, maxMessages: 40 });
    const chat = new ChatService(new AgentLoop({ model, tools, limits }), sessions);

    const reply = await chat.chat('Hi');
    expect(await chat.reset(reply.sessionId)).toBe(true);
    expect(await sessions.load(reply.sessionId)).toEqual([]);
  });
});
