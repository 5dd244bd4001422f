import { describe, expect, it, vi } from 'vitest';
import { AgentLoop, type AgentLimits, type ToolExecutor } from '../src/agent/loop';
import { BUDGET_NOTE, GENERIC_FAILURE_MESSAGE } from '../src/agent/prompts';
import { ModelUnavailableError, type ChatModel, type ChatResponse, type Message, type ToolCallResult, type ToolSpec } from '../src/contracts/llm';
import { never, ScriptedModel } from './fakes';

const quoteSpec: ToolSpec = {
  name: 'get_quote',
  description: 'Latest quote',
  parameters: { type: 'object', properties: { symbol: { type: 'string' } }, required: ['symbol'] },
  returns: { type: 'object' },
};

function executor(invoke: ToolExecutor['invoke']) {
  return { listTools: (): ToolSpec[] => [quoteSpec], invoke: vi.fn(invoke) };
}

const answer = (text: string): ChatResponse => ({ text, toolCalls: [] });

const askQuote = (...symbols: string[]): ChatResponse => ({
  text: '',
  toolCalls: symbols.map((symbol, i) => ({ id: `call_${i + 1}`, name: 'get_quote', arguments: { symbol } })),
});

function limits(overrides: Partial<AgentLimits> = {}): AgentLimits {
  return { toolCallBudget: 6, elapsedBudgetMs: 5_000, perCallTimeoutMs: 1_000, maxModelAttempts: 3, ...overrides };
}

const quoteTool = executor(async (_name, args, ctx): Promise<ToolCallResult> => ({
  id: ctx.callId,
  output: { symbol: args.symbol, price: 175.34 },
}));

describe('AgentLoop', () => {
  it('looks up data once and answers with it', async () => {
    const tools = executor(async (_name, args, ctx) => ({ id: ctx.callId, output: { symbol: args.symbol, price: 175.34 } }));
    const model = new ScriptedModel([askQuote('TSLA'), answer('TSLA last traded at $175.34.')]);
    const agent = new AgentLoop({ model, tools, limits: limits(), now: () => 0 });

    const result = await agent.run([], "What's TSLA trading at?");

    expect(result.finalText).toBe('TSLA last traded at $175.34.');
    expect(result.stopReason).toBe('final_answer');
    expect(result.toolCallsUsed).toBe(1);
    expect(result.states).toEqual(['awaiting_model', 'executing_tools', 'awaiting_model', 'done']);
    expect(result.trace).toEqual([
      { id: 'call_1', name: 'get_quote', arguments: { symbol: 'TSLA' }, status: 'ok', errorKind: undefined, durationMs: 0 },
    ]);
    expect(tools.invoke).toHaveBeenCalledTimes(1);

    expect(model.requests[0]?.tools).toEqual([quoteSpec]);
    expect(model.requests[1]?.messages).toEqual([
      { role: 'user', text: "What's TSLA trading at?" },
      { role: 'assistant', text: '', toolCalls: [{ id: 'call_1', name: 'get_quote', arguments: { symbol: 'TSLA' } }] },
      { role: 'tool', toolCallId: 'call_1', name: 'get_quote', result: { id: 'call_1', output: { symbol: 'TSLA', price: 175.34 } } },
    ]);
    expect(result.newMessages).toHaveLength(4);
    expect(result.newMessages[3]).toEqual({ role: 'assistant', text: 'TSLA last traded at $175.34.', toolCalls: [] });
  });

  it('skips calls past the budget and notes it on the answer', async () => {
    const model = new ScriptedModel([askQuote('AAPL', 'MSFT'), answer('AAPL is at $175.34.')]);
    const agent = new AgentLoop({ model, tools: quoteTool, limits: limits({ toolCallBudget: 1 }), now: () => 0 });
    quoteTool.invoke.mockClear();

    const result = await agent.run([], 'Compare AAPL and MSFT');

    expect(quoteTool.invoke).toHaveBeenCalledTimes(1);
    expect(result.trace.map((t) => [t.id, t.status, t.errorKind])).toEqual([
      ['call_1', 'ok', undefined],
      ['call_2', 'skipped', 'BudgetExhausted'],
    ]);
    const skipped = result.messages.find((m): m is Extract<Message, { role: 'tool' }> => m.role === 'tool' && m.toolCallId === 'call_2');
    expect(skipped?.result.error).toEqual({
      kind: 'BudgetExhausted',
      message: 'Skipped: the tool call budget for this question is exhausted.',
      retriable: false,
    });
    expect(model.requests[1]?.tools).toBeUndefined();
    expect(result.finalText).toBe(`AAPL is at $175.34.\n\n${BUDGET_NOTE}`);
    expect(result.stopReason).toBe('tool_budget_exhausted');
    expect(result.toolCallsUsed).toBe(1);
  });

  it('stops when the model still asks for tools after the budget is spent', async () => {
    const model = new ScriptedModel([askQuote('AAPL'), askQuote('MSFT')]);
    const agent = new AgentLoop({ model, tools: quoteTool, limits: limits({ toolCallBudget: 1 }), now: () => 0 });

    const result = await agent.run([], 'Compare AAPL and MSFT');

    expect(result.finalText).toBe(
      'I reached the limit of 1 data lookups for this question before I could finish. Completed lookups: get_quote(AAPL).',
    );
    expect(result.stopReason).toBe('tool_budget_exhausted');
    expect(model.requests).toHaveLength(2);
  });

  it('gives up on a tool call that outlives its own timeout', async () => {
    const tools = executor(() => never());
    const model = new ScriptedModel([askQuote('AAPL'), answer('The quote lookup timed out.')]);
    const agent = new AgentLoop({ model, tools, limits: limits({ perCallTimeoutMs: 20 }), now: () => 0 });

    const result = await agent.run([], 'AAPL price?');

    const toolMessage = result.messages[2];
    expect(toolMessage?.role === 'tool' && toolMessage.result.error).toEqual({
      kind: 'Timeout',
      message: 'get_quote did not complete within 20ms',
      retriable: false,
    });
    expect(result.stopReason).toBe('final_answer');
    expect(result.finalText).toBe('The quote lookup timed out.');
  });

  it('ends the turn when the elapsed budget runs out', async () => {
    const tools = executor(() => never());
    const model = new ScriptedModel([askQuote('AAPL')]);
    const agent = new AgentLoop({ model, tools, limits: limits({ elapsedBudgetMs: 30 }), now: () => 0 });

    const result = await agent.run([], 'AAPL price?');

    expect(result.stopReason).toBe('deadline_exceeded');
    expect(result.finalText).toBe('I ran out of time before I could finish answering. No data lookups completed.');
    expect(result.trace[0]?.errorKind).toBe('Timeout');
    expect(result.states).toEqual(['awaiting_model', 'executing_tools', 'awaiting_model', 'done']);
    expect(model.requests).toHaveLength(1);
  });

  it('ends the turn at the elapsed budget while the model has not answered', async () => {
    const model: ChatModel = { complete: () => never<ChatResponse>() };
    const agent = new AgentLoop({ model, tools: quoteTool, limits: limits({ elapsedBudgetMs: 40 }) });

    const startedAt = Date.now();
    const result = await agent.run([], 'AAPL price?');
    const elapsed = Date.now() - startedAt;

    expect(result.stopReason).toBe('deadline_exceeded');
    expect(result.finalText).toBe('I ran out of time before I could finish answering. No data lookups completed.');
    expect(result.states).toEqual(['awaiting_model', 'done']);
    expect(elapsed).toBeGreaterThanOrEqual(30);
    expect(elapsed).toBeLessThan(1_000);
  });

  it('does not retry a model request the endpoint rejected', async () => {
    const sleeps: number[] = [];
    const model = new ScriptedModel([new ModelUnavailableError('chat call failed: 401 Unauthorized', 401), answer('unused')]);
    const agent = new AgentLoop({
      model,
      tools: quoteTool,
      limits: limits(),
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });

    const result = await agent.run([], 'hello');
    expect(result.stopReason).toBe('model_unavailable');
    expect(model.requests).toHaveLength(1);
    expect(sleeps).toEqual([]);
  });

  it('retries a model that answered 429', async () => {
    const model = new ScriptedModel([new ModelUnavailableError('chat call failed: 429 Too Many Requests', 429), answer('Hello!')]);
    const agent = new AgentLoop({ model, tools: quoteTool, limits: limits(), sleep: async () => {} });

    const result = await agent.run([], 'hello');
    expect(result.finalText).toBe('Hello!');
    expect(model.requests).toHaveLength(2);
  });

  it('retries the model with backoff and then reports it unavailable', async () => {
    const sleeps: number[] = [];
    const model = new ScriptedModel([new Error('HTTP 500'), new Error('HTTP 500'), new Error('HTTP 500')]);
    const agent = new AgentLoop({
      model,
      tools: quoteTool,
      limits: limits(),
      random: () => 0.5,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });

    const result = await agent.run([], 'hello');

    expect(result.finalText).toBe(GENERIC_FAILURE_MESSAGE);
    expect(result.stopReason).toBe('model_unavailable');
    expect(model.requests).toHaveLength(3);
    expect(sleeps).toEqual([250, 500]);
    expect(result.states).toEqual(['awaiting_model', 'done']);
  });

  it('recovers when a retry succeeds', async () => {
    const model = new ScriptedModel([new Error('HTTP 502'), answer('Hello!')]);
    const agent = new AgentLoop({ model, tools: quoteTool, limits: limits(), sleep: async () => {} });

    const result = await agent.run([], 'hello');
    expect(result.finalText).toBe('Hello!');
    expect(result.stopReason).toBe('final_answer');
  });

  it('falls back to the generic message on an empty answer', async () => {
    const agent = new AgentLoop({ model: new ScriptedModel([answer('')]), tools: quoteTool, limits: limits() });
    const result = await agent.run([], 'hello');
    expect(result.finalText).toBe(GENERIC_FAILURE_MESSAGE);
  });

  it('continues from prior history and reports only the new messages separately', async () => {
    const history: Message[] = [
      { role: 'user', text: 'Hi' },
      { role: 'assistant', text: 'Hello! Ask me about a stock.', toolCalls: [] },
    ];
    const model = new ScriptedModel([answer('Sure.')]);
    const agent = new AgentLoop({ model, tools: quoteTool, limits: limits() });

    const result = await agent.run(history, 'Thanks');

    expect(model.requests[0]?.messages).toEqual([...history, { role: 'user', text: 'Thanks' }]);
    expect(result.messages).toHaveLength(4);
    expect(result.newMessages).toEqual([
      { role: 'user', text: 'Thanks' },
      { role: 'assistant', text: 'Sure.', toolCalls: [] },
    ]);
    expect(history).toHaveLength(2);
  });
});
