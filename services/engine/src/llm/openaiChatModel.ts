import { z } from 'zod';
import {
  ModelUnavailableError,
  type ChatModel,
  type ChatRequest,
  type ChatResponse,
  type Message,
  type ToolCallRequest,
  type ToolSpec,
} from '../contracts/llm';
import { errorMessage } from '../contracts/results';
import type { FetchImpl } from '../providers/http';
import { abortable, AbortedError, scopedSignal } from '../util/async';

export interface OpenAIChatModelOptions {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  temperature?: number;
  timeoutMs?: number;
  fetch?: FetchImpl;
}

type OpenAIMessage =
  | { role: 'system' | 'user'; content: string }
  | {
      role: 'assistant';
      content: string | null;
      tool_calls?: { id: string; type: 'function'; function: { name: string; arguments: string } }[];
    }
  | { role: 'tool'; tool_call_id: string; content: string };

const responseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({ name: z.string(), arguments: z.string().default('{}') }),
              }),
            )
            .nullish(),
        }),
      }),
    )
    .min(1),
});

/** Model-produced arguments that are not a JSON object become `{}`; the tool registry rejects them. */
export function parseToolArguments(raw: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return {};
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) return {};
  return Object.fromEntries(Object.entries(parsed));
}

export function toOpenAIMessages(system: string, messages: Message[]): OpenAIMessage[] {
  const out: OpenAIMessage[] = [{ role: 'system', content: system }];
  for (const m of messages) {
    switch (m.role) {
      case 'user':
        out.push({ role: 'user', content: m.text });
        break;
      case 'assistant':
        out.push({
          role: 'assistant',
          content: m.text || null,
          ...(m.toolCalls.length
            ? {
                tool_calls: m.toolCalls.map((c) => ({
                  id: c.id,
                  type: 'function' as const,
                  function: { name: c.name, arguments: JSON.stringify(c.arguments) },
                })),
              }
            : {}),
        });
        break;
      case 'tool':
        out.push({
          role: 'tool',
          tool_call_id: m.toolCallId,
          content: JSON.stringify(m.result.error ? { error: m.result.error } : m.result.output),
        });
        break;
    }
  }
  return out;
}

function toOpenAITools(tools: ToolSpec[]) {
  return tools.map((t) => ({
    type: 'function' as const,
    function: { name: t.name, description: t.description, parameters: t.parameters },
  }));
}

async function safeReadBody(res: Response, signal: AbortSignal): Promise<string> {
  try {
    const text = await abortable(res.text(), signal);
    return text ? ` - ${text.slice(0, 200)}` : '';
  } catch {
    return '';
  }
}

/** Chat completions with function calling against any OpenAI-compatible endpoint. */
export class OpenAIChatModel implements ChatModel {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly temperature: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchImpl;

  constructor(options: OpenAIChatModelOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? 'https://api.openai.com/v1').replace(/\/+$/, '');
    this.model = options.model ?? 'gpt-4o-mini';
    this.temperature = options.temperature ?? 0.2;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl = options.fetch ?? ((input, init) => globalThis.fetch(input, init));
  }

  async complete(request: ChatRequest): Promise<ChatResponse> {
    if (!this.apiKey.trim()) throw new ModelUnavailableError('chat model API key is not configured');

    const body: Record<string, unknown> = {
      model: this.model,
      temperature: this.temperature,
      messages: toOpenAIMessages(request.system, request.messages),
    };
    if (request.tools?.length) {
      body.tools = toOpenAITools(request.tools);
      body.tool_choice = 'auto';
    }

    const scope = scopedSignal(this.timeoutMs, request.signal);
    let payload: unknown;
    try {
      payload = await this.post(body, scope.signal);
    } catch (err) {
      if (err instanceof ModelUnavailableError && !scope.signal.aborted) throw err;
      if (request.signal?.aborted) throw new AbortedError('chat request abandoned');
      if (scope.timedOut()) throw new ModelUnavailableError(`chat model did not respond within ${this.timeoutMs}ms`);
      throw new ModelUnavailableError(`chat model unreachable: ${errorMessage(err)}`);
    } finally {
      scope.dispose();
    }

    const parsed = responseSchema.safeParse(payload);
    if (!parsed.success) throw new ModelUnavailableError('chat response is missing choices');

    const message = parsed.data.choices[0].message;
    const toolCalls: ToolCallRequest[] = (message.tool_calls ?? []).map((c) => ({
      id: c.id,
      name: c.function.name,
      arguments: parseToolArguments(c.function.arguments),
    }));
    return { text: message.content?.trim() ?? '', toolCalls };
  }

  /** Sends one completion request; the signal covers both headers and body. */
  private async post(body: Record<string, unknown>, signal: AbortSignal): Promise<unknown> {
    const res = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(body),
      signal,
    });

    if (!res.ok) {
      const detail = await safeReadBody(res, signal);
      throw new ModelUnavailableError(`chat call failed: ${res.status} ${res.statusText}${detail}`, res.status);
    }

    const text = await abortable(res.text(), signal);
    try {
      const payload: unknown = JSON.parse(text);
      return payload;
    } catch (err) {
      throw new ModelUnavailableError(`chat response is not JSON: ${errorMessage(err)}`);
    }
  }
}
