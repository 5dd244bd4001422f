import {
  ModelUnavailableError,
  type ChatModel,
  type ChatResponse,
  type Message,
  type ToolCallRequest,
  type ToolCallResult,
  type ToolSpec,
} from '../contracts/llm';
import { errorMessage, type FailureKind } from '../contracts/results';
import { createComponentLogger, type Logger } from '../logger';
import { backoffDelay } from '../providers/retry';
import type { ToolContext } from '../tools/registry';
import { abortable, AbortedError, scopedSignal, sleep as defaultSleep } from '../util/async';
import {
  BUDGET_NOTE,
  budgetMessage,
  buildSystemPrompt,
  deadlineMessage,
  GENERIC_FAILURE_MESSAGE,
} from './prompts';

export type AgentState = 'awaiting_model' | 'executing_tools' | 'done';

export type StopReason = 'final_answer' | 'tool_budget_exhausted' | 'deadline_exceeded' | 'model_unavailable';

export interface ConversationState {
  turns: Message[];
  toolCallBudget: number;
  elapsedBudgetMs: number;
}

export interface AgentLimits {
  toolCallBudget: number;
  elapsedBudgetMs: number;
  perCallTimeoutMs: number;
  maxModelAttempts: number;
}

export interface ToolExecutor {
  listTools(): ToolSpec[];
  invoke(name: string, args: Record<string, unknown>, ctx: ToolContext): Promise<ToolCallResult>;
}

export interface ToolTraceEntry {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
  status: 'ok' | 'error' | 'skipped';
  errorKind?: FailureKind;
  durationMs: number;
}

export interface AgentResult {
  finalText: string;
  stopReason: StopReason;
  /** History passed in, plus everything this turn added. */
  messages: Message[];
  /** Only the messages this turn added, starting with the user message. */
  newMessages: Message[];
  trace: ToolTraceEntry[];
  states: AgentState[];
  toolCallsUsed: number;
}

export interface AgentLoopDeps {
  model: ChatModel;
  tools: ToolExecutor;
  limits: AgentLimits;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  modelRetryBaseMs?: number;
  logger?: Logger;
}

export interface RunOptions {
  signal?: AbortSignal;
}

interface ExecutedCall {
  result: ToolCallResult;
  entry: ToolTraceEntry;
}

type ModelOutcome = { ok: true; response: ChatResponse } | { ok: false; reason: 'deadline' | 'unavailable' };

function describeCall(call: ToolCallRequest): string {
  const args = Object.values(call.arguments)
    .filter((v) => typeof v === 'string' || typeof v === 'number')
    .join(', ');
  return `${call.name}(${args})`;
}

/**
 * One chat turn as an explicit state machine:
 * awaiting_model -> executing_tools -> awaiting_model ... -> done.
 *
 * A response asking for more tool calls than the remaining budget gets the
 * first N executed and the rest answered with BudgetExhausted. Once the
 * budget is spent the model is asked once more without tools.
 */
/** A 4xx other than 429 means the same request cannot succeed on retry. */
function isRetriableModelError(err: unknown): boolean {
  if (!(err instanceof ModelUnavailableError) || err.status === undefined) return true;
  return err.status === 429 || err.status >= 500;
}

export class AgentLoop {
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;
  private readonly modelRetryBaseMs: number;
  private readonly log: Logger;

  constructor(private readonly deps: AgentLoopDeps) {
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
    this.modelRetryBaseMs = deps.modelRetryBaseMs ?? 500;
    this.log = deps.logger ?? createComponentLogger('agent');
  }

  async run(history: Message[], userText: string, options: RunOptions = {}): Promise<AgentResult> {
    const { limits } = this.deps;
    const deadline = scopedSignal(limits.elapsedBudgetMs, options.signal);
    const system = buildSystemPrompt(new Date(this.now()));
    const specs = this.deps.tools.listTools();

    const conversation: ConversationState = {
      turns: [...history, { role: 'user', text: userText }],
      toolCallBudget: limits.toolCallBudget,
      elapsedBudgetMs: limits.elapsedBudgetMs,
    };
    const trace: ToolTraceEntry[] = [];
    const states: AgentState[] = [];
    let pending: ToolCallRequest[] = [];
    let skippedForBudget = false;

    const completedLookups = () =>
      trace.filter((t) => t.status === 'ok').map((t) => describeCall({ id: t.id, name: t.name, arguments: t.arguments }));

    const finish = (finalText: string, stopReason: StopReason): AgentResult => {
      deadline.dispose();
      conversation.turns.push({ role: 'assistant', text: finalText, toolCalls: [] });
      states.push('done');
      this.log.info(
        { stopReason, toolCalls: trace.length, budgetLeft: conversation.toolCallBudget },
        'agent turn finished',
      );
      return {
        finalText,
        stopReason,
        messages: conversation.turns,
        newMessages: conversation.turns.slice(history.length),
        trace,
        states,
        toolCallsUsed: limits.toolCallBudget - conversation.toolCallBudget,
      };
    };

    let state: AgentState = 'awaiting_model';
    for (;;) {
      states.push(state);

      if (state === 'awaiting_model') {
        if (deadline.signal.aborted) return finish(deadlineMessage(completedLookups()), 'deadline_exceeded');

        const offerTools = conversation.toolCallBudget > 0;
        const outcome = await this.callModel(
          system,
          conversation.turns,
          offerTools ? specs : undefined,
          deadline.signal,
        );
        if (!outcome.ok) {
          if (outcome.reason === 'deadline') return finish(deadlineMessage(completedLookups()), 'deadline_exceeded');
          return finish(GENERIC_FAILURE_MESSAGE, 'model_unavailable');
        }

        const { text, toolCalls } = outcome.response;
        if (!toolCalls.length) {
          if (skippedForBudget) {
            const finalText = text ? `${text}\n\n${BUDGET_NOTE}` : budgetMessage(limits.toolCallBudget, completedLookups());
            return finish(finalText, 'tool_budget_exhausted');
          }
          return finish(text || GENERIC_FAILURE_MESSAGE, 'final_answer');
        }

        if (!offerTools) {
          this.log.warn({ requested: toolCalls.length }, 'model asked for tools after the budget was spent');
          return finish(budgetMessage(limits.toolCallBudget, completedLookups()), 'tool_budget_exhausted');
        }

        conversation.turns.push({ role: 'assistant', text, toolCalls });
        pending = toolCalls;
        state = 'executing_tools';
        continue;
      }

      if (state === 'executing_tools') {
        const allowed = pending.slice(0, conversation.toolCallBudget);
        const skipped = pending.slice(allowed.length);
        conversation.toolCallBudget -= allowed.length;

        const executed = await Promise.all(allowed.map((call) => this.runTool(call, deadline.signal)));

        if (skipped.length) {
          skippedForBudget = true;
          this.log.warn({ skipped: skipped.map((c) => c.name) }, 'tool calls skipped, budget exhausted');
        }

        // results go back in request order, one per call
        pending.forEach((call, i) => {
          const { result, entry } = executed[i] ?? this.skip(call);
          trace.push(entry);
          conversation.turns.push({ role: 'tool', toolCallId: call.id, name: call.name, result });
        });
        pending = [];
        state = 'awaiting_model';
        continue;
      }

      return finish(GENERIC_FAILURE_MESSAGE, 'model_unavailable');
    }
  }

  private skip(call: ToolCallRequest): ExecutedCall {
    return {
      result: {
        id: call.id,
        output: null,
        error: {
          kind: 'BudgetExhausted',
          message: 'Skipped: the tool call budget for this question is exhausted.',
          retriable: false,
        },
      },
      entry: {
        id: call.id,
        name: call.name,
        arguments: call.arguments,
        status: 'skipped',
        errorKind: 'BudgetExhausted',
        durationMs: 0,
      },
    };
  }

  private async runTool(call: ToolCallRequest, deadline: AbortSignal): Promise<ExecutedCall> {
    const startedAt = this.now();
    const scope = scopedSignal(this.deps.limits.perCallTimeoutMs, deadline);
    let result: ToolCallResult;
    try {
      result = await abortable(
        this.deps.tools.invoke(call.name, call.arguments, { callId: call.id, signal: scope.signal }),
        scope.signal,
      );
    } catch (err) {
      const message =
        err instanceof AbortedError
          ? scope.timedOut()
            ? `${call.name} did not complete within ${this.deps.limits.perCallTimeoutMs}ms`
            : `${call.name} abandoned, turn deadline expired`
          : errorMessage(err);
      result = {
        id: call.id,
        output: null,
        error: { kind: err instanceof AbortedError ? 'Timeout' : 'Internal', message, retriable: false },
      };
    } finally {
      scope.dispose();
    }

    return {
      // keep the id the model sent even if a tool echoed a different one
      result: { ...result, id: call.id },
      entry: {
        id: call.id,
        name: call.name,
        arguments: call.arguments,
        status: result.error ? 'error' : 'ok',
        errorKind: result.error?.kind,
        durationMs: this.now() - startedAt,
      },
    };
  }

  private async callModel(
    system: string,
    turns: Message[],
    tools: ToolSpec[] | undefined,
    deadline: AbortSignal,
  ): Promise<ModelOutcome> {
    const maxAttempts = Math.max(1, this.deps.limits.maxModelAttempts);
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const response = await abortable(
          this.deps.model.complete({ system, messages: [...turns], tools, signal: deadline }),
          deadline,
        );
        return { ok: true, response };
      } catch (err) {
        if (deadline.aborted) return { ok: false, reason: 'deadline' };
        this.log.warn({ attempt, maxAttempts, err: errorMessage(err) }, 'chat model call failed');
        if (attempt === maxAttempts || !isRetriableModelError(err)) break;
        try {
          await this.sleep(backoffDelay(attempt, this.modelRetryBaseMs, 4_000, this.random), deadline);
        } catch {
          return { ok: false, reason: 'deadline' };
        }
      }
    }
    return { ok: false, reason: 'unavailable' };
  }
}
