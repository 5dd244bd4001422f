import type { AgentLoop, StopReason, ToolTraceEntry } from '../agent/loop';
import { createComponentLogger, type Logger } from '../logger';
import { newSessionId, type SessionStore } from '../sessions/sessionStore';

export interface ChatReply {
  response: string;
  sessionId: string;
  stopReason: StopReason;
  toolCalls: ToolTraceEntry[];
}

/** One user turn: load history, run the agent, persist what the turn added. */
export class ChatService {
  private readonly log: Logger;

  constructor(
    private readonly agent: Pick<AgentLoop, 'run'>,
    private readonly sessions: SessionStore,
    logger?: Logger,
  ) {
    this.log = logger ?? createComponentLogger('chat');
  }

  async chat(message: string, sessionId?: string, signal?: AbortSignal): Promise<ChatReply> {
    const id = sessionId ?? newSessionId();
    const history = sessionId ? await this.sessions.load(sessionId) : [];

    const result = await this.agent.run(history, message, { signal });
    await this.sessions.save(id, result.messages);

    this.log.info(
      { sessionId: id, stopReason: result.stopReason, toolCalls: result.trace.length, history: history.length },
      'chat turn complete',
    );
    return { response: result.finalText, sessionId: id, stopReason: result.stopReason, toolCalls: result.trace };
  }

  async reset(sessionId: string): Promise<boolean> {
    return this.sessions.clear(sessionId);
  }
}
