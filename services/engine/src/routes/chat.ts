import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { ChatService } from '../services/chat';
import { badRequest } from './http';

const chatSchema = z.object({
  message: z.string().trim().min(1, 'message required').max(4000),
  session_id: z.string().trim().min(1).max(128).optional(),
});

const resetSchema = z.object({
  session_id: z.string().trim().min(1).max(128),
});

export async function registerChatRoutes(app: FastifyInstance, chat: ChatService) {
  app.post('/chat', async (req, reply) => {
    const parsed = chatSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const { message, session_id } = parsed.data;
    const result = await chat.chat(message, session_id);
    return reply.send({
      response: result.response,
      session_id: result.sessionId,
      stop_reason: result.stopReason,
      tool_calls: result.toolCalls.map((t) => ({
        id: t.id,
        name: t.name,
        arguments: t.arguments,
        status: t.status,
        error: t.errorKind,
        ms: t.durationMs,
      })),
    });
  });

  app.post('/chat.reset', async (req, reply) => {
    const parsed = resetSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    return reply.send({ ok: await chat.reset(parsed.data.session_id) });
  });
}
