import type { FastifyReply } from 'fastify';
import { z } from 'zod';
import type { FailureKind, ProviderResult } from '../contracts/results';

const STATUS_BY_KIND: Record<FailureKind, number> = {
  RateLimited: 429,
  Timeout: 504,
  UpstreamUnavailable: 502,
  UpstreamRejected: 502,
  InvalidUpstreamResponse: 502,
  InvalidArguments: 400,
  NotConfigured: 503,
  UnknownTool: 400,
  BudgetExhausted: 429,
  ModelUnavailable: 503,
  Internal: 500,
};

export function statusForFailure(kind: FailureKind): number {
  return STATUS_BY_KIND[kind];
}

export const symbolParamsSchema = z.object({
  symbol: z
    .string()
    .trim()
    .min(1)
    .max(12)
    .regex(/^[A-Za-z0-9.\-^=]+$/, 'not a ticker symbol')
    .transform((s) => s.toUpperCase()),
});

export function badRequest(reply: FastifyReply, error: z.ZodError) {
  return reply.code(400).send({ error: error.flatten() });
}

export function sendResult<T>(reply: FastifyReply, result: ProviderResult<T>) {
  if (result.ok) return reply.send(result);
  return reply
    .code(statusForFailure(result.kind))
    .send({ error: result.kind, message: result.message, retriable: result.retriable });
}
