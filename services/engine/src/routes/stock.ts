import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { PROFILE_SECTIONS, type AggregationService, type ProfileSection } from '../services/aggregation';
import type { Interval } from '../types';
import { badRequest, sendResult, symbolParamsSchema } from './http';

const INTERVALS = ['1min', '5min', '15min', '30min', '1h', '4h', '1day', '1week', '1month'] as const satisfies readonly Interval[];

function isSection(value: string): value is ProfileSection {
  return PROFILE_SECTIONS.some((s) => s === value);
}

const profileQuerySchema = z.object({
  // comma separated, e.g. "price,news"; all sections when omitted
  sections: z
    .string()
    .optional()
    .transform((raw, ctx) => {
      if (raw === undefined || raw.trim() === '') return [...PROFILE_SECTIONS];
      const names = raw.split(',').map((s) => s.trim().toLowerCase()).filter(Boolean);
      const sections: ProfileSection[] = [];
      for (const name of names) {
        if (!isSection(name)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown section "${name}"` });
          return z.NEVER;
        }
        sections.push(name);
      }
      return sections;
    }),
});

const priceQuerySchema = z.object({
  interval: z.enum(INTERVALS).default('1day'),
  outputsize: z.coerce.number().int().positive().max(5000).default(200),
});

const fundamentalsQuerySchema = z.object({
  period: z.enum(['quarter', 'annual']).default('quarter'),
  limit: z.coerce.number().int().min(2).max(20).default(4),
});

const newsQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(30).default(7),
  max_results: z.coerce.number().int().min(1).max(20).default(10),
});

const indicatorQuerySchema = z.object({
  interval: z.enum(INTERVALS).default('1day'),
  outputsize: z.coerce.number().int().positive().max(5000).default(200),
});

const rsiQuerySchema = indicatorQuerySchema.extend({
  period: z.coerce.number().int().min(2).max(100).default(14),
});

const bollingerQuerySchema = indicatorQuerySchema.extend({
  period: z.coerce.number().int().min(2).max(200).default(20),
  num_std: z.coerce.number().positive().max(5).default(2),
});

export async function registerStockRoutes(app: FastifyInstance, aggregation: AggregationService) {
  app.get('/stock/:symbol/profile', async (req, reply) => {
    const params = symbolParamsSchema.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);
    const query = profileQuerySchema.safeParse(req.query);
    if (!query.success) return badRequest(reply, query.error);

    return reply.send(await aggregation.getProfile(params.data.symbol, query.data.sections));
  });

  app.get('/stock/:symbol/price', async (req, reply) => {
    const params = symbolParamsSchema.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);
    const query = priceQuerySchema.safeParse(req.query);
    if (!query.success) return badRequest(reply, query.error);

    return sendResult(reply, await aggregation.getPriceSeries(params.data.symbol, query.data));
  });

  app.get('/stock/:symbol/quote', async (req, reply) => {
    const params = symbolParamsSchema.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);

    return sendResult(reply, await aggregation.getQuote(params.data.symbol));
  });

  app.get('/stock/:symbol/fundamentals', async (req, reply) => {
    const params = symbolParamsSchema.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);
    const query = fundamentalsQuerySchema.safeParse(req.query);
    if (!query.success) return badRequest(reply, query.error);

    return sendResult(reply, await aggregation.getFundamentals(params.data.symbol, query.data));
  });

  app.get('/stock/:symbol/news', async (req, reply) => {
    const params = symbolParamsSchema.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);
    const query = newsQuerySchema.safeParse(req.query);
    if (!query.success) return badRequest(reply, query.error);

    const { days, max_results } = query.data;
    return sendResult(reply, await aggregation.getNews(params.data.symbol, { days, maxResults: max_results }));
  });

  app.get('/stock/:symbol/analysis', async (req, reply) => {
    const params = symbolParamsSchema.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);

    return sendResult(reply, await aggregation.generateAnalysisReport(params.data.symbol));
  });

  app.get('/stock/:symbol/rsi', async (req, reply) => {
    const params = symbolParamsSchema.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);
    const query = rsiQuerySchema.safeParse(req.query);
    if (!query.success) return badRequest(reply, query.error);

    return sendResult(reply, await aggregation.getRsi(params.data.symbol, query.data));
  });

  app.get('/stock/:symbol/macd', async (req, reply) => {
    const params = symbolParamsSchema.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);
    const query = indicatorQuerySchema.safeParse(req.query);
    if (!query.success) return badRequest(reply, query.error);

    return sendResult(reply, await aggregation.getMacd(params.data.symbol, query.data));
  });

  app.get('/stock/:symbol/bollinger', async (req, reply) => {
    const params = symbolParamsSchema.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);
    const query = bollingerQuerySchema.safeParse(req.query);
    if (!query.success) return badRequest(reply, query.error);

    const { num_std, ...rest } = query.data;
    return sendResult(reply, await aggregation.getBollinger(params.data.symbol, { ...rest, width: num_std }));
  });
}
