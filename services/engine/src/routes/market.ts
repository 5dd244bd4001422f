import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { AggregationService } from '../services/aggregation';
import { badRequest, sendResult } from './http';

const searchQuerySchema = z.object({
  keyword: z.string().trim().min(1, 'keyword required').max(64),
});

export async function registerMarketRoutes(app: FastifyInstance, aggregation: AggregationService) {
  app.get('/search_stock', async (req, reply) => {
    const parsed = searchQuerySchema.safeParse(req.query);
    if (!parsed.success) return badRequest(reply, parsed.error);

    return sendResult(reply, await aggregation.searchSymbols(parsed.data.keyword));
  });

  app.get('/market_etfs', async (_req, reply) => {
    return reply.send(await aggregation.getMarketOverview());
  });
}
