import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { CacheLayer } from '../cache/cacheLayer';
import { badRequest } from './http';

const invalidateSchema = z.union([
  z.object({ key: z.string().regex(/^mkt:/, 'key must start with "mkt:"') }),
  z.object({
    provider: z.string().min(1),
    operation: z.string().min(1),
    params: z.record(z.unknown()).optional(),
  }),
]);

export async function registerCacheRoutes(app: FastifyInstance, cache: CacheLayer) {
  // Drop one entry, by derived key or by the spec that derives it
  app.post('/cache.invalidate', async (req, reply) => {
    const parsed = invalidateSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const key = 'key' in parsed.data ? parsed.data.key : cache.keyFor(parsed.data);
    const ok = await cache.invalidate(key);
    return reply.send({ ok, key });
  });
}
