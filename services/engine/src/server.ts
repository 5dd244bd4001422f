import Fastify from 'fastify';
import type { Engine } from './container';
import { registerCacheRoutes } from './routes/cache';
import { registerChatRoutes } from './routes/chat';
import { registerMarketRoutes } from './routes/market';
import { registerStockRoutes } from './routes/stock';

export interface AppOptions {
  logLevel?: string;
}

export async function buildApp(engine: Engine, options: AppOptions = {}) {
  const level = options.logLevel ?? 'info';
  const app = Fastify({ logger: level === 'silent' ? false : { level } });

  app.get('/health', async () => {
    try {
      await engine.cache.ping();
      return { status: 'ok', cache: 'ok' };
    } catch (err) {
      app.log.error({ err }, 'cache health check failed');
      return { status: 'degraded', cache: 'error' };
    }
  });

  await registerStockRoutes(app, engine.aggregation);
  await registerMarketRoutes(app, engine.aggregation);
  await registerChatRoutes(app, engine.chat);
  await registerCacheRoutes(app, engine.cache);
  return app;
}
