import { config } from './config';
import { createEngine } from './container';
import { logger } from './logger';
import { buildApp } from './server';

/**
 * Entrypoint: build the engine, open the cache, serve HTTP, and close both
 * in order on SIGINT/SIGTERM.
 */
async function main() {
  const engine = createEngine(config);
  await engine.open();

  const app = await buildApp(engine, { logLevel: config.logLevel });

  let closing = false;
  const shutdown = async (signal: string) => {
    if (closing) return;
    closing = true;
    logger.info({ signal }, 'shutting down');
    try {
      await app.close();
      await engine.close();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'shutdown failed');
      process.exit(1);
    }
  };
  process.once('SIGINT', (signal) => void shutdown(signal));
  process.once('SIGTERM', (signal) => void shutdown(signal));

  try {
    await app.listen({ port: config.port, host: config.host });
    logger.info(`market agent listening on http://${config.host}:${config.port}`);
  } catch (err) {
    logger.error({ err }, 'server startup failed');
    await engine.close();
    process.exit(1);
  }
}

main().catch((err) => {
  logger.fatal({ err }, 'fatal error during startup');
  process.exit(1);
});
