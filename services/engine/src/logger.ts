import pino, { type Logger } from 'pino';

export type { Logger };

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'market-agent' },
  redact: ['apiKey', 'api_key', '*.apiKey', 'headers.authorization'],
});

export function createComponentLogger(component: string): Logger {
  return logger.child({ component });
}
