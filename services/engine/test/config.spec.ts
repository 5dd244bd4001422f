import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config';

describe('loadConfig', () => {
  it('fills defaults from an empty environment', () => {
    const config = loadConfig({});
    expect(config.port).toBe(8080);
    expect(config.cache).toEqual({ backend: 'redis', redisUrl: 'redis://localhost:6379', negativeTtlSeconds: 30 });
    expect(config.agent).toEqual({ toolCallBudget: 6, elapsedBudgetMs: 45_000, perCallTimeoutMs: 15_000, maxModelAttempts: 3 });
    expect(config.aggregation.sectionTimeoutMs).toBe(12_000);
    expect(config.sessions).toEqual({ ttlSeconds: 86_400, maxMessages: 40 });
    expect(config.providers.twelveData.apiKey).toBe('');
    expect(config.llm.model).toBe('gpt-4o-mini');
  });

  it('reads overrides and ignores unparseable numbers', () => {
    const config = loadConfig({
      PORT: 'abc',
      CACHE_BACKEND: 'memory',
      AGENT_TOOL_CALL_BUDGET: '2',
      FMP_API_KEY: 'test-key',
      FMP_RATE_LIMIT: '120',
      OPENAI_TEMPERATURE: '0',
    });
    expect(config.port).toBe(8080);
    expect(config.cache.backend).toBe('memory');
    expect(config.agent.toolCallBudget).toBe(2);
    expect(config.providers.fmp.apiKey).toBe('test-key');
    expect(config.providers.fmp.rateLimit).toEqual({
      strategy: 'token_bucket',
      capacity: 120,
      refillPerSecond: 2,
      policy: { mode: 'reject' },
    });
    expect(config.llm.temperature).toBe(0);
  });
});
