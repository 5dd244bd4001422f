import 'dotenv/config';

import type { RateLimitConfig } from './providers/rateLimiter';

const DEFAULT_CHAT_MODEL = 'gpt-4o-mini';

export type CacheBackend = 'redis' | 'memory';

export interface ProviderSettings {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  maxAttempts: number;
  rateLimit: RateLimitConfig;
}

export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  cache: {
    backend: CacheBackend;
    redisUrl: string;
    negativeTtlSeconds: number;
  };
  providers: {
    twelveData: ProviderSettings;
    fmp: ProviderSettings;
    tavily: ProviderSettings;
  };
  llm: {
    apiKey: string;
    baseUrl: string;
    model: string;
    temperature: number;
    timeoutMs: number;
  };
  agent: {
    toolCallBudget: number;
    elapsedBudgetMs: number;
    perCallTimeoutMs: number;
    maxModelAttempts: number;
  };
  aggregation: {
    sectionTimeoutMs: number;
  };
  sessions: {
    ttlSeconds: number;
    maxMessages: number;
  };
}

type Env = Record<string, string | undefined>;

function int(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function float(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: int(env, 'PORT', 8080),
    host: env.HOST || '0.0.0.0',
    logLevel: env.LOG_LEVEL || 'info',
    cache: {
      backend: env.CACHE_BACKEND === 'memory' ? 'memory' : 'redis',
      redisUrl: env.REDIS_URL || 'redis://localhost:6379',
      negativeTtlSeconds: int(env, 'CACHE_NEGATIVE_TTL_S', 30),
    },
    providers: {
      // free tier: 8 credits per minute
      twelveData: {
        apiKey: env.TWELVE_DATA_API_KEY || '',
        baseUrl: env.TWELVE_DATA_API_URL || 'https://api.twelvedata.com',
        timeoutMs: int(env, 'TWELVE_DATA_TIMEOUT_MS', 10_000),
        maxAttempts: int(env, 'TWELVE_DATA_MAX_ATTEMPTS', 3),
        rateLimit: {
          strategy: 'fixed_window',
          maxRequests: int(env, 'TWELVE_DATA_RATE_LIMIT', 8),
          windowMs: 60_000,
          policy: { mode: 'queue', maxWaitMs: int(env, 'TWELVE_DATA_MAX_QUEUE_MS', 5_000) },
        },
      },
      fmp: {
        apiKey: env.FMP_API_KEY || '',
        baseUrl: env.FMP_API_URL || 'https://financialmodelingprep.com/stable',
        timeoutMs: int(env, 'FMP_TIMEOUT_MS', 10_000),
        maxAttempts: int(env, 'FMP_MAX_ATTEMPTS', 3),
        rateLimit: {
          strategy: 'token_bucket',
          capacity: int(env, 'FMP_RATE_LIMIT', 300),
          refillPerSecond: int(env, 'FMP_RATE_LIMIT', 300) / 60,
          policy: { mode: 'reject' },
        },
      },
      tavily: {
        apiKey: env.TAVILY_API_KEY || '',
        baseUrl: env.TAVILY_API_URL || 'https://api.tavily.com',
        timeoutMs: int(env, 'TAVILY_TIMEOUT_MS', 20_000),
        maxAttempts: int(env, 'TAVILY_MAX_ATTEMPTS', 3),
        rateLimit: {
          strategy: 'token_bucket',
          capacity: 10,
          refillPerSecond: int(env, 'TAVILY_RATE_LIMIT', 100) / 60,
          policy: { mode: 'queue', maxWaitMs: 3_000 },
        },
      },
    },
    llm: {
      apiKey: env.OPENAI_API_KEY || '',
      baseUrl: env.OPENAI_BASE_URL || 'https://api.openai.com/v1',
      model: env.OPENAI_CHAT_MODEL || DEFAULT_CHAT_MODEL,
      temperature: float(env, 'OPENAI_TEMPERATURE', 0.2),
      timeoutMs: int(env, 'OPENAI_TIMEOUT_MS', 30_000),
    },
    agent: {
      toolCallBudget: int(env, 'AGENT_TOOL_CALL_BUDGET', 6),
      elapsedBudgetMs: int(env, 'AGENT_ELAPSED_BUDGET_MS', 45_000),
      perCallTimeoutMs: int(env, 'AGENT_TOOL_TIMEOUT_MS', 15_000),
      maxModelAttempts: int(env, 'AGENT_MAX_MODEL_ATTEMPTS', 3),
    },
    aggregation: {
      sectionTimeoutMs: int(env, 'AGGREGATION_SECTION_TIMEOUT_MS', 12_000),
    },
    sessions: {
      ttlSeconds: int(env, 'SESSION_TTL_S', 60 * 60 * 24),
      maxMessages: int(env, 'SESSION_MAX_MESSAGES', 40),
    },
  };
}

export const config = loadConfig();
