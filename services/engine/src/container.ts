import { AgentLoop } from './agent/loop';
import { CacheLayer } from './cache/cacheLayer';
import type { AppConfig } from './config';
import type { CacheStore } from './contracts/cacheStore';
import type { ChatModel } from './contracts/llm';
import { OpenAIChatModel } from './llm/openaiChatModel';
import { createProviders, type Providers } from './providers';
import type { FetchImpl } from './providers/http';
import { createRedis } from './redis/client';
import { RedisCacheStore } from './redis/redisCacheStore';
import { AggregationService } from './services/aggregation';
import { ChatService } from './services/chat';
import { SessionStore } from './sessions/sessionStore';
import { MemoryCacheStore } from './storage/memoryCacheStore';
import { ToolRegistry } from './tools/registry';

export interface Engine {
  cache: CacheLayer;
  aggregation: AggregationService;
  tools: ToolRegistry;
  agent: AgentLoop;
  chat: ChatService;
  open(): Promise<void>;
  close(): Promise<void>;
}

/** Overrides for tests and embedding; anything omitted is built from config. */
export interface EngineOverrides {
  store?: CacheStore;
  providers?: Providers;
  model?: ChatModel;
  fetch?: FetchImpl;
}

export function createStore(config: AppConfig['cache']): CacheStore {
  if (config.backend === 'memory') return new MemoryCacheStore();
  return new RedisCacheStore(createRedis(config.redisUrl));
}

/** Explicit construction of every component; nothing here is a module-level singleton. */
export function createEngine(config: AppConfig, overrides: EngineOverrides = {}): Engine {
  const store = overrides.store ?? createStore(config.cache);
  const cache = new CacheLayer(store, { negativeTtlSeconds: config.cache.negativeTtlSeconds });
  const providers = overrides.providers ?? createProviders(config.providers, { fetch: overrides.fetch });
  const aggregation = new AggregationService(cache, providers, {
    sectionTimeoutMs: config.aggregation.sectionTimeoutMs,
  });
  const tools = new ToolRegistry(aggregation);
  const model =
    overrides.model ??
    new OpenAIChatModel({
      apiKey: config.llm.apiKey,
      baseUrl: config.llm.baseUrl,
      model: config.llm.model,
      temperature: config.llm.temperature,
      timeoutMs: config.llm.timeoutMs,
      fetch: overrides.fetch,
    });
  const agent = new AgentLoop({ model, tools, limits: config.agent });
  const sessions = new SessionStore(store, config.sessions);
  const chat = new ChatService(agent, sessions);

  return {
    cache,
    aggregation,
    tools,
    agent,
    chat,
    open: () => cache.open(),
    close: () => cache.close(),
  };
}
