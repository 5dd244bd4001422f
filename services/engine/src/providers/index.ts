import type { AppConfig } from '../config';
import type { ProviderAdapter } from '../contracts/provider';
import { createFmpAdapter, type FmpOps } from './fmp';
import type { AdapterDeps } from './httpAdapter';
import { createTavilyAdapter, type TavilyOps } from './tavily';
import { createTwelveDataAdapter, type TwelveDataOps } from './twelveData';

export interface Providers {
  twelveData: ProviderAdapter<TwelveDataOps>;
  fmp: ProviderAdapter<FmpOps>;
  tavily: ProviderAdapter<TavilyOps>;
}

/** Shared deps (fetch, clock) apply to every adapter; each keeps its own rate limiter. */
export function createProviders(config: AppConfig['providers'], deps: Omit<AdapterDeps, 'limiter'> = {}): Providers {
  return {
    twelveData: createTwelveDataAdapter(config.twelveData, deps),
    fmp: createFmpAdapter(config.fmp, deps),
    tavily: createTavilyAdapter(config.tavily, deps),
  };
}
