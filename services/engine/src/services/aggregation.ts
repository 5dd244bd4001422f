import {
  bollingerSeries,
  macdSeries,
  rsiSeries,
  type BollingerPoint,
  type IndicatorSeries,
  type MacdPoint,
  type RsiPoint,
} from '../analysis/indicatorSeries';
import { buildAnalysisReport } from '../analysis/report';
import { computeMetrics } from '../analysis/fundamentals';
import type { CacheLayer, GetOrFetchOptions, TtlPreset } from '../cache/cacheLayer';
import type { CacheKeySpec } from '../cache/keys';
import { errorMessage, failure, success, type ProviderResult } from '../contracts/results';
import { createComponentLogger, type Logger } from '../logger';
import type { Providers } from '../providers';
import type {
  AnalysisReport,
  EtfSnapshot,
  FundamentalsSummary,
  Interval,
  NewsArticle,
  PriceSeries,
  Quote,
  StatementPeriod,
  SymbolMatch,
} from '../types';
import { abortable, AbortedError, scopedSignal } from '../util/async';

export interface SectionData {
  price: PriceSeries;
  quote: Quote;
  fundamentals: FundamentalsSummary;
  news: NewsArticle[];
}

export type ProfileSection = keyof SectionData;

export const PROFILE_SECTIONS: readonly ProfileSection[] = ['price', 'quote', 'fundamentals', 'news'];

export type ProfileSections = { [S in ProfileSection]?: ProviderResult<SectionData[S]> };

export interface AggregatedProfile {
  symbol: string;
  sections: ProfileSections;
  generatedAt: string;
}

export interface MarketOverview {
  etfs: Record<string, ProviderResult<EtfSnapshot>>;
  generatedAt: string;
}

export interface ReadOptions {
  signal?: AbortSignal;
}

export interface PriceOptions extends ReadOptions {
  interval?: Interval;
  outputsize?: number;
}

export interface FundamentalsOptions extends ReadOptions {
  period?: StatementPeriod;
  limit?: number;
}

export interface NewsOptions extends ReadOptions {
  days?: number;
  maxResults?: number;
}

export interface IndicatorOptions extends ReadOptions {
  interval?: Interval;
  outputsize?: number;
}

export interface AggregationOptions {
  sectionTimeoutMs: number;
  logger?: Logger;
  now?: () => Date;
}

export const MARKET_ETFS: readonly { symbol: string; name: string }[] = [
  { symbol: 'SPY', name: 'SPDR S&P 500 ETF Trust' },
  { symbol: 'QQQ', name: 'Invesco QQQ Trust' },
  { symbol: 'DIA', name: 'SPDR Dow Jones Industrial Average ETF' },
  { symbol: 'IWM', name: 'iShares Russell 2000 ETF' },
];

const DAILY_INTERVALS: ReadonlySet<Interval> = new Set<Interval>(['1day', '1week', '1month']);
const DEFAULT_OUTPUTSIZE = 200;
const STALE_IF_ERROR_SECONDS = 3600;

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

/**
 * Market data reads, every one mediated by the cache layer. Caller signals
 * bound how long a read is waited on; the upstream fetch itself is shared
 * and runs to completion so it can still populate the cache.
 */
export class AggregationService {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly cache: CacheLayer,
    private readonly providers: Providers,
    private readonly options: AggregationOptions,
  ) {
    this.log = options.logger ?? createComponentLogger('aggregation');
    this.now = options.now ?? (() => new Date());
  }

  async getPriceSeries(symbol: string, options: PriceOptions = {}): Promise<ProviderResult<PriceSeries>> {
    const interval = options.interval ?? '1day';
    return this.cachedSeries(
      normalizeSymbol(symbol),
      interval,
      options.outputsize ?? DEFAULT_OUTPUTSIZE,
      DAILY_INTERVALS.has(interval) ? 'long' : 'short',
      options.signal,
    );
  }

  async getQuote(symbol: string, options: ReadOptions = {}): Promise<ProviderResult<Quote>> {
    const params = { symbol: normalizeSymbol(symbol) };
    return this.read(
      { provider: 'fmp', operation: 'quote', params },
      () => this.providers.fmp.fetch('quote', params),
      'realtime',
      options.signal,
    );
  }

  /** Three statements concurrently, then derived metrics. Any statement failure fails the whole read. */
  async getFundamentals(symbol: string, options: FundamentalsOptions = {}): Promise<ProviderResult<FundamentalsSummary>> {
    const params = { symbol: normalizeSymbol(symbol), period: options.period ?? 'quarter', limit: options.limit ?? 4 };
    const [income, balance, cashFlow] = await Promise.all([
      this.read(
        { provider: 'fmp', operation: 'income_statement', params },
        () => this.providers.fmp.fetch('income_statement', params),
        'long',
        options.signal,
      ),
      this.read(
        { provider: 'fmp', operation: 'balance_sheet', params },
        () => this.providers.fmp.fetch('balance_sheet', params),
        'long',
        options.signal,
      ),
      this.read(
        { provider: 'fmp', operation: 'cash_flow', params },
        () => this.providers.fmp.fetch('cash_flow', params),
        'long',
        options.signal,
      ),
    ]);
    if (!income.ok) return income;
    if (!balance.ok) return balance;
    if (!cashFlow.ok) return cashFlow;

    return success<FundamentalsSummary>(
      {
        symbol: params.symbol,
        period: params.period,
        currency: income.data[0]?.currency ?? null,
        latestPeriodDate: income.data[0]?.date ?? null,
        income: income.data,
        balance: balance.data,
        cashFlow: cashFlow.data,
        metrics: computeMetrics(income.data, balance.data, cashFlow.data),
      },
      new Date(income.fetchedAt),
    );
  }

  async getNews(symbol: string, options: NewsOptions = {}): Promise<ProviderResult<NewsArticle[]>> {
    const params = {
      query: `${normalizeSymbol(symbol)} stock`,
      days: options.days ?? 7,
      maxResults: options.maxResults ?? 10,
    };
    return this.read(
      { provider: 'tavily', operation: 'news_search', params: { ...params } },
      () => this.providers.tavily.fetch('news_search', params),
      'medium',
      options.signal,
    );
  }

  async searchSymbols(keyword: string, options: ReadOptions = {}): Promise<ProviderResult<SymbolMatch[]>> {
    const params = { keyword: keyword.trim() };
    return this.read(
      { provider: 'twelve_data', operation: 'symbol_search', params: { keyword: params.keyword.toLowerCase() } },
      () => this.providers.twelveData.fetch('symbol_search', params),
      'medium',
      options.signal,
    );
  }

  async getRsi(
    symbol: string,
    options: IndicatorOptions & { period?: number } = {},
  ): Promise<ProviderResult<IndicatorSeries<RsiPoint>>> {
    const price = await this.getPriceSeries(symbol, options);
    return price.ok ? rsiSeries(price.data, options.period) : price;
  }

  async getMacd(symbol: string, options: IndicatorOptions = {}): Promise<ProviderResult<IndicatorSeries<MacdPoint>>> {
    const price = await this.getPriceSeries(symbol, options);
    return price.ok ? macdSeries(price.data) : price;
  }

  async getBollinger(
    symbol: string,
    options: IndicatorOptions & { period?: number; width?: number } = {},
  ): Promise<ProviderResult<IndicatorSeries<BollingerPoint>>> {
    const price = await this.getPriceSeries(symbol, options);
    return price.ok ? bollingerSeries(price.data, options.period, options.width) : price;
  }

  /**
   * Fan-out over the requested sections, each under its own timeout. Never
   * throws; the returned `sections` has exactly the requested keys.
   */
  async getProfile(
    symbol: string,
    sections: readonly ProfileSection[] = PROFILE_SECTIONS,
    options: ReadOptions = {},
  ): Promise<AggregatedProfile> {
    const normalized = normalizeSymbol(symbol);
    const out: ProfileSections = {};
    const loaders: { [S in ProfileSection]: (signal: AbortSignal) => Promise<ProviderResult<SectionData[S]>> } = {
      price: (signal) => this.getPriceSeries(normalized, { signal }),
      quote: (signal) => this.getQuote(normalized, { signal }),
      fundamentals: (signal) => this.getFundamentals(normalized, { signal }),
      news: (signal) => this.getNews(normalized, { signal }),
    };

    const load = async <S extends ProfileSection>(section: S): Promise<void> => {
      out[section] = await this.runSection(section, loaders[section], options.signal);
    };

    await Promise.all([...new Set(sections)].map((section) => load(section)));
    return { symbol: normalized, sections: out, generatedAt: this.now().toISOString() };
  }

  /** Latest daily close of each market ETF; one failing ETF does not affect the others. */
  async getMarketOverview(options: ReadOptions = {}): Promise<MarketOverview> {
    const entries = await Promise.all(
      MARKET_ETFS.map(async ({ symbol, name }): Promise<[string, ProviderResult<EtfSnapshot>]> => {
        const series = await this.cachedSeries(symbol, '1day', 2, 'short', options.signal);
        if (!series.ok) return [symbol, series];
        const bars = series.data.bars;
        const latest = bars[bars.length - 1];
        if (!latest) return [symbol, failure('InvalidUpstreamResponse', `no bars returned for ${symbol}`)];
        const previous = bars.length > 1 ? bars[bars.length - 2] : undefined;
        const change = previous ? latest.close - previous.close : null;
        return [
          symbol,
          success<EtfSnapshot>(
            {
              symbol,
              name,
              close: latest.close,
              change,
              changePercent: previous && change !== null && previous.close !== 0 ? (change / previous.close) * 100 : null,
              asOf: latest.timestamp,
            },
            new Date(series.fetchedAt),
          ),
        ];
      }),
    );
    return { etfs: Object.fromEntries(entries), generatedAt: this.now().toISOString() };
  }

  /**
   * Technicals, fundamentals and headlines combined into one rule-based read.
   * Fails only when none of the inputs could be fetched.
   */
  async generateAnalysisReport(symbol: string, options: ReadOptions = {}): Promise<ProviderResult<AnalysisReport>> {
    const normalized = normalizeSymbol(symbol);
    return this.read(
      { provider: 'engine', operation: 'analysis_report', params: { symbol: normalized } },
      async (): Promise<ProviderResult<AnalysisReport>> => {
        const [price, fundamentals, news] = await Promise.all([
          this.getPriceSeries(normalized),
          this.getFundamentals(normalized),
          this.getNews(normalized),
        ]);
        if (!price.ok && !fundamentals.ok && !news.ok) return price;
        return success(buildAnalysisReport(normalized, { price, fundamentals, news }, this.now()));
      },
      'medium',
      options.signal,
      { isPartial: (report) => report.unavailable.length > 0 },
    );
  }

  private async runSection<S extends ProfileSection>(
    section: S,
    loader: (signal: AbortSignal) => Promise<ProviderResult<SectionData[S]>>,
    callerSignal?: AbortSignal,
  ): Promise<ProviderResult<SectionData[S]>> {
    const timeoutMs = this.options.sectionTimeoutMs;
    const scope = scopedSignal(timeoutMs, callerSignal);
    try {
      const result = await abortable(loader(scope.signal), scope.signal);
      if (!result.ok && result.kind === 'Timeout' && scope.timedOut()) {
        return failure('Timeout', `${section} did not complete within ${timeoutMs}ms`, true);
      }
      return result;
    } catch (err) {
      if (err instanceof AbortedError) {
        return scope.timedOut()
          ? failure('Timeout', `${section} did not complete within ${timeoutMs}ms`, true)
          : failure('Timeout', `${section} abandoned, request deadline expired`, false);
      }
      this.log.error({ err, section }, 'profile section failed unexpectedly');
      return failure('Internal', errorMessage(err));
    } finally {
      scope.dispose();
    }
  }

  private async cachedSeries(
    symbol: string,
    interval: Interval,
    outputsize: number,
    ttl: TtlPreset,
    signal?: AbortSignal,
  ): Promise<ProviderResult<PriceSeries>> {
    const params = { symbol, interval, outputsize };
    return this.read(
      { provider: 'twelve_data', operation: 'time_series', params: { ...params } },
      () => this.providers.twelveData.fetch('time_series', params),
      ttl,
      signal,
      { staleIfErrorSeconds: STALE_IF_ERROR_SECONDS },
    );
  }

  private async read<T>(
    spec: CacheKeySpec,
    fetchFn: () => Promise<ProviderResult<T>>,
    ttl: TtlPreset,
    signal?: AbortSignal,
    cacheOptions: Omit<GetOrFetchOptions<T>, 'signal'> = {},
  ): Promise<ProviderResult<T>> {
    const entry = await this.cache.getOrFetch(spec, fetchFn, ttl, { ...cacheOptions, signal });
    this.log.debug({ key: entry.key, source: entry.source, stale: entry.stale, ok: entry.value.ok }, 'read');
    return entry.value;
  }
}
