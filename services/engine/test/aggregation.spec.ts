import { describe, expect, it } from 'vitest';
import { failure, success } from '../src/contracts/results';
import { CacheLayer } from '../src/cache/cacheLayer';
import { AggregationService } from '../src/services/aggregation';
import { MemoryCacheStore } from '../src/storage/memoryCacheStore';
import { fakeProviders, frozenCache, never, type FakeProviders } from './fakes';
import { articles, balance, cashFlow, income, quote, series } from './fixtures';

function healthyProviders(): FakeProviders {
  return fakeProviders({
    twelveData: {
      time_series: async (p) => success(series(p.symbol, 3, (i) => 100 + i, p.interval)),
      symbol_search: async () =>
        success([{ symbol: 'MSFT', name: 'Microsoft Corp', exchange: 'NASDAQ', country: 'United States', currency: 'USD', type: 'Common Stock' }]),
    },
    fmp: {
      quote: async (p) => success(quote(p.symbol)),
      income_statement: async () => success(income),
      balance_sheet: async () => success(balance),
      cash_flow: async () => success(cashFlow),
    },
    tavily: { news_search: async () => success(articles(3)) },
  });
}

function service(providers: FakeProviders, sectionTimeoutMs = 1_000) {
  const { cache, store } = frozenCache();
  const aggregation = new AggregationService(cache, providers, {
    sectionTimeoutMs,
    now: () => new Date('2024-03-10T00:00:00Z'),
  });
  return { aggregation, cache, store };
}

describe('AggregationService.getProfile', () => {
  it('returns the sections that completed alongside a timed-out one', async () => {
    const providers = healthyProviders();
    const hanging = fakeProviders({ fmp: { income_statement: () => never() } });
    providers.fmp = hanging.fmp;
    const { aggregation } = service(providers, 50);

    const profile = await aggregation.getProfile(' aapl ', ['price', 'fundamentals', 'news']);

    expect(profile.symbol).toBe('AAPL');
    expect(Object.keys(profile.sections).sort()).toEqual(['fundamentals', 'news', 'price']);
    expect(profile.sections.price?.ok).toBe(true);
    expect(profile.sections.news?.ok).toBe(true);
    expect(profile.sections.fundamentals).toEqual({
      ok: false,
      kind: 'Timeout',
      message: 'fundamentals did not complete within 50ms',
      retriable: true,
    });
  });

  it('returns every section by default and serves a repeat from the cache unchanged', async () => {
    const providers = healthyProviders();
    const { aggregation } = service(providers);

    const cold = await aggregation.getProfile('MSFT');
    const warm = await aggregation.getProfile('msft');

    expect(Object.keys(cold.sections).sort()).toEqual(['fundamentals', 'news', 'price', 'quote']);
    expect(warm.sections).toEqual(cold.sections);
    expect(providers.twelveData.count('time_series')).toBe(1);
    expect(providers.fmp.count('quote')).toBe(1);
    expect(providers.fmp.count('income_statement')).toBe(1);
    expect(providers.tavily.count('news_search')).toBe(1);
  });

  it('marks sections abandoned when the caller has already given up', async () => {
    const { aggregation } = service(healthyProviders());
    const controller = new AbortController();
    controller.abort();

    const profile = await aggregation.getProfile('MSFT', ['price'], { signal: controller.signal });
    expect(profile.sections).toEqual({
      price: { ok: false, kind: 'Timeout', message: 'price abandoned, request deadline expired', retriable: false },
    });
  });
});

describe('AggregationService reads', () => {
  it('caches daily series for a day and intraday series for five minutes, each with a stale window', async () => {
    const { aggregation, cache, store } = service(healthyProviders());

    await aggregation.getPriceSeries('msft');
    await aggregation.getPriceSeries('msft', { interval: '1h', outputsize: 50 });

    const dailyKey = cache.keyFor({
      provider: 'twelve_data',
      operation: 'time_series',
      params: { symbol: 'MSFT', interval: '1day', outputsize: 200 },
    });
    const hourlyKey = cache.keyFor({
      provider: 'twelve_data',
      operation: 'time_series',
      params: { symbol: 'MSFT', interval: '1h', outputsize: 50 },
    });
    expect(await store.ttl(dailyKey)).toBe((86_400 + 3_600) * 1_000);
    expect(await store.ttl(hourlyKey)).toBe((300 + 3_600) * 1_000);
  });

  it('caches quotes for thirty seconds', async () => {
    const { aggregation, cache, store } = service(healthyProviders());
    await aggregation.getQuote('AAPL');
    expect(await store.ttl(cache.keyFor({ provider: 'fmp', operation: 'quote', params: { symbol: 'AAPL' } }))).toBe(30_000);
  });

  it('combines the three statements into a fundamentals summary', async () => {
    const { aggregation } = service(healthyProviders());
    const result = await aggregation.getFundamentals('aapl');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.data.symbol).toBe('AAPL');
    expect(result.data.period).toBe('quarter');
    expect(result.data.currency).toBe('USD');
    expect(result.data.latestPeriodDate).toBe('2023-12-31');
    expect(result.data.metrics.netMargin).toBe(0.2);
  });

  it('fails fundamentals when any statement fails', async () => {
    const providers = healthyProviders();
    providers.fmp = fakeProviders({
      fmp: {
        income_statement: async () => success(income),
        balance_sheet: async () => failure('UpstreamRejected', 'fmp: endpoint not available on this plan'),
        cash_flow: async () => success(cashFlow),
      },
    }).fmp;
    const { aggregation } = service(providers);

    expect(await aggregation.getFundamentals('AAPL')).toEqual({
      ok: false,
      kind: 'UpstreamRejected',
      message: 'fmp: endpoint not available on this plan',
      retriable: false,
    });
  });

  it('searches news by symbol with the default window', async () => {
    const providers = healthyProviders();
    const { aggregation } = service(providers);

    await aggregation.getNews('tsla');
    expect(providers.tavily.calls).toEqual([
      { operation: 'news_search', params: { query: 'TSLA stock', days: 7, maxResults: 10 } },
    ]);
  });

  it('shares one cache entry across keyword casing', async () => {
    const providers = healthyProviders();
    const { aggregation } = service(providers);

    await aggregation.searchSymbols('Micro');
    const again = await aggregation.searchSymbols(' micro');
    expect(again.ok && again.data[0]?.symbol).toBe('MSFT');
    expect(providers.twelveData.count('symbol_search')).toBe(1);
  });
});

describe('AggregationService.getMarketOverview', () => {
  it('reports each ETF independently', async () => {
    const providers = healthyProviders();
    providers.twelveData = fakeProviders({
      twelveData: {
        time_series: async (p) => {
          if (p.symbol === 'QQQ') return failure('UpstreamUnavailable', 'twelve_data: HTTP 503', true);
          if (p.symbol === 'SPY') return success(series('SPY', 2, (i) => 500 + 5 * i));
          return success(series(p.symbol, 1, () => 40));
        },
      },
    }).twelveData;
    const { aggregation } = service(providers);

    const overview = await aggregation.getMarketOverview();

    expect(Object.keys(overview.etfs)).toEqual(['SPY', 'QQQ', 'DIA', 'IWM']);
    const spy = overview.etfs.SPY;
    expect(spy?.ok).toBe(true);
    if (spy?.ok) {
      expect(spy.data.name).toBe('SPDR S&P 500 ETF Trust');
      expect(spy.data.close).toBe(505);
      expect(spy.data.change).toBe(5);
      expect(spy.data.changePercent).toBeCloseTo(1);
      expect(spy.data.asOf).toBe('2024-01-02');
    }
    expect(overview.etfs.QQQ).toEqual({ ok: false, kind: 'UpstreamUnavailable', message: 'twelve_data: HTTP 503', retriable: true });
    const dia = overview.etfs.DIA;
    expect(dia?.ok && dia.data.change).toBeNull();
    expect(overview.generatedAt).toBe('2024-03-10T00:00:00.000Z');
  });
});

describe('AggregationService.generateAnalysisReport', () => {
  it('builds a report from whatever inputs are available', async () => {
    const providers = healthyProviders();
    providers.fmp = fakeProviders({
      fmp: {
        income_statement: async () => failure('NotConfigured', 'fmp: API key is not configured'),
        balance_sheet: async () => failure('NotConfigured', 'fmp: API key is not configured'),
        cash_flow: async () => failure('NotConfigured', 'fmp: API key is not configured'),
      },
    }).fmp;
    const { aggregation } = service(providers);

    const result = await aggregation.generateAnalysisReport('nvda');
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.data.symbol).toBe('NVDA');
    expect(result.data.generatedAt).toBe('2024-03-10T00:00:00.000Z');
    expect(result.data.headlines).toHaveLength(3);
    expect(result.data.unavailable).toEqual([
      { input: 'fundamentals', kind: 'NotConfigured', message: 'fmp: API key is not configured' },
    ]);
  });

  it('fails when no input could be fetched', async () => {
    const down = failure('UpstreamUnavailable', 'down', true);
    const providers = fakeProviders({
      twelveData: { time_series: async () => down },
      fmp: {
        income_statement: async () => down,
        balance_sheet: async () => down,
        cash_flow: async () => down,
      },
      tavily: { news_search: async () => down },
    });
    const { aggregation } = service(providers);

    expect(await aggregation.generateAnalysisReport('NVDA')).toEqual(down);
  });

  it('rebuilds a partial report once the failed input recovers', async () => {
    let fmpDown = true;
    const statement = <T>(data: T) => async () =>
      fmpDown ? failure('UpstreamUnavailable', 'HTTP 503', true) : success(data);
    const providers = healthyProviders();
    providers.fmp = fakeProviders({
      fmp: { income_statement: statement(income), balance_sheet: statement(balance), cash_flow: statement(cashFlow) },
    }).fmp;
    let now = 0;
    const clock = () => now;
    const cache = new CacheLayer(new MemoryCacheStore({ now: clock }), { now: clock });
    const aggregation = new AggregationService(cache, providers, { sectionTimeoutMs: 1_000 });

    const partial = await aggregation.generateAnalysisReport('AAPL');
    expect(partial.ok && partial.data.unavailable.map((u) => u.input)).toEqual(['fundamentals']);

    fmpDown = false;
    now += 31_000;
    const recovered = await aggregation.generateAnalysisReport('AAPL');
    expect(recovered.ok && recovered.data.unavailable).toEqual([]);
    expect(recovered.ok && recovered.data.fundamentals).not.toBeNull();

    now += 31_000;
    await aggregation.generateAnalysisReport('AAPL');
    expect(providers.fmp.count('income_statement')).toBe(2);
  });
});
