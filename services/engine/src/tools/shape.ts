import type {
  AnalysisReport,
  FundamentalsSummary,
  NewsArticle,
  PriceSeries,
  Quote,
  SymbolMatch,
} from '../types';

export const SUMMARY_MAX_CHARS = 300;

export function round(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function roundOrNull(value: number | null, decimals = 2): number | null {
  return value === null ? null : round(value, decimals);
}

/** Limits by code point, so a surrogate pair is never split. */
export function truncate(text: string, max = SUMMARY_MAX_CHARS): string {
  const chars = Array.from(text.replace(/\s+/g, ' ').trim());
  return chars.length <= max ? chars.join('') : `${chars.slice(0, max - 1).join('').trimEnd()}…`;
}

export function shapeQuote(q: Quote) {
  return {
    symbol: q.symbol,
    name: q.name,
    price: round(q.price),
    change: roundOrNull(q.change),
    changePercent: roundOrNull(q.changePercent),
    open: roundOrNull(q.open),
    previousClose: roundOrNull(q.previousClose),
    dayRange: q.dayLow !== null && q.dayHigh !== null ? [round(q.dayLow), round(q.dayHigh)] : null,
    yearRange: q.yearLow !== null && q.yearHigh !== null ? [round(q.yearLow), round(q.yearHigh)] : null,
    volume: q.volume,
    marketCap: q.marketCap,
    asOf: q.asOf,
  };
}

/** Most recent `limit` bars, oldest first. */
export function shapePriceHistory(series: PriceSeries, limit: number) {
  const bars = series.bars.slice(-limit);
  const latest = bars[bars.length - 1];
  return {
    symbol: series.symbol,
    interval: series.interval,
    currency: series.currency,
    latestClose: latest ? round(latest.close) : null,
    latestTimestamp: latest ? latest.timestamp : null,
    bars: bars.map((b) => ({
      t: b.timestamp,
      o: round(b.open),
      h: round(b.high),
      l: round(b.low),
      c: round(b.close),
      v: b.volume,
    })),
  };
}

export function shapeFundamentals(f: FundamentalsSummary) {
  const m = f.metrics;
  const latest = f.income[0];
  return {
    symbol: f.symbol,
    period: f.period,
    currency: f.currency,
    latestPeriodDate: f.latestPeriodDate,
    latest: latest
      ? {
          revenue: latest.revenue,
          netIncome: latest.netIncome,
          eps: roundOrNull(latest.eps),
        }
      : null,
    metrics: {
      grossMargin: roundOrNull(m.grossMargin, 4),
      operatingMargin: roundOrNull(m.operatingMargin, 4),
      netMargin: roundOrNull(m.netMargin, 4),
      revenueGrowth: roundOrNull(m.revenueGrowth, 4),
      netIncomeGrowth: roundOrNull(m.netIncomeGrowth, 4),
      debtToEquity: roundOrNull(m.debtToEquity, 4),
      currentRatio: roundOrNull(m.currentRatio, 4),
      returnOnEquity: roundOrNull(m.returnOnEquity, 4),
      freeCashFlow: m.freeCashFlow,
      positiveFcfPeriods: m.positiveFcfPeriods,
      periodsReported: f.cashFlow.length,
    },
  };
}

export function shapeNews(articles: NewsArticle[]) {
  return articles.map((a) => ({
    title: a.title,
    source: a.source,
    publishedAt: a.publishedAt,
    url: a.url,
    summary: truncate(a.summary),
  }));
}

export function shapeSymbolMatches(matches: SymbolMatch[], limit = 10) {
  return matches.slice(0, limit).map((m) => ({
    symbol: m.symbol,
    name: m.name,
    exchange: m.exchange,
    country: m.country,
    type: m.type,
  }));
}

export function shapeReport(r: AnalysisReport) {
  const t = r.technical;
  return {
    symbol: r.symbol,
    bias: r.bias,
    score: r.score,
    signals: r.signals,
    technical: t
      ? {
          lastClose: round(t.lastClose),
          asOf: t.asOf,
          trend: t.trend,
          sma20: roundOrNull(t.sma20),
          sma50: roundOrNull(t.sma50),
          rsi14: roundOrNull(t.rsi14),
          rsiState: t.rsiState,
          macdState: t.macd?.state ?? null,
          bollingerPosition: t.bollinger?.position ?? null,
        }
      : null,
    fundamentals: r.fundamentals,
    news: r.news
      ? {
          sentiment: r.news.overallSentiment,
          impact: r.news.overallImpact,
          significantHeadlines: r.news.significantHeadlines,
        }
      : null,
    headlines: r.headlines,
    unavailable: r.unavailable.map((u) => `${u.input}: ${u.kind}`),
  };
}
