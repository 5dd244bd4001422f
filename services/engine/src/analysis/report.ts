import type { ProviderResult } from '../contracts/results';
import type {
  AnalysisReport,
  Bias,
  FundamentalsSummary,
  NewsArticle,
  PriceSeries,
  TechnicalSnapshot,
} from '../types';
import { assessFundamentals } from './fundamentals';
import { bollinger, last, macd, rsi, sma } from './indicators';
import { classifyArticle, newsState } from './news';

export interface ReportInputs {
  price: ProviderResult<PriceSeries>;
  fundamentals: ProviderResult<FundamentalsSummary>;
  news: ProviderResult<NewsArticle[]>;
}

const MAX_HEADLINES = 5;

export function technicalSnapshot(series: PriceSeries): TechnicalSnapshot | null {
  const latest = series.bars[series.bars.length - 1];
  if (!latest) return null;
  const closes = series.bars.map((b) => b.close);

  const sma20 = last(sma(closes, 20));
  const sma50 = last(sma(closes, 50));
  const rsi14 = last(rsi(closes, 14));

  const m = macd(closes);
  const macdLine = last(m.macd);
  const signal = last(m.signal);
  const histogram = last(m.histogram);

  const bands = bollinger(closes, 20, 2);
  const upper = last(bands.upper);
  const middle = last(bands.middle);
  const lower = last(bands.lower);

  let trend: TechnicalSnapshot['trend'] = null;
  if (sma20 !== null && sma50 !== null) {
    if (latest.close > sma20 && sma20 > sma50) trend = 'uptrend';
    else if (latest.close < sma20 && sma20 < sma50) trend = 'downtrend';
    else trend = 'sideways';
  }

  return {
    lastClose: latest.close,
    asOf: latest.timestamp,
    sma20,
    sma50,
    rsi14,
    rsiState: rsi14 === null ? null : rsi14 > 70 ? 'overbought' : rsi14 < 30 ? 'oversold' : 'neutral',
    macd:
      macdLine !== null && signal !== null && histogram !== null
        ? {
            macd: macdLine,
            signal,
            histogram,
            state: macdLine > signal ? 'bullish' : macdLine < signal ? 'bearish' : 'neutral',
          }
        : null,
    bollinger:
      upper !== null && middle !== null && lower !== null
        ? {
            upper,
            middle,
            lower,
            position: latest.close > upper ? 'above_upper' : latest.close < lower ? 'below_lower' : 'inside',
          }
        : null,
    trend,
  };
}

export function biasFromScore(score: number): Bias {
  if (score >= 2) return 'bullish';
  if (score <= -2) return 'bearish';
  return 'neutral';
}

/**
 * Rule-based read of the inputs. Each signal moves the score by one; missing
 * inputs are listed under `unavailable` and contribute nothing.
 */
export function buildAnalysisReport(symbol: string, inputs: ReportInputs, now: Date = new Date()): AnalysisReport {
  const report: AnalysisReport = {
    symbol,
    generatedAt: now.toISOString(),
    technical: null,
    fundamentals: null,
    news: null,
    headlines: [],
    signals: [],
    score: 0,
    bias: 'neutral',
    unavailable: [],
  };

  const add = (delta: number, reason: string) => {
    report.score += delta;
    report.signals.push(reason);
  };

  if (inputs.price.ok) {
    const t = technicalSnapshot(inputs.price.data);
    report.technical = t;
    if (t?.trend === 'uptrend') add(1, 'price above rising 20/50-day averages');
    if (t?.trend === 'downtrend') add(-1, 'price below falling 20/50-day averages');
    if (t?.rsiState === 'overbought') add(-1, `RSI ${t.rsi14?.toFixed(1)} is overbought`);
    if (t?.rsiState === 'oversold') add(1, `RSI ${t.rsi14?.toFixed(1)} is oversold`);
    if (t?.macd?.state === 'bullish') add(1, 'MACD above its signal line');
    if (t?.macd?.state === 'bearish') add(-1, 'MACD below its signal line');
  } else {
    report.unavailable.push({ input: 'price', kind: inputs.price.kind, message: inputs.price.message });
  }

  if (inputs.fundamentals.ok) {
    const f = assessFundamentals(inputs.fundamentals.data.metrics, inputs.fundamentals.data.cashFlow);
    report.fundamentals = f;
    if (f.profitability === 'Healthy') add(1, 'healthy profitability');
    if (f.profitability === 'LossMaking') add(-1, 'loss-making');
    if (f.growth === 'Strong') add(1, 'strong revenue growth');
    if (f.growth === 'Negative') add(-1, 'shrinking revenue');
    if (f.balanceSheet === 'Stressed') add(-1, 'stressed balance sheet');
  } else {
    report.unavailable.push({
      input: 'fundamentals',
      kind: inputs.fundamentals.kind,
      message: inputs.fundamentals.message,
    });
  }

  if (inputs.news.ok) {
    report.headlines = inputs.news.data.slice(0, MAX_HEADLINES).map(({ title, url, source, publishedAt }) => ({
      title,
      url,
      source,
      publishedAt,
    }));
    const state = newsState(inputs.news.data.map(classifyArticle));
    report.news = state;
    const total = inputs.news.data.length;
    if (state.overallSentiment === 'positive') add(1, `positive news flow (${state.counts.positive} of ${total} articles)`);
    if (state.overallSentiment === 'negative') add(-1, `negative news flow (${state.counts.negative} of ${total} articles)`);
  } else {
    report.unavailable.push({ input: 'news', kind: inputs.news.kind, message: inputs.news.message });
  }

  report.bias = biasFromScore(report.score);
  return report;
}
