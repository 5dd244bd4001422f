import { failure, success, type Failure, type ProviderResult } from '../contracts/results';
import type { Interval, PriceSeries } from '../types';
import { bollinger, macd, rsi } from './indicators';

export interface IndicatorSeries<P> {
  symbol: string;
  interval: Interval;
  indicator: 'rsi' | 'macd' | 'bollinger';
  params: Record<string, number>;
  /** Oldest first, one point per bar the indicator is defined for. */
  points: P[];
}

export interface RsiPoint {
  timestamp: string;
  rsi: number;
}

export interface MacdPoint {
  timestamp: string;
  macd: number;
  signal: number;
  histogram: number;
}

export interface BollingerPoint {
  timestamp: string;
  close: number;
  upper: number;
  middle: number;
  lower: number;
}

function tooShort(name: string, needed: number, series: PriceSeries): Failure {
  return failure('InvalidArguments', `${name} needs at least ${needed} bars, got ${series.bars.length}`);
}

// Indicator outputs are aligned to the end of the input.
function tail<T>(items: T[], n: number): T[] {
  return items.slice(items.length - n);
}

export function rsiSeries(series: PriceSeries, period = 14): ProviderResult<IndicatorSeries<RsiPoint>> {
  const values = rsi(series.bars.map((b) => b.close), period);
  if (!values.length) return tooShort(`rsi(${period})`, period + 1, series);
  const bars = tail(series.bars, values.length);
  return success({
    symbol: series.symbol,
    interval: series.interval,
    indicator: 'rsi',
    params: { period },
    points: bars.map((bar, i) => ({ timestamp: bar.timestamp, rsi: values[i] })),
  });
}

export function macdSeries(
  series: PriceSeries,
  fast = 12,
  slow = 26,
  signalPeriod = 9,
): ProviderResult<IndicatorSeries<MacdPoint>> {
  const m = macd(series.bars.map((b) => b.close), fast, slow, signalPeriod);
  if (!m.signal.length) return tooShort(`macd(${fast},${slow},${signalPeriod})`, slow + signalPeriod - 1, series);
  const bars = tail(series.bars, m.signal.length);
  return success({
    symbol: series.symbol,
    interval: series.interval,
    indicator: 'macd',
    params: { fast, slow, signal: signalPeriod },
    points: bars.map((bar, i) => ({
      timestamp: bar.timestamp,
      macd: m.macd[i],
      signal: m.signal[i],
      histogram: m.histogram[i],
    })),
  });
}

export function bollingerSeries(series: PriceSeries, period = 20, width = 2): ProviderResult<IndicatorSeries<BollingerPoint>> {
  const bands = bollinger(series.bars.map((b) => b.close), period, width);
  if (!bands.middle.length) return tooShort(`bollinger(${period})`, period, series);
  const bars = tail(series.bars, bands.middle.length);
  return success({
    symbol: series.symbol,
    interval: series.interval,
    indicator: 'bollinger',
    params: { period, width },
    points: bars.map((bar, i) => ({
      timestamp: bar.timestamp,
      close: bar.close,
      upper: bands.upper[i],
      middle: bands.middle[i],
      lower: bands.lower[i],
    })),
  });
}
