/**
 * Technical indicators over a close-price series (oldest first). Each
 * returns the indicator series aligned to the END of the input, so the last
 * element always corresponds to the latest close. Short inputs yield empty series.
 */

export function sma(values: number[], period: number): number[] {
  if (period <= 0 || values.length < period) return [];
  const out: number[] = [];
  let sum = 0;
  for (let i = 0; i < values.length; i++) {
    sum += values[i];
    if (i >= period) sum -= values[i - period];
    if (i >= period - 1) out.push(sum / period);
  }
  return out;
}

/** Seeded with the SMA of the first `period` values. */
export function ema(values: number[], period: number): number[] {
  if (period <= 0 || values.length < period) return [];
  const k = 2 / (period + 1);
  let prev = values.slice(0, period).reduce((a, b) => a + b, 0) / period;
  const out = [prev];
  for (let i = period; i < values.length; i++) {
    prev = values[i] * k + prev * (1 - k);
    out.push(prev);
  }
  return out;
}

/** Wilder's RSI. */
export function rsi(values: number[], period = 14): number[] {
  if (values.length <= period) return [];
  let gain = 0;
  let loss = 0;
  for (let i = 1; i <= period; i++) {
    const change = values[i] - values[i - 1];
    if (change >= 0) gain += change;
    else loss -= change;
  }
  let avgGain = gain / period;
  let avgLoss = loss / period;

  const toRsi = () => (avgLoss === 0 ? (avgGain === 0 ? 50 : 100) : 100 - 100 / (1 + avgGain / avgLoss));
  const out = [toRsi()];
  for (let i = period + 1; i < values.length; i++) {
    const change = values[i] - values[i - 1];
    avgGain = (avgGain * (period - 1) + Math.max(change, 0)) / period;
    avgLoss = (avgLoss * (period - 1) + Math.max(-change, 0)) / period;
    out.push(toRsi());
  }
  return out;
}

export interface MacdSeries {
  macd: number[];
  signal: number[];
  histogram: number[];
}

export function macd(values: number[], fast = 12, slow = 26, signalPeriod = 9): MacdSeries {
  const slowEma = ema(values, slow);
  const fastEma = ema(values, fast).slice(slow - fast);
  const line = slowEma.map((s, i) => fastEma[i] - s);
  const signal = ema(line, signalPeriod);
  const aligned = line.slice(line.length - signal.length);
  return {
    macd: aligned,
    signal,
    histogram: aligned.map((m, i) => m - signal[i]),
  };
}

export interface BollingerBands {
  upper: number[];
  middle: number[];
  lower: number[];
}

/** Population standard deviation over each window. */
export function bollinger(values: number[], period = 20, width = 2): BollingerBands {
  const middle = sma(values, period);
  const upper: number[] = [];
  const lower: number[] = [];
  middle.forEach((mean, i) => {
    const window = values.slice(i, i + period);
    const variance = window.reduce((acc, v) => acc + (v - mean) ** 2, 0) / period;
    const sd = Math.sqrt(variance);
    upper.push(mean + width * sd);
    lower.push(mean - width * sd);
  });
  return { upper, middle, lower };
}

export function last(values: number[]): number | null {
  return values.length ? values[values.length - 1] : null;
}
