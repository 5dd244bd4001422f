import { z } from 'zod';
import type { ProviderSettings } from '../config';
import { failure, success, type Failure } from '../contracts/results';
import type { Interval, PriceBar, PriceSeries, SymbolMatch } from '../types';
import { describeZodError, HttpProviderAdapter, type AdapterDeps } from './httpAdapter';
import { numeric } from './schemas';

export interface TimeSeriesParams {
  symbol: string;
  interval: Interval;
  outputsize?: number;
}

export interface SymbolSearchParams {
  keyword: string;
}

export type TwelveDataOps = {
  time_series: { params: TimeSeriesParams; result: PriceSeries };
  symbol_search: { params: SymbolSearchParams; result: SymbolMatch[] };
};

export type TwelveDataAdapter = HttpProviderAdapter<TwelveDataOps>;

const timeSeriesSchema = z.object({
  meta: z
    .object({
      symbol: z.string(),
      currency: z.string().optional(),
      exchange: z.string().optional(),
    })
    .optional(),
  values: z
    .array(
      z.object({
        datetime: z.string().min(1),
        open: numeric,
        high: numeric,
        low: numeric,
        close: numeric,
        // FX and index series carry no volume
        volume: numeric.optional(),
      }),
    )
    .min(1, 'no values returned'),
});

const symbolSearchSchema = z.object({
  data: z.array(
    z.object({
      symbol: z.string(),
      instrument_name: z.string(),
      exchange: z.string().optional(),
      country: z.string().optional(),
      currency: z.string().optional(),
      instrument_type: z.string().optional(),
    }),
  ),
});

const errorBodySchema = z.object({
  status: z.literal('error'),
  code: z.number().optional(),
  message: z.string().optional(),
});

function toIsoTimestamp(datetime: string): string {
  return datetime.includes(' ') ? datetime.replace(' ', 'T') : datetime;
}

export function detectTwelveDataError(body: unknown): Failure | null {
  const parsed = errorBodySchema.safeParse(body);
  if (!parsed.success) return null;
  const { code, message = 'unknown error from data provider' } = parsed.data;
  const detail = `twelve_data: ${message}`;
  if (code === 429) return failure('RateLimited', detail, true);
  if (code !== undefined && code >= 500) return failure('UpstreamUnavailable', detail, true);
  return failure('UpstreamRejected', detail, false);
}

export function createTwelveDataAdapter(settings: ProviderSettings, deps: AdapterDeps = {}): TwelveDataAdapter {
  return new HttpProviderAdapter<TwelveDataOps>(
    {
      id: 'twelve_data',
      auth: { in: 'query', name: 'apikey' },
      detectBodyError: detectTwelveDataError,
      operations: {
        time_series: {
          request: (params) => ({
            method: 'GET',
            path: 'time_series',
            query: { symbol: params.symbol, interval: params.interval, outputsize: params.outputsize },
          }),
          normalize: (body, params) => {
            const parsed = timeSeriesSchema.safeParse(body);
            if (!parsed.success) {
              return failure('InvalidUpstreamResponse', `twelve_data time_series: ${describeZodError(parsed.error)}`);
            }
            const bars: PriceBar[] = parsed.data.values
              .map((v) => ({
                timestamp: toIsoTimestamp(v.datetime),
                open: v.open,
                high: v.high,
                low: v.low,
                close: v.close,
                volume: v.volume ?? 0,
              }))
              .sort((a, b) => (a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : 0));
            return success<PriceSeries>({
              symbol: parsed.data.meta?.symbol ?? params.symbol,
              interval: params.interval,
              currency: parsed.data.meta?.currency ?? null,
              exchange: parsed.data.meta?.exchange ?? null,
              bars,
            });
          },
        },
        symbol_search: {
          request: (params) => ({ method: 'GET', path: 'symbol_search', query: { symbol: params.keyword } }),
          normalize: (body) => {
            const parsed = symbolSearchSchema.safeParse(body);
            if (!parsed.success) {
              return failure('InvalidUpstreamResponse', `twelve_data symbol_search: ${describeZodError(parsed.error)}`);
            }
            return success<SymbolMatch[]>(
              parsed.data.data.map((m) => ({
                symbol: m.symbol,
                name: m.instrument_name,
                exchange: m.exchange ?? null,
                country: m.country ?? null,
                currency: m.currency ?? null,
                type: m.instrument_type ?? null,
              })),
            );
          },
        },
      },
    },
    settings,
    deps,
  );
}
