import { z } from 'zod';
import type { JsonSchema, ToolCallResult, ToolSpec } from '../contracts/llm';
import { errorMessage, failure, mapSuccess, type ProviderResult } from '../contracts/results';
import { createComponentLogger, type Logger } from '../logger';
import { describeZodError } from '../providers/httpAdapter';
import type { AggregationService } from '../services/aggregation';
import {
  shapeFundamentals,
  shapeNews,
  shapePriceHistory,
  shapeQuote,
  shapeReport,
  shapeSymbolMatches,
} from './shape';

/** The slice of the aggregation service the tools read through. */
export type MarketData = Pick<
  AggregationService,
  'getQuote' | 'getPriceSeries' | 'getFundamentals' | 'getNews' | 'searchSymbols' | 'generateAnalysisReport'
>;

export interface ToolContext {
  callId: string;
  signal?: AbortSignal;
}

interface ToolDefinition<S extends z.ZodTypeAny> {
  spec: ToolSpec;
  args: S;
  run(args: z.output<S>, data: MarketData, signal?: AbortSignal): Promise<ProviderResult<unknown>>;
}

interface RegisteredTool {
  spec: ToolSpec;
  execute(raw: Record<string, unknown>, data: MarketData, signal?: AbortSignal): Promise<ProviderResult<unknown>>;
}

function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): RegisteredTool {
  return {
    spec: definition.spec,
    async execute(raw, data, signal) {
      const parsed = definition.args.safeParse(raw);
      if (!parsed.success) {
        return failure('InvalidArguments', `${definition.spec.name}: ${describeZodError(parsed.error)}`);
      }
      return definition.run(parsed.data, data, signal);
    },
  };
}

const symbolArg = z
  .string()
  .trim()
  .min(1)
  .max(12)
  .regex(/^[A-Za-z0-9.\-^=]+$/, 'not a ticker symbol')
  .transform((s) => s.toUpperCase());

const symbolSchema: JsonSchema = { type: 'string', description: 'Ticker symbol, e.g. "AAPL"' };

const INTERVALS = ['1min', '5min', '15min', '30min', '1h', '4h', '1day', '1week', '1month'] as const;

export const DEFAULT_HISTORY_LIMIT = 30;

const TOOLS: RegisteredTool[] = [
  defineTool({
    spec: {
      name: 'get_quote',
      description: 'Latest quote for a stock: price, daily change, day and 52-week range, volume and market cap.',
      parameters: { type: 'object', properties: { symbol: symbolSchema }, required: ['symbol'], additionalProperties: false },
      returns: {
        type: 'object',
        properties: {
          symbol: { type: 'string' },
          price: { type: 'number' },
          change: { type: 'number' },
          changePercent: { type: 'number' },
          asOf: { type: 'string' },
        },
      },
    },
    args: z.object({ symbol: symbolArg }),
    run: async ({ symbol }, data, signal) => mapSuccess(await data.getQuote(symbol, { signal }), shapeQuote),
  }),
  defineTool({
    spec: {
      name: 'get_price_history',
      description:
        'Historical OHLCV bars for a stock, oldest first. Use for the latest closing price, trends and recent moves.',
      parameters: {
        type: 'object',
        properties: {
          symbol: symbolSchema,
          interval: { type: 'string', enum: INTERVALS, description: 'Bar size, default "1day"' },
          limit: { type: 'integer', minimum: 1, maximum: 200, description: `Most recent bars to return, default ${DEFAULT_HISTORY_LIMIT}` },
        },
        required: ['symbol'],
        additionalProperties: false,
      },
      returns: {
        type: 'object',
        properties: {
          symbol: { type: 'string' },
          latestClose: { type: 'number' },
          latestTimestamp: { type: 'string' },
          bars: { type: 'array', items: { type: 'object' } },
        },
      },
    },
    args: z.object({
      symbol: symbolArg,
      interval: z.enum(INTERVALS).default('1day'),
      limit: z.number().int().min(1).max(200).default(DEFAULT_HISTORY_LIMIT),
    }),
    run: async ({ symbol, interval, limit }, data, signal) =>
      mapSuccess(await data.getPriceSeries(symbol, { interval, signal }), (s) => shapePriceHistory(s, limit)),
  }),
  defineTool({
    spec: {
      name: 'get_fundamentals',
      description:
        'Financial statement metrics for a company: margins, growth versus the prior period, leverage, liquidity, return on equity and free cash flow.',
      parameters: {
        type: 'object',
        properties: {
          symbol: symbolSchema,
          period: { type: 'string', enum: ['quarter', 'annual'], description: 'Reporting period, default "quarter"' },
        },
        required: ['symbol'],
        additionalProperties: false,
      },
      returns: {
        type: 'object',
        properties: { symbol: { type: 'string' }, latestPeriodDate: { type: 'string' }, metrics: { type: 'object' } },
      },
    },
    args: z.object({ symbol: symbolArg, period: z.enum(['quarter', 'annual']).default('quarter') }),
    run: async ({ symbol, period }, data, signal) =>
      mapSuccess(await data.getFundamentals(symbol, { period, signal }), shapeFundamentals),
  }),
  defineTool({
    spec: {
      name: 'search_news',
      description: 'Recent news articles about a stock with short summaries.',
      parameters: {
        type: 'object',
        properties: {
          symbol: symbolSchema,
          days: { type: 'integer', minimum: 1, maximum: 30, description: 'Look-back window in days, default 7' },
          max_results: { type: 'integer', minimum: 1, maximum: 10, description: 'Default 5' },
        },
        required: ['symbol'],
        additionalProperties: false,
      },
      returns: { type: 'array', items: { type: 'object' } },
    },
    args: z.object({
      symbol: symbolArg,
      days: z.number().int().min(1).max(30).default(7),
      max_results: z.number().int().min(1).max(10).default(5),
    }),
    run: async ({ symbol, days, max_results }, data, signal) =>
      mapSuccess(await data.getNews(symbol, { days, maxResults: max_results, signal }), shapeNews),
  }),
  defineTool({
    spec: {
      name: 'search_symbol',
      description: 'Find ticker symbols by company name or partial ticker.',
      parameters: {
        type: 'object',
        properties: { keyword: { type: 'string', description: 'Company name or ticker fragment' } },
        required: ['keyword'],
        additionalProperties: false,
      },
      returns: { type: 'array', items: { type: 'object' } },
    },
    args: z.object({ keyword: z.string().trim().min(1).max(64) }),
    run: async ({ keyword }, data, signal) =>
      mapSuccess(await data.searchSymbols(keyword, { signal }), (m) => shapeSymbolMatches(m)),
  }),
  defineTool({
    spec: {
      name: 'generate_analysis_report',
      description:
        'Combined technical (moving averages, RSI, MACD, Bollinger), fundamental and news-sentiment read of a stock with headlines and an overall bias.',
      parameters: { type: 'object', properties: { symbol: symbolSchema }, required: ['symbol'], additionalProperties: false },
      returns: {
        type: 'object',
        properties: { bias: { type: 'string', enum: ['bullish', 'bearish', 'neutral'] }, signals: { type: 'array', items: { type: 'string' } } },
      },
    },
    args: z.object({ symbol: symbolArg }),
    run: async ({ symbol }, data, signal) => mapSuccess(await data.generateAnalysisReport(symbol, { signal }), shapeReport),
  }),
];

/** Closed set of tools the agent may call, resolved by name. */
export class ToolRegistry {
  private readonly tools: Map<string, RegisteredTool>;
  private readonly log: Logger;

  constructor(private readonly data: MarketData, logger?: Logger) {
    this.tools = new Map(TOOLS.map((t) => [t.spec.name, t]));
    this.log = logger ?? createComponentLogger('tools');
  }

  listTools(): ToolSpec[] {
    return TOOLS.map((t) => t.spec);
  }

  async invoke(name: string, args: Record<string, unknown>, ctx: ToolContext): Promise<ToolCallResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return toToolResult(ctx.callId, failure('UnknownTool', `no tool named "${name}"`));
    }

    let result: ProviderResult<unknown>;
    try {
      result = await tool.execute(args, this.data, ctx.signal);
    } catch (err) {
      this.log.error({ err, tool: name, callId: ctx.callId }, 'tool threw');
      result = failure('Internal', `${name}: ${errorMessage(err)}`);
    }

    if (!result.ok) {
      this.log.warn({ tool: name, callId: ctx.callId, kind: result.kind }, 'tool call failed');
    }
    return toToolResult(ctx.callId, result);
  }
}

export function toToolResult(id: string, result: ProviderResult<unknown>): ToolCallResult {
  if (result.ok) return { id, output: result.data };
  return { id, output: null, error: { kind: result.kind, message: result.message, retriable: result.retriable } };
}
