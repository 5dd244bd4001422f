import { z } from 'zod';
import type { ProviderSettings } from '../config';
import { failure, success, type Failure } from '../contracts/results';
import type { BalanceSheet, CashFlowStatement, IncomeStatement, Quote, StatementPeriod } from '../types';
import { describeZodError, HttpProviderAdapter, type AdapterDeps } from './httpAdapter';
import { numeric, nullableNumber, nullableString } from './schemas';

export interface QuoteParams {
  symbol: string;
}

export interface StatementParams {
  symbol: string;
  period: StatementPeriod;
  limit: number;
}

export type FmpOps = {
  quote: { params: QuoteParams; result: Quote };
  income_statement: { params: StatementParams; result: IncomeStatement[] };
  balance_sheet: { params: StatementParams; result: BalanceSheet[] };
  cash_flow: { params: StatementParams; result: CashFlowStatement[] };
};

export type FmpAdapter = HttpProviderAdapter<FmpOps>;

const quoteSchema = z.array(
  z.object({
    symbol: z.string(),
    name: nullableString,
    price: numeric,
    change: nullableNumber,
    changePercentage: nullableNumber,
    open: nullableNumber,
    previousClose: nullableNumber,
    dayLow: nullableNumber,
    dayHigh: nullableNumber,
    yearLow: nullableNumber,
    yearHigh: nullableNumber,
    volume: nullableNumber,
    marketCap: nullableNumber,
    exchange: nullableString,
    // epoch seconds
    timestamp: nullableNumber,
  }),
);

const statementBase = {
  date: z.string().min(1),
  period: z.string().default(''),
};

const incomeSchema = z.array(
  z.object({
    ...statementBase,
    reportedCurrency: nullableString,
    revenue: nullableNumber,
    grossProfit: nullableNumber,
    operatingIncome: nullableNumber,
    netIncome: nullableNumber,
    eps: nullableNumber,
  }),
);

const balanceSchema = z.array(
  z.object({
    ...statementBase,
    totalCurrentAssets: nullableNumber,
    totalCurrentLiabilities: nullableNumber,
    totalAssets: nullableNumber,
    totalLiabilities: nullableNumber,
    totalStockholdersEquity: nullableNumber,
    totalDebt: nullableNumber,
    cashAndCashEquivalents: nullableNumber,
  }),
);

const cashFlowSchema = z.array(
  z.object({
    ...statementBase,
    operatingCashFlow: nullableNumber,
    capitalExpenditure: nullableNumber,
    freeCashFlow: nullableNumber,
  }),
);

const errorBodySchema = z.object({ 'Error Message': z.string() });

export function detectFmpError(body: unknown): Failure | null {
  const parsed = errorBodySchema.safeParse(body);
  if (!parsed.success) return null;
  const message = parsed.data['Error Message'];
  if (/limit reach/i.test(message)) return failure('RateLimited', `fmp: ${message}`, true);
  return failure('UpstreamRejected', `fmp: ${message}`, false);
}

function byDateDesc<T extends { date: string }>(rows: T[]): T[] {
  return [...rows].sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));
}

function statementRequest(path: string) {
  return (params: StatementParams) => ({
    method: 'GET' as const,
    path,
    query: { symbol: params.symbol, period: params.period, limit: params.limit },
  });
}

export function createFmpAdapter(settings: ProviderSettings, deps: AdapterDeps = {}): FmpAdapter {
  return new HttpProviderAdapter<FmpOps>(
    {
      id: 'fmp',
      auth: { in: 'query', name: 'apikey' },
      detectBodyError: detectFmpError,
      operations: {
        quote: {
          request: (params) => ({ method: 'GET', path: 'quote', query: { symbol: params.symbol } }),
          normalize: (body, params) => {
            const parsed = quoteSchema.safeParse(body);
            if (!parsed.success) {
              return failure('InvalidUpstreamResponse', `fmp quote: ${describeZodError(parsed.error)}`);
            }
            const row = parsed.data[0];
            if (!row) return failure('UpstreamRejected', `fmp: no quote for symbol ${params.symbol}`);
            return success<Quote>({
              symbol: row.symbol,
              name: row.name,
              price: row.price,
              change: row.change,
              changePercent: row.changePercentage,
              open: row.open,
              previousClose: row.previousClose,
              dayLow: row.dayLow,
              dayHigh: row.dayHigh,
              yearLow: row.yearLow,
              yearHigh: row.yearHigh,
              volume: row.volume,
              marketCap: row.marketCap,
              exchange: row.exchange,
              asOf: row.timestamp === null ? null : new Date(row.timestamp * 1000).toISOString(),
            });
          },
        },
        income_statement: {
          request: statementRequest('income-statement'),
          normalize: (body) => {
            const parsed = incomeSchema.safeParse(body);
            if (!parsed.success) {
              return failure('InvalidUpstreamResponse', `fmp income_statement: ${describeZodError(parsed.error)}`);
            }
            return success<IncomeStatement[]>(
              byDateDesc(parsed.data).map((r) => ({
                date: r.date,
                period: r.period,
                currency: r.reportedCurrency,
                revenue: r.revenue,
                grossProfit: r.grossProfit,
                operatingIncome: r.operatingIncome,
                netIncome: r.netIncome,
                eps: r.eps,
              })),
            );
          },
        },
        balance_sheet: {
          request: statementRequest('balance-sheet-statement'),
          normalize: (body) => {
            const parsed = balanceSchema.safeParse(body);
            if (!parsed.success) {
              return failure('InvalidUpstreamResponse', `fmp balance_sheet: ${describeZodError(parsed.error)}`);
            }
            return success<BalanceSheet[]>(
              byDateDesc(parsed.data).map((r) => ({
                date: r.date,
                period: r.period,
                totalCurrentAssets: r.totalCurrentAssets,
                totalCurrentLiabilities: r.totalCurrentLiabilities,
                totalAssets: r.totalAssets,
                totalLiabilities: r.totalLiabilities,
                totalEquity: r.totalStockholdersEquity,
                totalDebt: r.totalDebt,
                cash: r.cashAndCashEquivalents,
              })),
            );
          },
        },
        cash_flow: {
          request: statementRequest('cash-flow-statement'),
          normalize: (body) => {
            const parsed = cashFlowSchema.safeParse(body);
            if (!parsed.success) {
              return failure('InvalidUpstreamResponse', `fmp cash_flow: ${describeZodError(parsed.error)}`);
            }
            return success<CashFlowStatement[]>(
              byDateDesc(parsed.data).map((r) => ({
                date: r.date,
                period: r.period,
                operatingCashFlow: r.operatingCashFlow,
                capitalExpenditure: r.capitalExpenditure,
                // older filings omit it; derive from its parts
                freeCashFlow:
                  r.freeCashFlow ??
                  (r.operatingCashFlow !== null && r.capitalExpenditure !== null
                    ? r.operatingCashFlow + r.capitalExpenditure
                    : null),
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
