import { computeMetrics } from '../src/analysis/fundamentals';
import type {
  BalanceSheet,
  CashFlowStatement,
  FundamentalsSummary,
  IncomeStatement,
  Interval,
  NewsArticle,
  PriceSeries,
  Quote,
} from '../src/types';

export function dayStamp(i: number): string {
  return new Date(Date.UTC(2024, 0, 1 + i)).toISOString().slice(0, 10);
}

/** One bar per day from 2024-01-01, closes given by `closeAt`. */
export function series(symbol: string, count: number, closeAt: (i: number) => number, interval: Interval = '1day'): PriceSeries {
  return {
    symbol,
    interval,
    currency: 'USD',
    exchange: 'NASDAQ',
    bars: Array.from({ length: count }, (_, i) => {
      const close = closeAt(i);
      return { timestamp: dayStamp(i), open: close, high: close + 1, low: close - 1, close, volume: 1_000 };
    }),
  };
}

export const income: IncomeStatement[] = [
  { date: '2023-12-31', period: 'Q4', currency: 'USD', revenue: 120, grossProfit: 54, operatingIncome: 30, netIncome: 24, eps: 1.2 },
  { date: '2023-09-30', period: 'Q3', currency: 'USD', revenue: 100, grossProfit: 45, operatingIncome: 25, netIncome: 20, eps: 1 },
];

export const balance: BalanceSheet[] = [
  {
    date: '2023-12-31',
    period: 'Q4',
    totalCurrentAssets: 150,
    totalCurrentLiabilities: 100,
    totalAssets: 400,
    totalLiabilities: 300,
    totalEquity: 100,
    totalDebt: 35,
    cash: 60,
  },
];

export const cashFlow: CashFlowStatement[] = [
  { date: '2023-12-31', period: 'Q4', operatingCashFlow: 30, capitalExpenditure: -20, freeCashFlow: 10 },
  { date: '2023-09-30', period: 'Q3', operatingCashFlow: 5, capitalExpenditure: -10, freeCashFlow: -5 },
];

export function fundamentals(symbol: string): FundamentalsSummary {
  return {
    symbol,
    period: 'quarter',
    currency: 'USD',
    latestPeriodDate: '2023-12-31',
    income,
    balance,
    cashFlow,
    metrics: computeMetrics(income, balance, cashFlow),
  };
}

export function articles(count: number): NewsArticle[] {
  return Array.from({ length: count }, (_, i) => ({
    title: `Headline ${i + 1}`,
    url: `https://news.example.com/${i + 1}`,
    summary: `Summary ${i + 1}`,
    publishedAt: `2024-03-0${(i % 9) + 1}T12:00:00.000Z`,
    source: 'news.example.com',
  }));
}

export function quote(symbol: string, price = 101): Quote {
  return {
    symbol,
    name: null,
    price,
    change: null,
    changePercent: null,
    open: null,
    previousClose: null,
    dayLow: null,
    dayHigh: null,
    yearLow: null,
    yearHigh: null,
    volume: null,
    marketCap: null,
    exchange: null,
    asOf: null,
  };
}
