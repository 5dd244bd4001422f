import type { FailureKind } from './contracts/results';

export type Interval = '1min' | '5min' | '15min' | '30min' | '1h' | '4h' | '1day' | '1week' | '1month';

export interface PriceBar {
  /** ISO-8601, exchange local time when the upstream gives no zone. */
  timestamp: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface PriceSeries {
  symbol: string;
  interval: Interval;
  currency: string | null;
  exchange: string | null;
  /** Oldest first. */
  bars: PriceBar[];
}

export interface SymbolMatch {
  symbol: string;
  name: string;
  exchange: string | null;
  country: string | null;
  currency: string | null;
  type: string | null;
}

export interface Quote {
  symbol: string;
  name: string | null;
  price: number;
  change: number | null;
  changePercent: number | null;
  open: number | null;
  previousClose: number | null;
  dayLow: number | null;
  dayHigh: number | null;
  yearLow: number | null;
  yearHigh: number | null;
  volume: number | null;
  marketCap: number | null;
  exchange: string | null;
  /** ISO timestamp of the quote, when the upstream reports one. */
  asOf: string | null;
}

export type StatementPeriod = 'quarter' | 'annual';

export interface IncomeStatement {
  date: string;
  period: string;
  currency: string | null;
  revenue: number | null;
  grossProfit: number | null;
  operatingIncome: number | null;
  netIncome: number | null;
  eps: number | null;
}

export interface BalanceSheet {
  date: string;
  period: string;
  totalCurrentAssets: number | null;
  totalCurrentLiabilities: number | null;
  totalAssets: number | null;
  totalLiabilities: number | null;
  totalEquity: number | null;
  totalDebt: number | null;
  cash: number | null;
}

export interface CashFlowStatement {
  date: string;
  period: string;
  operatingCashFlow: number | null;
  capitalExpenditure: number | null;
  freeCashFlow: number | null;
}

export interface FundamentalMetrics {
  grossMargin: number | null;
  operatingMargin: number | null;
  netMargin: number | null;
  /** Latest period against the one before it. */
  revenueGrowth: number | null;
  netIncomeGrowth: number | null;
  debtToEquity: number | null;
  currentRatio: number | null;
  returnOnEquity: number | null;
  freeCashFlow: number | null;
  /** Periods with positive free cash flow out of those reported. */
  positiveFcfPeriods: number;
}

export interface FundamentalsSummary {
  symbol: string;
  period: StatementPeriod;
  currency: string | null;
  latestPeriodDate: string | null;
  income: IncomeStatement[];
  balance: BalanceSheet[];
  cashFlow: CashFlowStatement[];
  metrics: FundamentalMetrics;
}

export interface NewsArticle {
  title: string;
  url: string;
  summary: string;
  publishedAt: string | null;
  source: string;
}

export type NewsSentiment = 'positive' | 'neutral' | 'negative';

export type NewsImpact = 'low' | 'medium' | 'high';

export interface NewsEvent {
  title: string;
  url: string;
  sentiment: NewsSentiment;
  impact: NewsImpact;
  /** 0..1, how one-sided the sentiment wording is. */
  confidence: number;
}

export interface NewsState {
  overallSentiment: NewsSentiment;
  overallImpact: NewsImpact | 'unknown';
  counts: Record<NewsSentiment, number>;
  significantHeadlines: string[];
}

export type FundamentalStatus = 'Healthy' | 'Weak' | 'LossMaking' | 'Strong' | 'Moderate' | 'Stalling' | 'Negative' | 'Stressed' | 'Positive' | 'Volatile' | 'Unknown';

export interface FundamentalAssessment {
  profitability: FundamentalStatus;
  growth: FundamentalStatus;
  balanceSheet: FundamentalStatus;
  cashflow: FundamentalStatus;
}

export interface TechnicalSnapshot {
  lastClose: number;
  asOf: string;
  sma20: number | null;
  sma50: number | null;
  rsi14: number | null;
  rsiState: 'overbought' | 'oversold' | 'neutral' | null;
  macd: { macd: number; signal: number; histogram: number; state: 'bullish' | 'bearish' | 'neutral' } | null;
  bollinger: { upper: number; middle: number; lower: number; position: 'above_upper' | 'below_lower' | 'inside' } | null;
  trend: 'uptrend' | 'downtrend' | 'sideways' | null;
}

export type Bias = 'bullish' | 'bearish' | 'neutral';

export interface AnalysisReport {
  symbol: string;
  generatedAt: string;
  technical: TechnicalSnapshot | null;
  fundamentals: FundamentalAssessment | null;
  news: NewsState | null;
  headlines: Pick<NewsArticle, 'title' | 'url' | 'source' | 'publishedAt'>[];
  /** Human-readable reasons behind the score. */
  signals: string[];
  score: number;
  bias: Bias;
  /** Inputs that could not be fetched, with the failure that stopped them. */
  unavailable: { input: 'price' | 'fundamentals' | 'news'; kind: FailureKind; message: string }[];
}

export interface EtfSnapshot {
  symbol: string;
  name: string;
  close: number;
  change: number | null;
  changePercent: number | null;
  asOf: string;
}
