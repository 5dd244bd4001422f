import type {
  BalanceSheet,
  CashFlowStatement,
  FundamentalAssessment,
  FundamentalMetrics,
  FundamentalStatus,
  IncomeStatement,
} from '../types';

function ratio(numerator: number | null | undefined, denominator: number | null | undefined): number | null {
  if (numerator == null || denominator == null || denominator === 0) return null;
  return numerator / denominator;
}

function growth(latest: number | null | undefined, previous: number | null | undefined): number | null {
  if (latest == null || previous == null || previous === 0) return null;
  return (latest - previous) / Math.abs(previous);
}

/** Statements are newest first; margins and balance ratios come from the latest period. */
export function computeMetrics(
  income: IncomeStatement[],
  balance: BalanceSheet[],
  cashFlow: CashFlowStatement[],
): FundamentalMetrics {
  const [latestIncome, previousIncome] = income;
  const latestBalance = balance[0];
  const latestCash = cashFlow[0];

  return {
    grossMargin: ratio(latestIncome?.grossProfit, latestIncome?.revenue),
    operatingMargin: ratio(latestIncome?.operatingIncome, latestIncome?.revenue),
    netMargin: ratio(latestIncome?.netIncome, latestIncome?.revenue),
    revenueGrowth: growth(latestIncome?.revenue, previousIncome?.revenue),
    netIncomeGrowth: growth(latestIncome?.netIncome, previousIncome?.netIncome),
    debtToEquity: ratio(latestBalance?.totalDebt, latestBalance?.totalEquity),
    currentRatio: ratio(latestBalance?.totalCurrentAssets, latestBalance?.totalCurrentLiabilities),
    returnOnEquity: ratio(latestIncome?.netIncome, latestBalance?.totalEquity),
    freeCashFlow: latestCash?.freeCashFlow ?? null,
    positiveFcfPeriods: cashFlow.filter((c) => c.freeCashFlow !== null && c.freeCashFlow > 0).length,
  };
}

export function assessProfitability(netMargin: number | null, roe: number | null): FundamentalStatus {
  if (netMargin !== null) {
    if (netMargin > 0.1) return 'Healthy';
    return netMargin > 0 ? 'Weak' : 'LossMaking';
  }
  if (roe !== null) {
    if (roe > 0.15) return 'Healthy';
    return roe > 0 ? 'Weak' : 'LossMaking';
  }
  return 'Unknown';
}

export function assessGrowth(revenueGrowth: number | null): FundamentalStatus {
  if (revenueGrowth === null) return 'Unknown';
  if (revenueGrowth > 0.15) return 'Strong';
  if (revenueGrowth > 0.05) return 'Moderate';
  if (revenueGrowth > 0) return 'Stalling';
  return 'Negative';
}

export function assessBalanceSheet(debtToEquity: number | null, currentRatio: number | null): FundamentalStatus {
  if (debtToEquity !== null) {
    if (debtToEquity < 0.5) return 'Strong';
    return debtToEquity < 1.5 ? 'Moderate' : 'Stressed';
  }
  if (currentRatio !== null) {
    if (currentRatio > 2) return 'Strong';
    return currentRatio > 1 ? 'Moderate' : 'Stressed';
  }
  return 'Unknown';
}

export function assessCashflow(cashFlow: CashFlowStatement[]): FundamentalStatus {
  const reported = cashFlow.filter((c) => c.freeCashFlow !== null);
  if (!reported.length) return 'Unknown';
  const positive = reported.filter((c) => (c.freeCashFlow ?? 0) > 0).length;
  if (positive === reported.length) return 'Positive';
  if (positive === 0) return 'Negative';
  return 'Volatile';
}

export function assessFundamentals(metrics: FundamentalMetrics, cashFlow: CashFlowStatement[]): FundamentalAssessment {
  return {
    profitability: assessProfitability(metrics.netMargin, metrics.returnOnEquity),
    growth: assessGrowth(metrics.revenueGrowth),
    balanceSheet: assessBalanceSheet(metrics.debtToEquity, metrics.currentRatio),
    cashflow: assessCashflow(cashFlow),
  };
}
