/**
 * Fundamental Ratio Calculator
 *
 * Extracts the latest balance sheet, income and cash-flow figures, derives
 * leverage, margin, return and growth ratios, and awards a heuristic score.
 *
 * Every ratio is null when an input is missing or its denominator is zero,
 * and each scoring condition is only evaluated when its inputs exist.
 */

import { ScoringConfig } from '../../config/scoring-config';
import { getRowSeries, pickLatest } from '../market-data/statements';
import type { FinancialStatements, Snapshot } from '../market-data/types';

export interface FundamentalSummary {
  current_price: number | null;
  market_cap: number | null;
  pe: number | null;
  debt_to_equity: number | null;
  net_margin: number | null;
  ebitda_margin: number | null;
  roe: number | null;
  revenue_cagr: number | null;
  operating_cash_flow: number | null;
  free_cash_flow: number | null;
  total_assets: number | null;
  total_liabilities: number | null;
  /** Raw 0-100 score, floored at 0 after penalties */
  score: number;
  score_reasons: string[];
}

function ratio(numerator: number | null, denominator: number | null): number | null {
  if (numerator === null || denominator === null || denominator === 0) return null;
  return numerator / denominator;
}

function latest(series: number[] | null): number | null {
  return series && series.length > 0 ? series[0] : null;
}

/**
 * Compound growth from the oldest considered period to the latest
 *
 * Uses min(3, length - 1) periods and needs at least three values.
 */
export function calculateRevenueCAGR(revenue: number[] | null): number | null {
  if (!revenue || revenue.length < ScoringConfig.REVENUE_CAGR_MIN_SERIES) {
    return null;
  }

  const periods = Math.min(ScoringConfig.REVENUE_CAGR_MAX_PERIODS, revenue.length - 1);
  const newest = revenue[0];
  const oldest = revenue[periods];
  if (oldest <= 0 || newest <= 0) {
    return null;
  }
  return Math.pow(newest / oldest, 1 / periods) - 1;
}

export function calculateFundamentals(
  statements: FinancialStatements,
  snapshot: Snapshot = {}
): FundamentalSummary {
  const { income, balance, cashflow } = statements;

  const totalDebt = pickLatest(balance, 'totalDebt');
  const totalEquity = pickLatest(balance, 'totalEquity');
  const totalAssets = pickLatest(balance, 'totalAssets');
  const totalLiabilities = pickLatest(balance, 'totalLiabilities');

  const revenueSeries = getRowSeries(income, 'revenue');
  const netIncome = latest(getRowSeries(income, 'netIncome'));
  const ebitda = latest(getRowSeries(income, 'ebitda'));
  const revenue = latest(revenueSeries);

  const operatingCashFlow = pickLatest(cashflow, 'operatingCashFlow') ?? snapshot.operating_cashflow ?? null;
  const capex = pickLatest(cashflow, 'capitalExpenditure');
  let freeCashFlow = pickLatest(cashflow, 'freeCashFlow');
  if (freeCashFlow === null && operatingCashFlow !== null && capex !== null) {
    // capex is reported as a negative outflow
    freeCashFlow = operatingCashFlow + capex;
  }

  const debtToEquity = ratio(totalDebt, totalEquity);
  const netMargin = ratio(netIncome, revenue);
  const ebitdaMargin = ratio(ebitda, revenue);
  const roe = ratio(netIncome, totalEquity);
  const revenueCagr = calculateRevenueCAGR(revenueSeries);

  let score = 0;
  const reasons: string[] = [];
  const addPoints = (condition: boolean, points: number, reason: string) => {
    if (condition) {
      score += points;
      reasons.push(reason);
    }
  };

  addPoints(revenueCagr !== null && revenueCagr > 0, ScoringConfig.FUND_POINTS_REVENUE_CAGR, 'Positive revenue CAGR');
  addPoints(
    netMargin !== null && netMargin > ScoringConfig.NET_MARGIN_HEALTHY,
    ScoringConfig.FUND_POINTS_NET_MARGIN,
    'Healthy net margin > 10%'
  );
  addPoints(
    ebitdaMargin !== null && ebitdaMargin > ScoringConfig.EBITDA_MARGIN_HEALTHY,
    ScoringConfig.FUND_POINTS_EBITDA_MARGIN,
    'EBITDA margin > 15%'
  );
  addPoints(roe !== null && roe > ScoringConfig.ROE_HEALTHY, ScoringConfig.FUND_POINTS_ROE, 'ROE > 15%');
  addPoints(
    freeCashFlow !== null && freeCashFlow > 0,
    ScoringConfig.FUND_POINTS_FREE_CASH_FLOW,
    'Positive free cash flow'
  );
  addPoints(
    debtToEquity !== null && debtToEquity < ScoringConfig.DEBT_TO_EQUITY_ACCEPTABLE,
    ScoringConfig.FUND_POINTS_DEBT_TO_EQUITY,
    'Debt/Equity < 1'
  );

  const penalize = (condition: boolean, reason: string) => {
    if (condition) {
      reasons.push(reason);
      score = Math.max(0, score - ScoringConfig.FUND_PENALTY);
    }
  };

  penalize(revenueCagr !== null && revenueCagr < 0, 'Negative revenue CAGR');
  penalize(netMargin !== null && netMargin < ScoringConfig.NET_MARGIN_THIN, 'Thin net margin < 5%');
  penalize(debtToEquity !== null && debtToEquity > ScoringConfig.DEBT_TO_EQUITY_HIGH, 'High leverage: D/E > 2');

  return {
    current_price: snapshot.current_price ?? null,
    market_cap: snapshot.market_cap ?? null,
    pe: snapshot.trailing_pe ?? null,
    debt_to_equity: debtToEquity,
    net_margin: netMargin,
    ebitda_margin: ebitdaMargin,
    roe,
    revenue_cagr: revenueCagr,
    operating_cash_flow: operatingCashFlow,
    free_cash_flow: freeCashFlow,
    total_assets: totalAssets,
    total_liabilities: totalLiabilities,
    score,
    score_reasons: reasons,
  };
}
