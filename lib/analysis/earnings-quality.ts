/**
 * Earnings Quality Analyzer
 *
 * Measures how well reported earnings are backed by operating cash flow and
 * how stable they are across periods.
 */

import { ScoringConfig } from '../../config/scoring-config';
import { DataNotFoundError } from '../errors';
import { getRowSeries, isEmptyStatement } from '../market-data/statements';
import type { FinancialStatements } from '../market-data/types';
import { mean, pearson, stdev } from '../series';

export interface EarningsQuality {
  /** mean(OCF) / mean(net income) over the newest three periods */
  accruals_quality: number | null;
  /** correlation of net income with the previous period's net income */
  earnings_persistence: number | null;
  earnings_predictability: number | null;
  /** latest OCF / latest net income */
  cash_flow_quality: number | null;
  net_income_series: number[];
  ocf_series: number[];
  revenue_series: number[];
}

export interface EarningsQualityScore {
  score: number;
  reasons: string[];
}

/**
 * @throws DataNotFoundError when the income statement carries no values
 */
export function analyzeEarningsQuality(
  statements: FinancialStatements,
  symbol: string = 'unknown'
): EarningsQuality {
  if (isEmptyStatement(statements.income)) {
    throw new DataNotFoundError(symbol, 'financial data');
  }

  const netIncome = getRowSeries(statements.income, 'netIncome') ?? [];
  const revenue = getRowSeries(statements.income, 'revenue') ?? [];
  const ocf = getRowSeries(statements.cashflow, 'operatingCashFlow') ?? [];

  let accrualsQuality: number | null = null;
  if (netIncome.length >= ScoringConfig.ACCRUALS_PERIODS && ocf.length >= ScoringConfig.ACCRUALS_PERIODS) {
    const avgOcf = mean(ocf.slice(0, ScoringConfig.ACCRUALS_PERIODS));
    const avgNi = mean(netIncome.slice(0, ScoringConfig.ACCRUALS_PERIODS));
    if (avgOcf !== null && avgNi !== null && avgNi !== 0) {
      accrualsQuality = avgOcf / avgNi;
    }
  }

  let persistence: number | null = null;
  let predictability: number | null = null;
  if (netIncome.length >= ScoringConfig.PERSISTENCE_MIN_PERIODS) {
    persistence = pearson(netIncome.slice(0, -1), netIncome.slice(1));

    const avg = mean(netIncome);
    const sd = stdev(netIncome);
    if (avg !== null && sd !== null) {
      predictability = avg !== 0 ? 1 / (1 + sd / Math.abs(avg)) : 0;
    }
  }

  let cashFlowQuality: number | null = null;
  if (ocf.length >= 1 && netIncome.length >= 1 && netIncome[0] !== 0) {
    cashFlowQuality = ocf[0] / netIncome[0];
  }

  const echo = ScoringConfig.EARNINGS_SERIES_ECHO;
  return {
    accruals_quality: accrualsQuality,
    earnings_persistence: persistence,
    earnings_predictability: predictability,
    cash_flow_quality: cashFlowQuality,
    net_income_series: netIncome.slice(0, echo),
    ocf_series: ocf.slice(0, echo),
    revenue_series: revenue.slice(0, echo),
  };
}

/**
 * Banded earnings-quality points (0-25): accruals up to 15, persistence up to 10
 */
export function scoreEarningsQuality(quality: EarningsQuality): EarningsQualityScore {
  let score = 0;
  const reasons: string[] = [];

  const accruals = quality.accruals_quality;
  if (accruals !== null) {
    if (accruals > ScoringConfig.ACCRUALS_EXCELLENT) {
      score += 15;
      reasons.push('Excellent accruals quality (OCF > 120% of NI)');
    } else if (accruals > ScoringConfig.ACCRUALS_GOOD) {
      score += 10;
      reasons.push('Good accruals quality (OCF > 80% of NI)');
    } else if (accruals > ScoringConfig.ACCRUALS_MODERATE) {
      score += 5;
      reasons.push('Moderate accruals quality');
    }
  }

  const persistence = quality.earnings_persistence;
  if (persistence !== null) {
    if (persistence > ScoringConfig.PERSISTENCE_HIGH) {
      score += 10;
      reasons.push('High earnings persistence');
    } else if (persistence > ScoringConfig.PERSISTENCE_MODERATE) {
      score += 7;
      reasons.push('Moderate earnings persistence');
    } else if (persistence > ScoringConfig.PERSISTENCE_LOW) {
      score += 3;
      reasons.push('Low earnings persistence');
    }
  }

  return { score, reasons };
}
