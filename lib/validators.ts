/**
 * Data Validation for the Stock Rating Engine
 *
 * Validates ticker symbols and grades the completeness of fetched market
 * data before it is scored.
 */

import { InvalidTickerError } from './errors';
import { isEmptyStatement } from './market-data/statements';
import type { FinancialStatements, MarketDataBundle, PriceSeries, Snapshot } from './market-data/types';
import { ScoringConfig } from '../config/scoring-config';

/**
 * Data quality assessment result
 */
export interface DataQualityReport {
  isComplete: boolean;
  missingFields: string[];
  dataCompleteness: number; // 0.0 to 1.0
  canProceed: boolean; // false if critical fields missing
  grade: 'A - Excellent' | 'B - Good' | 'C - Fair' | 'D - Poor';
  confidence: 'High' | 'Medium-High' | 'Medium' | 'Low';
}

const MAX_TICKER_LENGTH = 15;

/**
 * Validate ticker symbol format
 *
 * Rules:
 * - 1-15 characters after trimming
 * - Letters, digits, dots, hyphens and carets (BRK-B, TCS.NS, ^GSPC)
 * - No leading/trailing or consecutive dots
 *
 * @returns the upper-cased ticker
 * @throws InvalidTickerError if ticker is invalid
 */
export function validateTicker(ticker: string): string {
  if (!ticker || typeof ticker !== 'string') {
    throw new InvalidTickerError(String(ticker), 'Ticker is required');
  }

  const trimmed = ticker.trim().toUpperCase();

  if (trimmed.length < 1 || trimmed.length > MAX_TICKER_LENGTH) {
    throw new InvalidTickerError(ticker, `Ticker must be 1-${MAX_TICKER_LENGTH} characters`);
  }

  if (!/^[A-Z0-9.\-^]+$/.test(trimmed)) {
    throw new InvalidTickerError(ticker, 'Ticker can only contain letters, digits, dots, hyphens and carets');
  }

  if (trimmed.startsWith('.') || trimmed.endsWith('.')) {
    throw new InvalidTickerError(ticker, 'Ticker cannot start or end with a dot');
  }

  if (trimmed.includes('..')) {
    throw new InvalidTickerError(ticker, 'Ticker cannot have consecutive dots');
  }

  return trimmed;
}

/**
 * Validate number is valid (not NaN, not Infinity)
 */
export function isValidNumber(value: unknown): value is number {
  return typeof value === 'number' && !isNaN(value) && isFinite(value);
}

/**
 * Safe number conversion
 *
 * Accepts numbers and numeric strings; returns undefined otherwise.
 */
export function safeNumber(value: unknown): number | undefined {
  if (isValidNumber(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return isValidNumber(parsed) ? parsed : undefined;
  }
  return undefined;
}

function loaded<T>(value: T | Error): T | null {
  return value instanceof Error ? null : value;
}

/**
 * Price to anchor on: the snapshot price, else the latest close
 */
export function resolveCurrentPrice(snapshot: Snapshot | null, prices: PriceSeries | null): number | null {
  const quoted = snapshot?.current_price;
  if (isValidNumber(quoted) && quoted > 0) {
    return quoted;
  }
  const latestClose = prices && prices.length > 0 ? prices[0] : undefined;
  if (isValidNumber(latestClose) && latestClose > 0) {
    return latestClose;
  }
  return null;
}

type FieldCheck = { name: string; check: () => boolean };

/**
 * Validate market data completeness
 *
 * The current price is critical; everything else lowers the grade when
 * missing but does not stop the analysis.
 */
export function validateMarketData(bundle: MarketDataBundle): DataQualityReport {
  const snapshot = loaded<Snapshot>(bundle.snapshot);
  const prices = loaded<PriceSeries>(bundle.prices);
  const statements = loaded<FinancialStatements>(bundle.statements);

  const hasSnapshotField = (field: keyof Snapshot) => snapshot?.[field] !== undefined;

  const criticalFields: FieldCheck[] = [
    {
      name: 'current_price',
      check: () => resolveCurrentPrice(snapshot, prices) !== null,
    },
  ];

  const optionalFields: FieldCheck[] = [
    { name: 'price_history', check: () => prices !== null && prices.length > ScoringConfig.RSI_PERIOD },
    {
      name: 'price_history_12m',
      check: () => prices !== null && prices.length >= ScoringConfig.MOMENTUM_12M_POINTS,
    },
    { name: 'income_statement', check: () => statements !== null && !isEmptyStatement(statements.income) },
    { name: 'balance_sheet', check: () => statements !== null && !isEmptyStatement(statements.balance) },
    { name: 'cashflow_statement', check: () => statements !== null && !isEmptyStatement(statements.cashflow) },
    { name: 'market_cap', check: () => hasSnapshotField('market_cap') },
    { name: 'trailing_pe', check: () => hasSnapshotField('trailing_pe') },
    { name: 'sector', check: () => hasSnapshotField('sector') },
    { name: 'beta', check: () => hasSnapshotField('beta') },
    { name: 'debt_to_equity', check: () => hasSnapshotField('debt_to_equity') },
    { name: 'current_ratio', check: () => hasSnapshotField('current_ratio') },
    { name: 'recommendation_mean', check: () => hasSnapshotField('recommendation_mean') },
    { name: 'target_median_price', check: () => hasSnapshotField('target_median_price') },
    { name: 'volume', check: () => hasSnapshotField('volume') },
    { name: 'average_volume', check: () => hasSnapshotField('average_volume') },
  ];

  const missingCritical = criticalFields.filter((field) => !field.check()).map((field) => field.name);

  // Cannot proceed if critical fields are missing
  if (missingCritical.length > 0) {
    return {
      isComplete: false,
      missingFields: missingCritical,
      dataCompleteness: 0,
      canProceed: false,
      grade: 'D - Poor',
      confidence: 'Low',
    };
  }

  const missingOptional = optionalFields.filter((field) => !field.check()).map((field) => field.name);

  const totalFields = criticalFields.length + optionalFields.length;
  const presentFields = criticalFields.length + (optionalFields.length - missingOptional.length);
  const completeness = presentFields / totalFields;

  let grade: DataQualityReport['grade'];
  if (completeness >= 0.9) grade = 'A - Excellent';
  else if (completeness >= 0.75) grade = 'B - Good';
  else if (completeness >= 0.6) grade = 'C - Fair';
  else grade = 'D - Poor';

  let confidence: DataQualityReport['confidence'];
  if (completeness >= 0.85) confidence = 'High';
  else if (completeness >= 0.7) confidence = 'Medium-High';
  else if (completeness >= 0.55) confidence = 'Medium';
  else confidence = 'Low';

  return {
    isComplete: missingOptional.length === 0,
    missingFields: missingOptional,
    dataCompleteness: completeness,
    canProceed: true,
    grade,
    confidence,
  };
}

