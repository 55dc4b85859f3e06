/**
 * Technical Indicator Calculators
 *
 * Pure functions over a PriceSeries (index 0 = most recent close).
 * Each returns null, never zero, when the series is too short.
 */

import { ScoringConfig } from '../../config/scoring-config';
import { diff } from '../series';
import type { PriceSeries } from '../market-data/types';

export interface MACDResult {
  macd_line: number | null;
  macd_signal: number | null;
}

export interface MomentumResult {
  price_3m_momentum: number | null;
  price_12m_momentum: number | null;
  relative_strength: number | null;
}

/**
 * Oldest-first copy of a newest-first series
 */
export function toChronological(prices: PriceSeries): number[] {
  return [...prices].reverse();
}

/**
 * Relative Strength Index with Wilder smoothing
 *
 * Seeds the averages with the simple mean of the first `period` gains/losses,
 * then applies avg = (avg * (period - 1) + next) / period over the rest.
 */
export function calculateRSI(prices: PriceSeries, period: number = ScoringConfig.RSI_PERIOD): number | null {
  if (period < 1 || prices.length < period + 1) {
    return null;
  }

  const deltas = diff(toChronological(prices));
  const gains = deltas.map((d) => (d > 0 ? d : 0));
  const losses = deltas.map((d) => (d < 0 ? -d : 0));

  let avgGain = gains.slice(0, period).reduce((sum, v) => sum + v, 0) / period;
  let avgLoss = losses.slice(0, period).reduce((sum, v) => sum + v, 0) / period;

  for (let i = period; i < deltas.length; i += 1) {
    avgGain = (avgGain * (period - 1) + gains[i]) / period;
    avgLoss = (avgLoss * (period - 1) + losses[i]) / period;
  }

  if (avgLoss === 0) {
    return 100;
  }

  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

/**
 * Exponential moving average at the last point of an oldest-first series
 *
 * Weights the i-th most recent value by (1 - alpha)^i with alpha = 2 / (span + 1)
 * and normalizes by the sum of weights, so early values are not biased toward zero.
 */
export function calculateEMA(values: readonly number[], span: number): number | null {
  if (values.length === 0 || span < 1) {
    return null;
  }

  const decay = 1 - 2 / (span + 1);
  let weighted = 0;
  let weights = 0;
  for (const value of values) {
    weighted = weighted * decay + value;
    weights = weights * decay + 1;
  }
  return weighted / weights;
}

function macdAt(chronological: readonly number[], fast: number, slow: number): number | null {
  const emaFast = calculateEMA(chronological, fast);
  const emaSlow = calculateEMA(chronological, slow);
  if (emaFast === null || emaSlow === null) return null;
  return emaFast - emaSlow;
}

/**
 * MACD line and signal line
 *
 * The line uses the whole series. The signal line is the EMA of MACD values
 * computed over every sliding window of width `slow`, oldest window first.
 */
export function calculateMACD(
  prices: PriceSeries,
  fast: number = ScoringConfig.MACD_FAST_SPAN,
  slow: number = ScoringConfig.MACD_SLOW_SPAN,
  signal: number = ScoringConfig.MACD_SIGNAL_SPAN
): MACDResult {
  if (prices.length < slow) {
    return { macd_line: null, macd_signal: null };
  }

  const chronological = toChronological(prices);
  const macdLine = macdAt(chronological, fast, slow);

  const macdValues: number[] = [];
  for (let i = 0; i + slow <= chronological.length; i += 1) {
    const value = macdAt(chronological.slice(i, i + slow), fast, slow);
    if (value !== null) macdValues.push(value);
  }

  const macdSignal = macdValues.length >= signal ? calculateEMA(macdValues, signal) : null;

  return { macd_line: macdLine, macd_signal: macdSignal };
}

function changeOver(prices: PriceSeries, points: number): number | null {
  if (prices.length < points) return null;
  const past = prices[points - 1];
  if (past === 0) return 0;
  return (prices[0] - past) / past;
}

/**
 * 3- and 12-month price momentum and relative strength vs. a fixed benchmark
 */
export function calculateMomentum(prices: PriceSeries): MomentumResult {
  const price3m = changeOver(prices, ScoringConfig.MOMENTUM_3M_POINTS);
  const price12m = changeOver(prices, ScoringConfig.MOMENTUM_12M_POINTS);

  return {
    price_3m_momentum: price3m,
    price_12m_momentum: price12m,
    relative_strength: price12m === null ? null : price12m - ScoringConfig.BENCHMARK_ANNUAL_RETURN,
  };
}
