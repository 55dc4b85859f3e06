/**
 * Technical Analysis
 *
 * Runs the indicator calculators over a price series and bands them into an
 * additive, non-negative technical score.
 */

import { ScoringConfig } from '../../config/scoring-config';
import { DataNotFoundError } from '../errors';
import type { PriceSeries } from '../market-data/types';
import { calculateMACD, calculateMomentum, calculateRSI } from './indicators';

export interface TechnicalIndicators {
  rsi: number | null;
  macd_line: number | null;
  macd_signal: number | null;
  price_3m_momentum: number | null;
  price_12m_momentum: number | null;
  relative_strength: number | null;
  technical_score: number;
  technical_reasons: string[];
  current_price: number | null;
  price_change_1d: number | null;
}

/**
 * @throws DataNotFoundError when the series is empty
 */
export function analyzeTechnicals(prices: PriceSeries, symbol: string = 'unknown'): TechnicalIndicators {
  if (prices.length === 0) {
    throw new DataNotFoundError(symbol, 'historical price data');
  }

  const rsi = calculateRSI(prices);
  const { macd_line, macd_signal } = calculateMACD(prices);
  const momentum = calculateMomentum(prices);

  let score = 0;
  const reasons: string[] = [];

  if (rsi !== null) {
    if (rsi >= ScoringConfig.RSI_OVERSOLD && rsi <= ScoringConfig.RSI_OVERBOUGHT) {
      score += ScoringConfig.TECH_POINTS_RSI_NEUTRAL;
      reasons.push('RSI in neutral zone (30-70)');
    } else if (rsi < ScoringConfig.RSI_OVERSOLD) {
      score += ScoringConfig.TECH_POINTS_RSI_OVERSOLD;
      reasons.push('RSI indicates oversold conditions');
    } else {
      score += ScoringConfig.TECH_POINTS_RSI_OVERBOUGHT;
      reasons.push('RSI indicates overbought conditions');
    }
  }

  if (momentum.price_3m_momentum !== null && momentum.price_3m_momentum > 0) {
    score += ScoringConfig.TECH_POINTS_MOMENTUM_3M;
    reasons.push('Positive 3-month momentum');
  }
  if (momentum.price_12m_momentum !== null && momentum.price_12m_momentum > 0) {
    score += ScoringConfig.TECH_POINTS_MOMENTUM_12M;
    reasons.push('Positive 12-month momentum');
  }

  if (macd_line !== null && macd_signal !== null && macd_line > macd_signal) {
    score += ScoringConfig.TECH_POINTS_MACD_BULLISH;
    reasons.push('MACD above signal line (bullish)');
  }

  const previousClose = prices.length > 1 ? prices[1] : null;

  return {
    rsi,
    macd_line,
    macd_signal,
    ...momentum,
    technical_score: score,
    technical_reasons: reasons,
    current_price: prices[0],
    price_change_1d:
      previousClose !== null && previousClose !== 0 ? (prices[0] - previousClose) / previousClose : null,
  };
}
