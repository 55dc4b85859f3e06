/**
 * Intraday Level Deriver
 *
 * Turns the current price plus technical and sentiment readings into entry,
 * exit and stop-loss levels for a single session, and grades the resulting
 * risk-reward ratio.
 *
 * Level selection:
 * - RSI regime picks the base multipliers (oversold / overbought / neutral)
 * - Strong 3-month momentum (beyond +/-5%) widens entry and exit with the trend
 * - Sentiment above / below its thresholds raises the exit / lowers the stop
 *
 * Sentiment arrives on whatever scale the caller has. The scorer in
 * analysis/sentiment.ts produces an unbounded integer, while the thresholds
 * here sit on a 0-1 scale; `sentimentScale` is where the two get reconciled.
 */

import { ScoringConfig } from '../config/scoring-config';
import { PriceUnavailableError } from './errors';
import { round } from './utils';
import { isValidNumber } from './validators';

export type RsiRegime = 'oversold' | 'overbought' | 'neutral';

export type IntradayRecommendation = 'STRONG BUY' | 'BUY' | 'HOLD' | 'AVOID';

export interface IntradayInputs {
  symbol: string;
  current_price: number | null;
  rsi: number | null;
  price_3m_momentum: number | null;
  sentiment_score: number | null;
}

export interface IntradayOptions {
  /** Maps the caller's sentiment score onto the threshold scale. Identity by default. */
  sentimentScale?: (score: number) => number;
  sentimentPositiveThreshold?: number;
  sentimentNegativeThreshold?: number;
}

export interface IntradayLevels {
  current_price: number;
  entry_price: number;
  exit_price: number;
  stop_loss: number;
  risk_amount: number;
  reward_amount: number;
  risk_reward_ratio: number;
  recommendation: IntradayRecommendation;
  recommendation_detail: string;
  regime: RsiRegime;
  adjustments: string[];
}

export interface TradingStrategy {
  entry_strategy: string;
  exit_strategy: string;
  stop_loss_strategy: string;
  position_size: string;
}

const RECOMMENDATION_DETAILS: Record<IntradayRecommendation, string> = {
  'STRONG BUY': 'STRONG BUY - Excellent risk-reward ratio',
  BUY: 'BUY - Good risk-reward ratio',
  HOLD: 'HOLD - Moderate risk-reward ratio',
  AVOID: 'AVOID - Poor risk-reward ratio',
};

export function getRsiRegime(rsi: number | null): RsiRegime {
  if (rsi === null) return 'neutral';
  if (rsi < ScoringConfig.RSI_OVERSOLD) return 'oversold';
  if (rsi > ScoringConfig.RSI_OVERBOUGHT) return 'overbought';
  return 'neutral';
}

export function getIntradayRecommendation(ratio: number): IntradayRecommendation {
  if (ratio >= ScoringConfig.RR_STRONG_BUY) return 'STRONG BUY';
  if (ratio >= ScoringConfig.RR_BUY) return 'BUY';
  if (ratio >= ScoringConfig.RR_HOLD) return 'HOLD';
  return 'AVOID';
}

function baseMultipliers(regime: RsiRegime): { entry: number; exit: number; stop: number } {
  switch (regime) {
    case 'oversold':
      return {
        entry: ScoringConfig.OVERSOLD_ENTRY,
        exit: ScoringConfig.OVERSOLD_EXIT,
        stop: ScoringConfig.OVERSOLD_STOP,
      };
    case 'overbought':
      return {
        entry: ScoringConfig.OVERBOUGHT_ENTRY,
        exit: ScoringConfig.OVERBOUGHT_EXIT,
        stop: ScoringConfig.OVERBOUGHT_STOP,
      };
    default:
      return {
        entry: ScoringConfig.NEUTRAL_ENTRY,
        exit: ScoringConfig.NEUTRAL_EXIT,
        stop: ScoringConfig.NEUTRAL_STOP,
      };
  }
}

/**
 * @throws PriceUnavailableError when the current price is missing or not positive
 */
export function deriveIntradayLevels(inputs: IntradayInputs, options: IntradayOptions = {}): IntradayLevels {
  const price = inputs.current_price;
  if (!isValidNumber(price) || price <= 0) {
    throw new PriceUnavailableError(inputs.symbol);
  }

  const scale = options.sentimentScale ?? ((score: number) => score);
  const positiveThreshold = options.sentimentPositiveThreshold ?? ScoringConfig.INTRADAY_SENTIMENT_POSITIVE;
  const negativeThreshold = options.sentimentNegativeThreshold ?? ScoringConfig.INTRADAY_SENTIMENT_NEGATIVE;

  const regime = getRsiRegime(inputs.rsi);
  const base = baseMultipliers(regime);
  let entry = price * base.entry;
  let exit = price * base.exit;
  let stop = price * base.stop;
  const adjustments: string[] = [];

  const momentum = inputs.price_3m_momentum;
  if (momentum !== null) {
    if (momentum > ScoringConfig.INTRADAY_MOMENTUM_THRESHOLD) {
      entry = Math.min(entry, price * ScoringConfig.UPTREND_ENTRY);
      exit = Math.max(exit, price * ScoringConfig.UPTREND_EXIT);
      adjustments.push('Strong upward 3-month momentum');
    } else if (momentum < -ScoringConfig.INTRADAY_MOMENTUM_THRESHOLD) {
      entry = Math.max(entry, price * ScoringConfig.DOWNTREND_ENTRY);
      exit = Math.min(exit, price * ScoringConfig.DOWNTREND_EXIT);
      adjustments.push('Strong downward 3-month momentum');
    }
  }

  if (inputs.sentiment_score !== null) {
    const sentiment = scale(inputs.sentiment_score);
    if (sentiment > positiveThreshold) {
      exit = Math.max(exit, price * ScoringConfig.SENTIMENT_POSITIVE_EXIT);
      adjustments.push('Positive sentiment');
    } else if (sentiment < negativeThreshold) {
      stop = Math.min(stop, price * ScoringConfig.SENTIMENT_NEGATIVE_STOP);
      adjustments.push('Negative sentiment');
    }
  }

  // risk and reward are measured on the rounded levels that get reported
  const entryPrice = round(entry, 2);
  const exitPrice = round(exit, 2);
  const stopLoss = round(stop, 2);

  const risk = Math.abs(entryPrice - stopLoss);
  const reward = Math.abs(exitPrice - entryPrice);
  const ratio = risk > 0 ? round(reward / risk, 2) : 0;
  const recommendation = getIntradayRecommendation(ratio);

  return {
    current_price: round(price, 2),
    entry_price: entryPrice,
    exit_price: exitPrice,
    stop_loss: stopLoss,
    risk_amount: round(risk, 2),
    reward_amount: round(reward, 2),
    risk_reward_ratio: ratio,
    recommendation,
    recommendation_detail: RECOMMENDATION_DETAILS[recommendation],
    regime,
    adjustments,
  };
}

function formatPrice(value: number, currency?: string): string {
  return currency ? `${currency} ${value.toFixed(2)}` : value.toFixed(2);
}

export function buildTradingStrategy(levels: IntradayLevels, currency?: string): TradingStrategy {
  const side = levels.entry_price < levels.current_price ? 'below' : 'above';
  const outcome = levels.exit_price > levels.entry_price ? 'profit' : 'loss';

  return {
    entry_strategy: `Enter at ${formatPrice(levels.entry_price, currency)} (slightly ${side} current price)`,
    exit_strategy: `Target exit at ${formatPrice(levels.exit_price, currency)} for ${outcome}`,
    stop_loss_strategy: `Set stop loss at ${formatPrice(levels.stop_loss, currency)} to limit downside risk`,
    position_size: 'Consider position sizing based on your risk tolerance (1-2% of portfolio per trade)',
  };
}
