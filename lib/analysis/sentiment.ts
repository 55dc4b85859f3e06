/**
 * Sentiment Scorer
 *
 * Scores analyst consensus, price-target upside and unusual volume from the
 * company snapshot. The score is an unbounded signed integer.
 */

import { ScoringConfig } from '../../config/scoring-config';
import type { Snapshot } from '../market-data/types';

export interface MarketSentiment {
  analyst_recommendation: number | null;
  analyst_rating: string | null;
  number_of_analysts: number | null;
  target_high_price: number | null;
  target_low_price: number | null;
  target_median_price: number | null;
  current_price: number | null;
  upside_potential: number | null;
  volume_ratio: number | null;
  sentiment_score: number;
  sentiment_reasons: string[];
}

export function scoreSentiment(snapshot: Snapshot): MarketSentiment {
  const recommendation = snapshot.recommendation_mean ?? null;
  const targetMedian = snapshot.target_median_price ?? null;
  const currentPrice = snapshot.current_price ?? null;

  let score = 0;
  const reasons: string[] = [];

  if (recommendation !== null) {
    if (recommendation <= ScoringConfig.ANALYST_STRONG_BUY) {
      score += 15;
      reasons.push('Strong buy recommendation from analysts');
    } else if (recommendation <= ScoringConfig.ANALYST_BUY) {
      score += 10;
      reasons.push('Buy recommendation from analysts');
    } else if (recommendation <= ScoringConfig.ANALYST_HOLD) {
      score += 5;
      reasons.push('Hold recommendation from analysts');
    } else if (recommendation > ScoringConfig.ANALYST_SELL) {
      score -= 5;
      reasons.push('Sell recommendation from analysts');
    }
  }

  const upside =
    targetMedian !== null && currentPrice !== null && currentPrice !== 0
      ? (targetMedian - currentPrice) / currentPrice
      : null;

  if (upside !== null) {
    if (upside > ScoringConfig.UPSIDE_HIGH) {
      score += 10;
      reasons.push('High upside potential (>20%)');
    } else if (upside > ScoringConfig.UPSIDE_MODERATE) {
      score += 5;
      reasons.push('Moderate upside potential (10-20%)');
    } else if (upside < ScoringConfig.DOWNSIDE_RISK) {
      score -= 5;
      reasons.push('Downside risk (>10%)');
    }
  }

  const { volume, average_volume } = snapshot;
  const volumeRatio = volume && average_volume ? volume / average_volume : null;
  if (volumeRatio !== null && volumeRatio > ScoringConfig.VOLUME_SURGE_RATIO) {
    score += 5;
    reasons.push('Above-average trading volume');
  }

  return {
    analyst_recommendation: recommendation,
    analyst_rating: snapshot.recommendation_key ?? null,
    number_of_analysts: snapshot.number_of_analyst_opinions ?? null,
    target_high_price: snapshot.target_high_price ?? null,
    target_low_price: snapshot.target_low_price ?? null,
    target_median_price: targetMedian,
    current_price: currentPrice,
    upside_potential: upside,
    volume_ratio: volumeRatio,
    sentiment_score: score,
    sentiment_reasons: reasons,
  };
}
