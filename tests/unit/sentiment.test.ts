import { describe, expect, it } from 'vitest';
import { scoreSentiment } from '../../lib/analysis/sentiment';
import { sampleSnapshot } from '../fixtures/market-data';

describe('scoreSentiment', () => {
  it('adds analyst, upside and volume points', () => {
    const result = scoreSentiment(sampleSnapshot());

    expect(result.sentiment_score).toBe(20);
    expect(result.sentiment_reasons).toEqual([
      'Buy recommendation from analysts',
      'Moderate upside potential (10-20%)',
      'Above-average trading volume',
    ]);
    expect(result.upside_potential).toBeCloseTo(0.15, 10);
    expect(result.volume_ratio).toBe(2);
    expect(result.analyst_rating).toBe('buy');
    expect(result.number_of_analysts).toBe(20);
  });

  it('rewards a strong buy consensus with high upside', () => {
    const result = scoreSentiment({ current_price: 100, recommendation_mean: 1.8, target_median_price: 130 });

    expect(result.sentiment_score).toBe(25);
    expect(result.sentiment_reasons).toEqual([
      'Strong buy recommendation from analysts',
      'High upside potential (>20%)',
    ]);
  });

  it('goes negative on a sell consensus with downside', () => {
    const result = scoreSentiment({ current_price: 100, recommendation_mean: 4, target_median_price: 85 });

    expect(result.sentiment_score).toBe(-10);
    expect(result.sentiment_reasons).toEqual(['Sell recommendation from analysts', 'Downside risk (>10%)']);
  });

  it('awards a hold and ignores the gap between hold and sell', () => {
    expect(scoreSentiment({ recommendation_mean: 2.8 }).sentiment_score).toBe(5);
    expect(scoreSentiment({ recommendation_mean: 3.2 }).sentiment_score).toBe(0);
  });

  it('returns a neutral reading for an empty snapshot', () => {
    const result = scoreSentiment({});

    expect(result.sentiment_score).toBe(0);
    expect(result.sentiment_reasons).toEqual([]);
    expect(result.analyst_recommendation).toBeNull();
    expect(result.upside_potential).toBeNull();
    expect(result.volume_ratio).toBeNull();
  });
});
