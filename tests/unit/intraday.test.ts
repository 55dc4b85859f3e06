import { describe, expect, it } from 'vitest';
import { PriceUnavailableError } from '../../lib/errors';
import {
  buildTradingStrategy,
  deriveIntradayLevels,
  getIntradayRecommendation,
  getRsiRegime,
  type IntradayInputs,
} from '../../lib/intraday';

function inputs(overrides: Partial<IntradayInputs>): IntradayInputs {
  return {
    symbol: 'ACME',
    current_price: 1000,
    rsi: 50,
    price_3m_momentum: null,
    sentiment_score: null,
    ...overrides,
  };
}

describe('getRsiRegime', () => {
  it('treats a missing RSI as neutral', () => {
    expect(getRsiRegime(null)).toBe('neutral');
    expect(getRsiRegime(29.9)).toBe('oversold');
    expect(getRsiRegime(30)).toBe('neutral');
    expect(getRsiRegime(70)).toBe('neutral');
    expect(getRsiRegime(70.1)).toBe('overbought');
  });
});

describe('getIntradayRecommendation', () => {
  it('grades the risk-reward ratio', () => {
    expect(getIntradayRecommendation(2)).toBe('STRONG BUY');
    expect(getIntradayRecommendation(1.5)).toBe('BUY');
    expect(getIntradayRecommendation(1)).toBe('HOLD');
    expect(getIntradayRecommendation(0.99)).toBe('AVOID');
  });
});

describe('deriveIntradayLevels', () => {
  it('buys the dip when oversold', () => {
    const levels = deriveIntradayLevels(inputs({ rsi: 25 }));

    expect(levels.regime).toBe('oversold');
    expect(levels.entry_price).toBe(995);
    expect(levels.exit_price).toBe(1020);
    expect(levels.stop_loss).toBe(985);
    expect(levels.risk_amount).toBe(10);
    expect(levels.reward_amount).toBe(25);
    expect(levels.risk_reward_ratio).toBe(2.5);
    expect(levels.recommendation).toBe('STRONG BUY');
    expect(levels.recommendation_detail).toBe('STRONG BUY - Excellent risk-reward ratio');
    expect(levels.adjustments).toEqual([]);
  });

  it('places levels for a pullback when overbought', () => {
    const levels = deriveIntradayLevels(inputs({ current_price: 100, rsi: 80 }));

    expect(levels.entry_price).toBe(100.5);
    expect(levels.exit_price).toBe(98);
    expect(levels.stop_loss).toBe(101.5);
    expect(levels.risk_amount).toBe(1);
    expect(levels.reward_amount).toBe(2.5);
    expect(levels.risk_reward_ratio).toBe(2.5);
  });

  it('widens entry and exit with strong upward momentum and positive sentiment', () => {
    const levels = deriveIntradayLevels(inputs({ price_3m_momentum: 0.1, sentiment_score: 0.7 }));

    expect(levels.entry_price).toBe(997);
    expect(levels.exit_price).toBe(1025);
    expect(levels.stop_loss).toBe(990);
    expect(levels.risk_reward_ratio).toBe(4);
    expect(levels.adjustments).toEqual(['Strong upward 3-month momentum', 'Positive sentiment']);
  });

  it('follows strong downward momentum', () => {
    const levels = deriveIntradayLevels(inputs({ price_3m_momentum: -0.1 }));

    expect(levels.entry_price).toBe(1003);
    expect(levels.exit_price).toBe(975);
    expect(levels.adjustments).toEqual(['Strong downward 3-month momentum']);
  });

  it('uses neutral levels when RSI is missing', () => {
    const levels = deriveIntradayLevels(inputs({ rsi: null, sentiment_score: 0.2 }));

    expect(levels.regime).toBe('neutral');
    expect(levels.entry_price).toBe(998);
    expect(levels.exit_price).toBe(1015);
    expect(levels.stop_loss).toBe(990);
    expect(levels.risk_reward_ratio).toBe(2.13);
    expect(levels.adjustments).toEqual(['Negative sentiment']);
  });

  it('maps the sentiment score through the configured scale', () => {
    const scaled = deriveIntradayLevels(inputs({ sentiment_score: 8 }), {
      sentimentScale: (score) => score / 10,
    });
    expect(scaled.adjustments).toEqual(['Positive sentiment']);

    const strict = deriveIntradayLevels(inputs({ sentiment_score: 8 }), {
      sentimentScale: (score) => score / 10,
      sentimentPositiveThreshold: 0.9,
    });
    expect(strict.adjustments).toEqual([]);
  });

  it('reports a ratio of 0 when entry and stop round to the same price', () => {
    const levels = deriveIntradayLevels(inputs({ current_price: 0.001, rsi: 25 }));

    expect(levels.risk_amount).toBe(0);
    expect(levels.risk_reward_ratio).toBe(0);
    expect(levels.recommendation).toBe('AVOID');
  });

  it('throws PriceUnavailableError without a positive price', () => {
    expect(() => deriveIntradayLevels(inputs({ current_price: null }))).toThrow(PriceUnavailableError);
    expect(() => deriveIntradayLevels(inputs({ current_price: 0 }))).toThrow(PriceUnavailableError);
  });
});

describe('buildTradingStrategy', () => {
  it('describes a long setup in the quote currency', () => {
    const strategy = buildTradingStrategy(deriveIntradayLevels(inputs({ rsi: 25 })), 'INR');

    expect(strategy).toEqual({
      entry_strategy: 'Enter at INR 995.00 (slightly below current price)',
      exit_strategy: 'Target exit at INR 1020.00 for profit',
      stop_loss_strategy: 'Set stop loss at INR 985.00 to limit downside risk',
      position_size: 'Consider position sizing based on your risk tolerance (1-2% of portfolio per trade)',
    });
  });

  it('describes a short-side setup without a currency', () => {
    const strategy = buildTradingStrategy(deriveIntradayLevels(inputs({ current_price: 100, rsi: 80 })));

    expect(strategy.entry_strategy).toBe('Enter at 100.50 (slightly above current price)');
    expect(strategy.exit_strategy).toBe('Target exit at 98.00 for loss');
  });
});
