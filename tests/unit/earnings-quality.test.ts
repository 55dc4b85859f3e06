import { describe, expect, it } from 'vitest';
import { analyzeEarningsQuality, scoreEarningsQuality, type EarningsQuality } from '../../lib/analysis/earnings-quality';
import { DataNotFoundError } from '../../lib/errors';
import { EMPTY_STATEMENTS, sampleStatements } from '../fixtures/market-data';

function quality(accruals: number | null, persistence: number | null): EarningsQuality {
  return {
    accruals_quality: accruals,
    earnings_persistence: persistence,
    earnings_predictability: null,
    cash_flow_quality: null,
    net_income_series: [],
    ocf_series: [],
    revenue_series: [],
  };
}

describe('analyzeEarningsQuality', () => {
  it('compares average operating cash flow with average net income', () => {
    const result = analyzeEarningsQuality(sampleStatements(), 'ACME');

    expect(result.accruals_quality).toBeCloseTo(337 / 310, 10);
    expect(result.earnings_persistence).toBeCloseTo(300 / Math.sqrt((1400 / 3) * 200), 10);
    expect(result.earnings_predictability).toBeCloseTo(0.8683, 3);
    expect(result.cash_flow_quality).toBeCloseTo(1.25, 10);
    expect(result.net_income_series).toEqual([120, 100, 90, 80]);
    expect(result.ocf_series).toEqual([150, 95, 92, 40]);
  });

  it('awards the good accruals band and high persistence', () => {
    const { score, reasons } = scoreEarningsQuality(analyzeEarningsQuality(sampleStatements()));

    expect(score).toBe(20);
    expect(reasons).toEqual(['Good accruals quality (OCF > 80% of NI)', 'High earnings persistence']);
  });

  it('leaves persistence undefined below four periods', () => {
    const result = analyzeEarningsQuality({
      ...EMPTY_STATEMENTS,
      income: { 'Net Income': [120, 100, 90] },
      cashflow: { 'Operating Cash Flow': [150, 95, 92] },
    });

    expect(result.accruals_quality).not.toBeNull();
    expect(result.earnings_persistence).toBeNull();
    expect(result.earnings_predictability).toBeNull();
  });

  it('throws DataNotFoundError without an income statement', () => {
    expect(() => analyzeEarningsQuality(EMPTY_STATEMENTS, 'ACME')).toThrow(DataNotFoundError);
  });
});

describe('scoreEarningsQuality', () => {
  it('bands accruals and persistence', () => {
    expect(scoreEarningsQuality(quality(1.3, 0.6))).toEqual({
      score: 22,
      reasons: ['Excellent accruals quality (OCF > 120% of NI)', 'Moderate earnings persistence'],
    });
    expect(scoreEarningsQuality(quality(0.6, 0.4))).toEqual({
      score: 8,
      reasons: ['Moderate accruals quality', 'Low earnings persistence'],
    });
  });

  it('awards nothing below the lowest bands or without data', () => {
    expect(scoreEarningsQuality(quality(0.4, 0.2))).toEqual({ score: 0, reasons: [] });
    expect(scoreEarningsQuality(quality(null, null))).toEqual({ score: 0, reasons: [] });
  });
});
