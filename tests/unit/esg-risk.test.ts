import { describe, expect, it } from 'vitest';
import { scoreEsgRisk } from '../../lib/analysis/esg-risk';
import { sampleSnapshot } from '../fixtures/market-data';

describe('scoreEsgRisk', () => {
  it('scores a large, well-governed technology company', () => {
    const result = scoreEsgRisk(sampleSnapshot());

    expect(result.esg_score).toBe(13);
    expect(result.esg_reasons).toEqual([
      'Technology sector - lower environmental impact',
      'Large employer - positive social impact',
      'Low audit risk - good governance',
    ]);
    expect(result.risk_score).toBe(0);
    expect(result.risk_reasons).toEqual([]);
    expect(result.sector).toBe('Technology');
  });

  it('flags energy exposure, weak governance and a risky balance sheet', () => {
    const result = scoreEsgRisk({
      sector: 'Oil & Gas',
      audit_risk: 0.5,
      beta: 2,
      debt_to_equity: 1.5,
      current_ratio: 0.8,
    });

    expect(result.esg_score).toBe(-10);
    expect(result.esg_reasons).toEqual([
      'Energy sector - environmental concerns',
      'High audit risk - governance concerns',
    ]);
    expect(result.risk_score).toBe(25);
    expect(result.risk_reasons).toEqual([
      'High volatility (beta > 1.5)',
      'High leverage (D/E > 1.0)',
      'Low liquidity (current ratio < 1.0)',
    ]);
  });

  it('lowers risk for a stable, liquid, lightly levered company', () => {
    const result = scoreEsgRisk({ beta: 0.5, debt_to_equity: 0.1, current_ratio: 3 });

    expect(result.risk_score).toBe(-13);
    expect(result.risk_reasons).toEqual([
      'Low volatility (beta < 0.8)',
      'Low leverage (D/E < 0.3)',
      'High liquidity (current ratio > 2.0)',
    ]);
  });

  it('returns zero scores and nulls for an empty snapshot', () => {
    const result = scoreEsgRisk({});

    expect(result.esg_score).toBe(0);
    expect(result.risk_score).toBe(0);
    expect(result.beta).toBeNull();
    expect(result.overall_risk).toBeNull();
  });
});
