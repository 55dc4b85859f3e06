import { describe, expect, it } from 'vitest';
import type { EarningsQuality } from '../../lib/analysis/earnings-quality';
import type { EsgRiskFactors } from '../../lib/analysis/esg-risk';
import type { FundamentalSummary } from '../../lib/analysis/fundamental';
import { fail, succeed, type AnalysisOutcome } from '../../lib/analysis/outcome';
import type { MarketSentiment } from '../../lib/analysis/sentiment';
import { analyzeTechnicals, type TechnicalIndicators } from '../../lib/analysis/technical';
import { DataNotFoundError } from '../../lib/errors';
import { calculateCompositeScore, getAssessment, getScoreBand, type CompositeInputs } from '../../lib/scoring';

const SYMBOL = 'ACME';

function fundamentals(score: number, reasons: string[] = []): AnalysisOutcome<FundamentalSummary> {
  return succeed<FundamentalSummary>(SYMBOL, {
    current_price: null,
    market_cap: null,
    pe: null,
    debt_to_equity: null,
    net_margin: null,
    ebitda_margin: null,
    roe: null,
    revenue_cagr: null,
    operating_cash_flow: null,
    free_cash_flow: null,
    total_assets: null,
    total_liabilities: null,
    score,
    score_reasons: reasons,
  });
}

function earnings(accruals: number | null, persistence: number | null): AnalysisOutcome<EarningsQuality> {
  return succeed<EarningsQuality>(SYMBOL, {
    accruals_quality: accruals,
    earnings_persistence: persistence,
    earnings_predictability: null,
    cash_flow_quality: null,
    net_income_series: [],
    ocf_series: [],
    revenue_series: [],
  });
}

function technical(score: number, reasons: string[] = []): AnalysisOutcome<TechnicalIndicators> {
  return succeed<TechnicalIndicators>(SYMBOL, {
    rsi: null,
    macd_line: null,
    macd_signal: null,
    price_3m_momentum: null,
    price_12m_momentum: null,
    relative_strength: null,
    technical_score: score,
    technical_reasons: reasons,
    current_price: null,
    price_change_1d: null,
  });
}

function sentiment(score: number, reasons: string[] = []): AnalysisOutcome<MarketSentiment> {
  return succeed<MarketSentiment>(SYMBOL, {
    analyst_recommendation: null,
    analyst_rating: null,
    number_of_analysts: null,
    target_high_price: null,
    target_low_price: null,
    target_median_price: null,
    current_price: null,
    upside_potential: null,
    volume_ratio: null,
    sentiment_score: score,
    sentiment_reasons: reasons,
  });
}

function esgRisk(esg: number, risk: number, esgReasons: string[] = [], riskReasons: string[] = []): AnalysisOutcome<EsgRiskFactors> {
  return succeed<EsgRiskFactors>(SYMBOL, {
    esg_score: esg,
    esg_reasons: esgReasons,
    risk_score: risk,
    risk_reasons: riskReasons,
    beta: null,
    debt_to_equity: null,
    current_ratio: null,
    quick_ratio: null,
    sector: null,
    industry: null,
    audit_risk: null,
    board_risk: null,
    compensation_risk: null,
    shareholder_rights_risk: null,
    overall_risk: null,
  });
}

function failed<T>(): AnalysisOutcome<T> {
  return fail<T>(SYMBOL, new DataNotFoundError(SYMBOL, 'financial data'));
}

describe('getScoreBand', () => {
  it('bands on the unrounded total', () => {
    expect(getScoreBand(80)).toBe('EXCELLENT');
    expect(getScoreBand(79.99)).toBe('GOOD');
    expect(getScoreBand(65)).toBe('GOOD');
    expect(getScoreBand(64.99)).toBe('FAIR');
    expect(getScoreBand(50)).toBe('FAIR');
    expect(getScoreBand(35)).toBe('POOR');
    expect(getScoreBand(34.99)).toBe('VERY POOR');
  });

  it('maps each band to its assessment', () => {
    expect(getAssessment('EXCELLENT')).toBe('EXCELLENT - Strong buy candidate');
    expect(getAssessment('VERY POOR')).toBe('VERY POOR - Strong sell');
  });
});

describe('calculateCompositeScore', () => {
  it('scores 0 when every sub-analysis failed', () => {
    const result = calculateCompositeScore({
      fundamentals: failed(),
      earnings_quality: failed(),
      technical_indicators: failed(),
      market_sentiment: failed(),
      esg_risk_factors: failed(),
    });

    expect(result.total_score).toBe(0);
    expect(result.band).toBe('VERY POOR');
    expect(result.analysis_summary).toEqual([
      'Fundamentals: 0.0/25',
      'Earnings Quality: 0.0/25',
      'Market Factors: 0.0/25',
      'Risk & Context: 0.0/25',
    ]);
  });

  it('treats missing sub-analyses like failed ones', () => {
    const result = calculateCompositeScore({
      fundamentals: null,
      earnings_quality: null,
      technical_indicators: null,
      market_sentiment: null,
      esg_risk_factors: null,
    });

    expect(result.total_score).toBe(0);
  });

  it('scores 12.5 when every sub-analysis succeeded with no signal', () => {
    const result = calculateCompositeScore({
      fundamentals: fundamentals(0),
      earnings_quality: earnings(null, null),
      technical_indicators: technical(0),
      market_sentiment: sentiment(0),
      esg_risk_factors: esgRisk(0, 0),
    });

    expect(result.total_score).toBe(12.5);
    expect(result.band).toBe('VERY POOR');
    expect(result.categories.risk_context.value).toBe(12.5);
    expect(result.analysis_summary).toEqual([
      'Fundamentals: 0.0/25',
      'Earnings Quality: 0.0/25',
      'Market Factors: 0.0/25',
      'Risk & Context: 12.5/25',
    ]);
  });

  it('caps every category at its budget', () => {
    const result = calculateCompositeScore({
      fundamentals: fundamentals(200),
      earnings_quality: earnings(1.5, 0.9),
      technical_indicators: technical(40),
      market_sentiment: sentiment(30),
      esg_risk_factors: esgRisk(30, -20),
    });

    expect(result.categories.fundamentals.value).toBe(25);
    expect(result.categories.earnings_quality.value).toBe(25);
    expect(result.categories.market_factors.value).toBe(25);
    expect(result.categories.risk_context.value).toBe(25);
    expect(result.total_score).toBe(100);
    expect(result.band).toBe('EXCELLENT');
    expect(result.assessment).toBe('EXCELLENT - Strong buy candidate');
  });

  it('never lets negative sentiment or high risk subtract points', () => {
    const result = calculateCompositeScore({
      fundamentals: null,
      earnings_quality: null,
      technical_indicators: technical(0),
      market_sentiment: sentiment(-10),
      esg_risk_factors: esgRisk(-20, 30),
    });

    expect(result.categories.market_factors.value).toBe(0);
    expect(result.categories.risk_context.value).toBe(0);
    expect(result.total_score).toBe(0);
  });

  it('bands before rounding the reported total', () => {
    const result = calculateCompositeScore({
      fundamentals: fundamentals(99.84),
      earnings_quality: earnings(1.5, 0.9),
      technical_indicators: technical(20),
      market_sentiment: sentiment(15),
      esg_risk_factors: esgRisk(-10, 0),
    });

    expect(result.total_score).toBe(80);
    expect(result.band).toBe('GOOD');
  });

  it('collects category reasons and lists earnings reasons in the summary', () => {
    const result = calculateCompositeScore({
      fundamentals: fundamentals(60, ['Positive revenue CAGR']),
      earnings_quality: earnings(1.0, null),
      technical_indicators: technical(10, ['RSI in neutral zone (30-70)']),
      market_sentiment: sentiment(10, ['Hold recommendation from analysts']),
      esg_risk_factors: esgRisk(6, 10, ['Technology sector - lower environmental impact'], ['High volatility (beta > 1.5)']),
    });

    expect(result.categories.fundamentals.reasons).toEqual(['Positive revenue CAGR']);
    expect(result.categories.market_factors.reasons).toEqual([
      'RSI in neutral zone (30-70)',
      'Hold recommendation from analysts',
    ]);
    expect(result.categories.risk_context.reasons).toEqual([
      'Technology sector - lower environmental impact',
      'High volatility (beta > 1.5)',
    ]);
    expect(result.analysis_summary).toEqual([
      'Fundamentals: 15.0/25',
      'Good accruals quality (OCF > 80% of NI)',
      'Earnings Quality: 10.0/25',
      'Market Factors: 14.2/25',
      'Risk & Context: 12.0/25',
    ]);
  });

  it('gives a 7-day price history no market factor points', () => {
    const technicals = analyzeTechnicals([110, 106, 107, 105, 101, 102, 100], SYMBOL);

    const result = calculateCompositeScore({
      fundamentals: fundamentals(40),
      earnings_quality: null,
      technical_indicators: succeed(SYMBOL, technicals),
      market_sentiment: sentiment(0),
      esg_risk_factors: null,
    });

    expect(result.categories.market_factors).toEqual({
      name: 'Market Factors',
      value: 0,
      max_points: 25,
      reasons: [],
    });
    expect(result.total_score).toBe(10);
    expect(result.analysis_summary).toContain('Market Factors: 0.0/25');
  });

  it('counts a non-numeric category as 0', () => {
    const inputs: CompositeInputs = {
      fundamentals: fundamentals(Number.NaN),
      earnings_quality: null,
      technical_indicators: technical(20),
      market_sentiment: null,
      esg_risk_factors: null,
    };
    const result = calculateCompositeScore(inputs);

    expect(result.categories.fundamentals.value).toBe(0);
    expect(result.total_score).toBe(15);
  });
});
