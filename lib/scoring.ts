/**
 * Composite Scoring Engine
 *
 * Combines the five sub-analyses into a 0-100 rating across four categories
 * of 25 points each:
 * - Fundamentals (25): raw fundamental score scaled by 0.25
 * - Earnings Quality (25): accruals (15) + persistence (10) bands
 * - Market Factors (25): technical (15) + analyst sentiment (10)
 * - Risk & Context (25): ESG (15) + inverse risk (10)
 *
 * Each category is capped on its own, so the total is always in [0, 100].
 * A failed sub-analysis contributes 0 to its category instead of aborting.
 */

import { ScoringConfig } from '../config/scoring-config';
import type { EarningsQuality } from './analysis/earnings-quality';
import { scoreEarningsQuality } from './analysis/earnings-quality';
import type { EsgRiskFactors } from './analysis/esg-risk';
import type { FundamentalSummary } from './analysis/fundamental';
import { dataOf, type AnalysisOutcome } from './analysis/outcome';
import type { MarketSentiment } from './analysis/sentiment';
import type { TechnicalIndicators } from './analysis/technical';
import { debug, warn } from './logger';
import { clamp, round } from './utils';
import { isValidNumber } from './validators';

export type ScoreBand = 'EXCELLENT' | 'GOOD' | 'FAIR' | 'POOR' | 'VERY POOR';

export interface SubScore {
  name: string;
  value: number;
  max_points: number;
  reasons: string[];
}

export interface CompositeInputs {
  fundamentals: AnalysisOutcome<FundamentalSummary> | null;
  earnings_quality: AnalysisOutcome<EarningsQuality> | null;
  technical_indicators: AnalysisOutcome<TechnicalIndicators> | null;
  market_sentiment: AnalysisOutcome<MarketSentiment> | null;
  esg_risk_factors: AnalysisOutcome<EsgRiskFactors> | null;
}

export interface CompositeScore {
  /** 0-100, rounded to one decimal */
  total_score: number;
  band: ScoreBand;
  assessment: string;
  categories: {
    fundamentals: SubScore;
    earnings_quality: SubScore;
    market_factors: SubScore;
    risk_context: SubScore;
  };
  analysis_summary: string[];
}

const ASSESSMENTS: Record<ScoreBand, string> = {
  EXCELLENT: 'EXCELLENT - Strong buy candidate',
  GOOD: 'GOOD - Buy recommendation',
  FAIR: 'FAIR - Hold with monitoring',
  POOR: 'POOR - Consider selling',
  'VERY POOR': 'VERY POOR - Strong sell',
};

/**
 * Band for an unrounded total: 80 is EXCELLENT, 79.99 is GOOD
 */
export function getScoreBand(totalScore: number): ScoreBand {
  if (totalScore >= ScoringConfig.BAND_EXCELLENT) return 'EXCELLENT';
  if (totalScore >= ScoringConfig.BAND_GOOD) return 'GOOD';
  if (totalScore >= ScoringConfig.BAND_FAIR) return 'FAIR';
  if (totalScore >= ScoringConfig.BAND_POOR) return 'POOR';
  return 'VERY POOR';
}

export function getAssessment(band: ScoreBand): string {
  return ASSESSMENTS[band];
}

function scoreFundamentals(data: FundamentalSummary | null): SubScore {
  const value = data ? Math.min(ScoringConfig.CATEGORY_BUDGET, data.score * ScoringConfig.FUNDAMENTAL_SCALE) : 0;
  return {
    name: 'Fundamentals',
    value,
    max_points: ScoringConfig.CATEGORY_BUDGET,
    reasons: data ? [...data.score_reasons] : [],
  };
}

function scoreEarnings(data: EarningsQuality | null): SubScore {
  const banded = data ? scoreEarningsQuality(data) : { score: 0, reasons: [] };
  return {
    name: 'Earnings Quality',
    value: banded.score,
    max_points: ScoringConfig.CATEGORY_BUDGET,
    reasons: banded.reasons,
  };
}

function scoreMarketFactors(technical: TechnicalIndicators | null, sentiment: MarketSentiment | null): SubScore {
  let value = 0;
  const reasons: string[] = [];

  if (technical) {
    value += Math.min(ScoringConfig.TECHNICAL_BUDGET, technical.technical_score * ScoringConfig.TECHNICAL_SCALE);
    reasons.push(...technical.technical_reasons);
  }
  if (sentiment) {
    value += clamp(sentiment.sentiment_score * ScoringConfig.SENTIMENT_SCALE, 0, ScoringConfig.SENTIMENT_BUDGET);
    reasons.push(...sentiment.sentiment_reasons);
  }

  return { name: 'Market Factors', value, max_points: ScoringConfig.CATEGORY_BUDGET, reasons };
}

function scoreRiskContext(esgRisk: EsgRiskFactors | null): SubScore {
  if (!esgRisk) {
    return { name: 'Risk & Context', value: 0, max_points: ScoringConfig.CATEGORY_BUDGET, reasons: [] };
  }

  const esgPart = clamp(
    (esgRisk.esg_score + ScoringConfig.ESG_OFFSET) * ScoringConfig.ESG_SCALE,
    0,
    ScoringConfig.ESG_BUDGET
  );
  const riskPart = clamp(
    (ScoringConfig.RISK_OFFSET - esgRisk.risk_score) * ScoringConfig.RISK_SCALE,
    0,
    ScoringConfig.RISK_BUDGET
  );

  return {
    name: 'Risk & Context',
    value: esgPart + riskPart,
    max_points: ScoringConfig.CATEGORY_BUDGET,
    reasons: [...esgRisk.esg_reasons, ...esgRisk.risk_reasons],
  };
}

function formatCategory(subScore: SubScore): string {
  return `${subScore.name}: ${subScore.value.toFixed(1)}/${subScore.max_points}`;
}

export function calculateCompositeScore(inputs: CompositeInputs): CompositeScore {
  const fundamentals = scoreFundamentals(dataOf(inputs.fundamentals));
  const earningsQuality = scoreEarnings(dataOf(inputs.earnings_quality));
  const marketFactors = scoreMarketFactors(dataOf(inputs.technical_indicators), dataOf(inputs.market_sentiment));
  const riskContext = scoreRiskContext(dataOf(inputs.esg_risk_factors));

  const categories = {
    fundamentals,
    earnings_quality: earningsQuality,
    market_factors: marketFactors,
    risk_context: riskContext,
  };

  let total = 0;
  for (const [name, subScore] of Object.entries(categories)) {
    if (isValidNumber(subScore.value)) {
      total += subScore.value;
    } else {
      warn(`Invalid ${name} category score, counting it as 0`, { value: subScore.value });
      subScore.value = 0;
    }
  }
  total = clamp(total, 0, 100);

  const band = getScoreBand(total);
  const assessment = getAssessment(band);

  const analysisSummary = [
    formatCategory(fundamentals),
    ...earningsQuality.reasons,
    formatCategory(earningsQuality),
    formatCategory(marketFactors),
    formatCategory(riskContext),
  ];

  debug('Composite score calculated', {
    fundamentals: fundamentals.value,
    earningsQuality: earningsQuality.value,
    marketFactors: marketFactors.value,
    riskContext: riskContext.value,
    total,
    band,
  });

  return {
    total_score: round(total, 1),
    band,
    assessment,
    categories,
    analysis_summary: analysisSummary,
  };
}
