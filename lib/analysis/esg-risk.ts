/**
 * ESG and Risk Scorer
 *
 * Two independent signed scores from the snapshot: an ESG heuristic (sector,
 * headcount, audit risk) and a risk score (beta, leverage, liquidity) where
 * higher means riskier. Neither is clamped here.
 */

import { ScoringConfig } from '../../config/scoring-config';
import type { Snapshot } from '../market-data/types';

export interface EsgRiskFactors {
  esg_score: number;
  esg_reasons: string[];
  risk_score: number;
  risk_reasons: string[];
  beta: number | null;
  debt_to_equity: number | null;
  current_ratio: number | null;
  quick_ratio: number | null;
  sector: string | null;
  industry: string | null;
  audit_risk: number | null;
  board_risk: number | null;
  compensation_risk: number | null;
  shareholder_rights_risk: number | null;
  overall_risk: number | null;
}

function matchesAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => text.includes(keyword));
}

export function scoreEsgRisk(snapshot: Snapshot): EsgRiskFactors {
  let esgScore = 0;
  const esgReasons: string[] = [];
  let riskScore = 0;
  const riskReasons: string[] = [];

  const sector = (snapshot.sector ?? '').toLowerCase();
  if (matchesAny(sector, ScoringConfig.ESG_NEGATIVE_SECTOR_KEYWORDS)) {
    esgScore -= 5;
    esgReasons.push('Energy sector - environmental concerns');
  } else if (matchesAny(sector, ScoringConfig.ESG_POSITIVE_SECTOR_KEYWORDS)) {
    esgScore += 5;
    esgReasons.push('Technology sector - lower environmental impact');
  }

  const employees = snapshot.full_time_employees;
  if (employees !== undefined && employees > ScoringConfig.LARGE_EMPLOYER) {
    esgScore += 3;
    esgReasons.push('Large employer - positive social impact');
  }

  const auditRisk = snapshot.audit_risk;
  if (auditRisk !== undefined) {
    if (auditRisk < ScoringConfig.AUDIT_RISK_LOW) {
      esgScore += 5;
      esgReasons.push('Low audit risk - good governance');
    } else if (auditRisk > ScoringConfig.AUDIT_RISK_HIGH) {
      esgScore -= 5;
      esgReasons.push('High audit risk - governance concerns');
    }
  }

  const { beta, debt_to_equity, current_ratio } = snapshot;

  if (beta !== undefined) {
    if (beta > ScoringConfig.BETA_HIGH) {
      riskScore += 10;
      riskReasons.push('High volatility (beta > 1.5)');
    } else if (beta < ScoringConfig.BETA_LOW) {
      riskScore -= 5;
      riskReasons.push('Low volatility (beta < 0.8)');
    }
  }

  if (debt_to_equity !== undefined) {
    if (debt_to_equity > ScoringConfig.RISK_DEBT_TO_EQUITY_HIGH) {
      riskScore += 10;
      riskReasons.push('High leverage (D/E > 1.0)');
    } else if (debt_to_equity < ScoringConfig.RISK_DEBT_TO_EQUITY_LOW) {
      riskScore -= 5;
      riskReasons.push('Low leverage (D/E < 0.3)');
    }
  }

  if (current_ratio !== undefined) {
    if (current_ratio < ScoringConfig.CURRENT_RATIO_LOW) {
      riskScore += 5;
      riskReasons.push('Low liquidity (current ratio < 1.0)');
    } else if (current_ratio > ScoringConfig.CURRENT_RATIO_HIGH) {
      riskScore -= 3;
      riskReasons.push('High liquidity (current ratio > 2.0)');
    }
  }

  return {
    esg_score: esgScore,
    esg_reasons: esgReasons,
    risk_score: riskScore,
    risk_reasons: riskReasons,
    beta: beta ?? null,
    debt_to_equity: debt_to_equity ?? null,
    current_ratio: current_ratio ?? null,
    quick_ratio: snapshot.quick_ratio ?? null,
    sector: snapshot.sector ?? null,
    industry: snapshot.industry ?? null,
    audit_risk: auditRisk ?? null,
    board_risk: snapshot.board_risk ?? null,
    compensation_risk: snapshot.compensation_risk ?? null,
    shareholder_rights_risk: snapshot.shareholder_rights_risk ?? null,
    overall_risk: snapshot.overall_risk ?? null,
  };
}
