/**
 * @fileoverview Shared calculator plumbing
 *
 * @module domain/risk-assessment/calculators/shared
 */

import { categorizeRisk } from '../categorize.js';
import { CONDITION_RECOMMENDATIONS, RISK_CAPS } from '../lookup-tables.js';
import type { ConditionId, RiskResult } from '../types.js';

/**
 * Convert a risk fraction to a percentage clamped to `[0, cap]`
 */
export function toRiskPercentage(riskFraction: number, cap: number): number {
  return Math.min(Math.max(riskFraction * 100, 0), cap);
}

/**
 * Assemble the published result for one condition
 */
export function buildRiskResult(
  condition: ConditionId,
  riskFraction: number,
  keyFactors: readonly string[]
): RiskResult {
  const riskPercentage = toRiskPercentage(riskFraction, RISK_CAPS[condition]);

  return {
    riskPercentage,
    riskLevel: categorizeRisk(riskPercentage),
    keyFactors: [...keyFactors],
    recommendations: [...CONDITION_RECOMMENDATIONS[condition]],
  };
}
