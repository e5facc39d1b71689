/**
 * @fileoverview Risk Categorizer
 *
 * Single source of truth for mapping a percentage to a risk band.
 *
 * @module domain/risk-assessment/categorize
 */

import type { RiskLevel } from './types.js';

/**
 * Lower bound (inclusive) of each band above LOW, in percent
 */
export const RISK_LEVEL_THRESHOLDS = Object.freeze({
  MODERATE: 30,
  HIGH: 60,
} as const);

export function categorizeRisk(riskPercentage: number): RiskLevel {
  if (riskPercentage >= RISK_LEVEL_THRESHOLDS.HIGH) {
    return 'HIGH';
  }
  if (riskPercentage >= RISK_LEVEL_THRESHOLDS.MODERATE) {
    return 'MODERATE';
  }
  return 'LOW';
}
