/**
 * @fileoverview Factor Attributor
 *
 * Reports which human-readable factors hold for a record. The checks are
 * declared per condition and may use different cut points than the scoring
 * formula of the same condition.
 *
 * @module domain/risk-assessment/factor-attribution
 */

import type { FactorCheck, PatientRecord } from './types.js';

export function attributeFactors(
  record: PatientRecord,
  checks: readonly FactorCheck[]
): string[] {
  return checks.filter((check) => check.holds(record)).map((check) => check.label);
}

/**
 * Shorthand for a factor check
 */
export function factor(label: string, holds: FactorCheck['holds']): FactorCheck {
  return { label, holds };
}
