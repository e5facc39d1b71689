/**
 * @fileoverview Ischemic heart disease risk
 *
 * Staged inline rules with a gender-specific age term and tiered cholesterol
 * ratio, blood pressure and HbA1c terms.
 *
 * @module domain/risk-assessment/calculators/heart-disease
 */

import { totalToHdlRatio } from '../clinical-metrics.js';
import { branch, evaluateContributions, linearExcess, tiered } from '../contribution.js';
import { attributeFactors, factor } from '../factor-attribution.js';
import type {
  ConditionStage,
  ContributionRule,
  FactorCheck,
  PatientRecord,
  RiskResult,
  ScoredField,
} from '../types.js';
import { buildRiskResult } from './shared.js';

const HEART_DISEASE_BASE_RISK = 0.04;

export const HEART_DISEASE_FIELDS: readonly ScoredField[] = Object.freeze([
  'age',
  'gender',
  'totalCholesterol',
  'hdlCholesterol',
  'systolicBp',
  'hba1c',
]);

const FEMALE_AGE_RULE = linearExcess({
  factor: 'age',
  select: (r) => r.age,
  threshold: 45,
  weight: 0.012,
});

const DEFAULT_AGE_RULE = linearExcess({
  factor: 'age',
  select: (r) => r.age,
  threshold: 35,
  weight: 0.015,
});

export const HEART_DISEASE_RULES: readonly ContributionRule[] = Object.freeze([
  branch({
    factor: 'age',
    choose: (r) => (r.gender === 'Female' ? FEMALE_AGE_RULE : DEFAULT_AGE_RULE),
  }),
  tiered({
    factor: 'cholesterolRatio',
    select: totalToHdlRatio,
    tiers: [
      { threshold: 5, weight: 0.15 },
      { threshold: 4, weight: 0.08 },
    ],
  }),
  tiered({
    factor: 'systolicBp',
    select: (r) => r.systolicBp,
    tiers: [
      { threshold: 140, weight: 0.2 },
      { threshold: 130, weight: 0.1 },
    ],
  }),
  tiered({
    factor: 'hba1c',
    select: (r) => r.hba1c,
    tiers: [
      { threshold: 6.5, inclusive: true, weight: 0.25 },
      { threshold: 5.7, inclusive: true, weight: 0.12 },
    ],
  }),
]);

export const HEART_DISEASE_FACTOR_CHECKS: readonly FactorCheck[] = Object.freeze([
  factor('Cholesterol ratio', (r) => totalToHdlRatio(r) > 4),
  factor('Blood pressure', (r) => r.systolicBp > 130),
  factor('Glucose levels', (r) => r.hba1c >= 5.7),
]);

export function calculateHeartDiseaseRisk(record: PatientRecord): RiskResult {
  const risk = evaluateContributions(HEART_DISEASE_BASE_RISK, HEART_DISEASE_RULES, record);
  return buildRiskResult(
    'heart_disease',
    risk,
    attributeFactors(record, HEART_DISEASE_FACTOR_CHECKS)
  );
}

export function heartDiseaseStage(): ConditionStage {
  return {
    id: 'heart_disease',
    dependsOn: [],
    requiredFields: HEART_DISEASE_FIELDS,
    calculate: (record) => calculateHeartDiseaseRisk(record),
  };
}
