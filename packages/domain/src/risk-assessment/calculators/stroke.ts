/**
 * @fileoverview Stroke risk
 *
 * Staged inline rules. Blood pressure and HbA1c each contribute one tier at
 * most.
 *
 * @module domain/risk-assessment/calculators/stroke
 */

import { evaluateContributions, flatWhen, linearExcess, tiered } from '../contribution.js';
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

const STROKE_BASE_RISK = 0.03;

export const STROKE_FIELDS: readonly ScoredField[] = Object.freeze([
  'age',
  'gender',
  'systolicBp',
  'hba1c',
  'ldlCholesterol',
]);

export const STROKE_RULES: readonly ContributionRule[] = Object.freeze([
  linearExcess({ factor: 'age', select: (r) => r.age, threshold: 45, weight: 0.015 }),
  tiered({
    factor: 'systolicBp',
    select: (r) => r.systolicBp,
    tiers: [
      { threshold: 140, weight: 0.25 },
      { threshold: 120, weight: 0.1 },
    ],
  }),
  tiered({
    factor: 'hba1c',
    select: (r) => r.hba1c,
    tiers: [
      { threshold: 6.5, inclusive: true, weight: 0.2 },
      { threshold: 5.7, inclusive: true, weight: 0.1 },
    ],
  }),
  flatWhen({ factor: 'ldlCholesterol', applies: (r) => r.ldlCholesterol > 130, weight: 0.08 }),
  flatWhen({
    factor: 'femaleOver45',
    applies: (r) => r.gender === 'Female' && r.age > 45,
    weight: 0.05,
  }),
]);

export const STROKE_FACTOR_CHECKS: readonly FactorCheck[] = Object.freeze([
  factor('Blood pressure', (r) => r.systolicBp > 130),
  factor('Glucose control', (r) => r.hba1c >= 5.7),
  factor('Cholesterol', (r) => r.ldlCholesterol > 100),
  factor('Age', (r) => r.age > 45),
]);

export function calculateStrokeRisk(record: PatientRecord): RiskResult {
  const risk = evaluateContributions(STROKE_BASE_RISK, STROKE_RULES, record);
  return buildRiskResult('stroke', risk, attributeFactors(record, STROKE_FACTOR_CHECKS));
}

export function strokeStage(): ConditionStage {
  return {
    id: 'stroke',
    dependsOn: [],
    requiredFields: STROKE_FIELDS,
    calculate: (record) => calculateStrokeRisk(record),
  };
}
