/**
 * @fileoverview Hypertension risk
 *
 * Model-driven: coefficients come from the condition model registry.
 *
 * @module domain/risk-assessment/calculators/hypertension
 */

import { defaultConditionModelRegistry, type ConditionModelRegistry } from '../condition-models.js';
import { evaluateContributions, flatWhen, linearExcess } from '../contribution.js';
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

export const HYPERTENSION_FIELDS: readonly ScoredField[] = Object.freeze([
  'age',
  'bmi',
  'familyHypertension',
  'systolicBp',
]);

export function hypertensionRules(registry: ConditionModelRegistry): readonly ContributionRule[] {
  const weight = (name: string) => registry.weight('hypertension', name);

  return [
    linearExcess({ factor: 'age', select: (r) => r.age, threshold: 45, weight: weight('age') }),
    linearExcess({ factor: 'bmi', select: (r) => r.bmi, threshold: 25, weight: weight('bmi') }),
    flatWhen({
      factor: 'familyHistory',
      applies: (r) => r.familyHypertension,
      weight: weight('familyHistory'),
    }),
    linearExcess({
      factor: 'systolicBp',
      select: (r) => r.systolicBp,
      threshold: 120,
      weight: weight('systolicBp'),
    }),
  ];
}

// Blood pressure is reported from 130 even though scoring starts at 120
export const HYPERTENSION_FACTOR_CHECKS: readonly FactorCheck[] = Object.freeze([
  factor('Elevated blood pressure', (r) => r.systolicBp > 130),
  factor('Overweight BMI', (r) => r.bmi > 25),
  factor('Family history', (r) => r.familyHypertension),
  factor('Age factor', (r) => r.age > 45),
]);

export function calculateHypertensionRisk(
  record: PatientRecord,
  registry: ConditionModelRegistry = defaultConditionModelRegistry
): RiskResult {
  const { baseRisk } = registry.get('hypertension');
  const risk = evaluateContributions(baseRisk, hypertensionRules(registry), record);

  return buildRiskResult(
    'hypertension',
    risk,
    attributeFactors(record, HYPERTENSION_FACTOR_CHECKS)
  );
}

export function hypertensionStage(
  registry: ConditionModelRegistry = defaultConditionModelRegistry
): ConditionStage {
  return {
    id: 'hypertension',
    dependsOn: [],
    requiredFields: HYPERTENSION_FIELDS,
    calculate: (record) => calculateHypertensionRisk(record, registry),
  };
}
