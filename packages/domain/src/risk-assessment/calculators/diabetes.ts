/**
 * @fileoverview Type 2 diabetes risk
 *
 * Model-driven: coefficients come from the condition model registry.
 *
 * @module domain/risk-assessment/calculators/diabetes
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

export const DIABETES_FIELDS: readonly ScoredField[] = Object.freeze([
  'age',
  'bmi',
  'familyDiabetes',
  'gestationalDiabetes',
  'hba1c',
]);

export function diabetesRules(registry: ConditionModelRegistry): readonly ContributionRule[] {
  const weight = (name: string) => registry.weight('diabetes', name);

  return [
    linearExcess({ factor: 'age', select: (r) => r.age, threshold: 40, weight: weight('age') }),
    linearExcess({ factor: 'bmi', select: (r) => r.bmi, threshold: 23, weight: weight('bmi') }),
    flatWhen({
      factor: 'familyHistory',
      applies: (r) => r.familyDiabetes,
      weight: weight('familyHistory'),
    }),
    flatWhen({
      factor: 'gestationalDiabetes',
      applies: (r) => r.gestationalDiabetes,
      weight: weight('gestationalDiabetes'),
    }),
    // Fires at exactly 5.7 with a zero contribution
    linearExcess({
      factor: 'hba1c',
      select: (r) => r.hba1c,
      threshold: 5.7,
      inclusive: true,
      weight: weight('hba1c'),
    }),
  ];
}

export const DIABETES_FACTOR_CHECKS: readonly FactorCheck[] = Object.freeze([
  factor('Prediabetic HbA1c', (r) => r.hba1c >= 5.7),
  factor('Gestational diabetes history', (r) => r.gestationalDiabetes),
  factor('Family history', (r) => r.familyDiabetes),
  factor('BMI', (r) => r.bmi > 25),
]);

export function calculateDiabetesRisk(
  record: PatientRecord,
  registry: ConditionModelRegistry = defaultConditionModelRegistry
): RiskResult {
  const { baseRisk } = registry.get('diabetes');
  const risk = evaluateContributions(baseRisk, diabetesRules(registry), record);

  return buildRiskResult('diabetes', risk, attributeFactors(record, DIABETES_FACTOR_CHECKS));
}

export function diabetesStage(
  registry: ConditionModelRegistry = defaultConditionModelRegistry
): ConditionStage {
  return {
    id: 'diabetes',
    dependsOn: [],
    requiredFields: DIABETES_FIELDS,
    calculate: (record) => calculateDiabetesRisk(record, registry),
  };
}
