/**
 * @fileoverview Chronic kidney disease risk
 *
 * Depends on the diabetes and hypertension results of the same assessment.
 * Inside the pipeline those results are handed in; called on its own, the
 * calculator derives them with the same calculators.
 *
 * @module domain/risk-assessment/calculators/kidney-disease
 */

import { defaultConditionModelRegistry, type ConditionModelRegistry } from '../condition-models.js';
import { evaluateContributions, linearExcess, scaled } from '../contribution.js';
import { PipelineConfigurationError } from '../errors.js';
import { KIDNEY_DISEASE_KEY_FACTORS } from '../lookup-tables.js';
import type {
  ConditionStage,
  ContributionRule,
  PatientRecord,
  RiskResult,
  ScoredField,
  UpstreamResults,
} from '../types.js';
import { calculateDiabetesRisk } from './diabetes.js';
import { calculateHypertensionRisk } from './hypertension.js';
import { buildRiskResult } from './shared.js';

const KIDNEY_DISEASE_RULES = Object.freeze({
  baseRisk: 0.05,
  diabetesWeight: 0.3,
  hypertensionWeight: 0.2,
  ageThreshold: 50,
  ageWeight: 0.01,
} as const);

export const KIDNEY_DISEASE_FIELDS: readonly ScoredField[] = Object.freeze(['age']);

/**
 * Results kidney disease scoring consumes
 */
export interface KidneyDiseaseInputs {
  readonly diabetes: RiskResult;
  readonly hypertension: RiskResult;
}

export function kidneyDiseaseRules(inputs: KidneyDiseaseInputs): readonly ContributionRule[] {
  return [
    scaled({
      factor: 'diabetesRisk',
      value: inputs.diabetes.riskPercentage / 100,
      weight: KIDNEY_DISEASE_RULES.diabetesWeight,
    }),
    scaled({
      factor: 'hypertensionRisk',
      value: inputs.hypertension.riskPercentage / 100,
      weight: KIDNEY_DISEASE_RULES.hypertensionWeight,
    }),
    linearExcess({
      factor: 'age',
      select: (r) => r.age,
      threshold: KIDNEY_DISEASE_RULES.ageThreshold,
      weight: KIDNEY_DISEASE_RULES.ageWeight,
    }),
  ];
}

export function calculateKidneyDiseaseRisk(
  record: PatientRecord,
  inputs?: KidneyDiseaseInputs,
  registry: ConditionModelRegistry = defaultConditionModelRegistry
): RiskResult {
  const resolved: KidneyDiseaseInputs = inputs ?? {
    diabetes: calculateDiabetesRisk(record, registry),
    hypertension: calculateHypertensionRisk(record, registry),
  };

  const risk = evaluateContributions(
    KIDNEY_DISEASE_RULES.baseRisk,
    kidneyDiseaseRules(resolved),
    record
  );

  // Reported factors are fixed regardless of which terms fired
  return buildRiskResult('kidney_disease', risk, KIDNEY_DISEASE_KEY_FACTORS);
}

function requireUpstream(upstream: UpstreamResults): KidneyDiseaseInputs {
  const { diabetes, hypertension } = upstream;
  if (!diabetes || !hypertension) {
    throw new PipelineConfigurationError(
      'Kidney disease stage ran before its diabetes and hypertension dependencies',
      { available: Object.keys(upstream) }
    );
  }
  return { diabetes, hypertension };
}

export function kidneyDiseaseStage(): ConditionStage {
  return {
    id: 'kidney_disease',
    dependsOn: ['diabetes', 'hypertension'],
    requiredFields: KIDNEY_DISEASE_FIELDS,
    calculate: (record, upstream) => calculateKidneyDiseaseRisk(record, requireUpstream(upstream)),
  };
}
