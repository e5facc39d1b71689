/**
 * @fileoverview Risk Aggregator
 *
 * Entry point of the scoring engine: one patient record in, the complete
 * result set for all five conditions out.
 *
 * @module domain/risk-assessment/risk-aggregator
 */

import { ConditionIdSchema } from '@vitalrisk/types';

import { AssessmentPipeline } from './assessment-pipeline.js';
import {
  diabetesStage,
  heartDiseaseStage,
  hypertensionStage,
  kidneyDiseaseStage,
  strokeStage,
} from './calculators/index.js';
import { defaultConditionModelRegistry, type ConditionModelRegistry } from './condition-models.js';
import { PipelineConfigurationError } from './errors.js';
import { deepFreeze } from './freeze.js';
import type { ConditionId, PatientRecord, RiskResult, RiskResultSet } from './types.js';

/** Canonical condition order of a result set */
export const CONDITION_IDS: readonly ConditionId[] = ConditionIdSchema.options;

/**
 * Pipeline with the five standard condition stages
 */
export function createAssessmentPipeline(
  registry: ConditionModelRegistry = defaultConditionModelRegistry
): AssessmentPipeline {
  return new AssessmentPipeline([
    hypertensionStage(registry),
    diabetesStage(registry),
    kidneyDiseaseStage(),
    strokeStage(),
    heartDiseaseStage(),
  ]);
}

function requireResult(
  results: Readonly<Partial<Record<ConditionId, RiskResult>>>,
  condition: ConditionId
): RiskResult {
  const result = results[condition];
  if (!result) {
    throw new PipelineConfigurationError(`Assessment produced no result for "${condition}"`, {
      condition,
    });
  }
  return result;
}

/**
 * Runs the pipeline and assembles the immutable result set. Holds no state
 * between calls; every call recomputes from the record.
 */
export class RiskAggregator {
  private readonly pipeline: AssessmentPipeline;

  constructor(pipeline: AssessmentPipeline = createAssessmentPipeline()) {
    const present = pipeline.conditions;
    const missing = CONDITION_IDS.filter((condition) => !present.has(condition));
    if (missing.length > 0) {
      throw new PipelineConfigurationError(
        `Assessment pipeline is missing stage(s): ${missing.join(', ')}`,
        { missing }
      );
    }
    this.pipeline = pipeline;
  }

  get executionOrder(): readonly ConditionId[] {
    return this.pipeline.executionOrder;
  }

  calculateAllRisks(record: PatientRecord): RiskResultSet {
    const results = this.pipeline.run(record);

    return deepFreeze({
      hypertension: requireResult(results, 'hypertension'),
      diabetes: requireResult(results, 'diabetes'),
      kidney_disease: requireResult(results, 'kidney_disease'),
      stroke: requireResult(results, 'stroke'),
      heart_disease: requireResult(results, 'heart_disease'),
    });
  }
}

const defaultAggregator = new RiskAggregator();

/**
 * Score every condition for one record with the default models
 */
export function calculateAllRisks(record: PatientRecord): RiskResultSet {
  return defaultAggregator.calculateAllRisks(record);
}
