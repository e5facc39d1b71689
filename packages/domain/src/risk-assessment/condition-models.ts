/**
 * @fileoverview Condition Model Registry
 *
 * Named coefficient sets for the conditions that score through a model table.
 * Kidney disease, stroke and heart disease use staged inline rules instead.
 *
 * @module domain/risk-assessment/condition-models
 */

import { RiskEngineError } from './errors.js';
import { deepFreeze } from './freeze.js';
import type { ConditionModel, ModeledConditionId } from './types.js';

/**
 * Coefficients per condition. Linear factor weights are per unit of excess
 * over the calculator's threshold; flag weights are flat.
 */
export const DEFAULT_CONDITION_MODELS: Readonly<Record<ModeledConditionId, ConditionModel>> =
  deepFreeze({
    hypertension: {
      baseRisk: 0.1,
      factors: {
        age: 0.02,
        bmi: 0.03,
        familyHistory: 0.15,
        systolicBp: 0.0025,
      },
    },
    diabetes: {
      baseRisk: 0.08,
      factors: {
        age: 0.015,
        bmi: 0.04,
        familyHistory: 0.2,
        gestationalDiabetes: 0.3,
        hba1c: 0.35,
      },
    },
  });

/**
 * Read-only lookup over a fixed set of condition models
 */
export class ConditionModelRegistry {
  private readonly models: Readonly<Record<ModeledConditionId, ConditionModel>>;

  constructor(models: Readonly<Record<ModeledConditionId, ConditionModel>> = DEFAULT_CONDITION_MODELS) {
    this.models = deepFreeze(structuredClone(models));
  }

  get(condition: ModeledConditionId): ConditionModel {
    return this.models[condition];
  }

  /**
   * Weight of a named factor. Unknown factors are a configuration defect.
   */
  weight(condition: ModeledConditionId, factorName: string): number {
    const value = this.models[condition].factors[factorName];
    if (value === undefined) {
      throw new RiskEngineError(
        'UNKNOWN_MODEL_FACTOR',
        `Condition model "${condition}" has no factor "${factorName}"`,
        { condition, factor: factorName }
      );
    }
    return value;
  }
}

export const defaultConditionModelRegistry = new ConditionModelRegistry();
