/**
 * @fileoverview Condition Lookup Tables
 *
 * Fixed, condition-keyed configuration data. Recommendations are the same for
 * every patient with a given condition.
 *
 * @module domain/risk-assessment/lookup-tables
 */

import { deepFreeze } from './freeze.js';
import type { ConditionId } from './types.js';

export const CONDITION_RECOMMENDATIONS: Readonly<Record<ConditionId, readonly string[]>> =
  deepFreeze({
    hypertension: [
      'DASH diet implementation',
      'Regular aerobic exercise',
      'Weight management',
      'Sodium restriction',
      'Stress management',
    ],
    diabetes: [
      'Structured meal planning',
      'Regular glucose monitoring',
      'Weight loss program',
      'Diabetes prevention program',
      'Regular physical activity',
    ],
    kidney_disease: [
      'Blood pressure control',
      'Diabetes prevention',
      'Annual kidney function tests',
      'Adequate hydration',
      'Avoid nephrotoxic medications',
    ],
    stroke: [
      'Blood pressure management',
      'Cholesterol control',
      'Regular cardio exercise',
      'Antiplatelet therapy consideration',
      'Stroke symptom education',
    ],
    heart_disease: [
      'Cardiac risk factor modification',
      'Regular exercise program',
      'Heart-healthy diet',
      'Cholesterol management',
      'Regular cardiac screening',
    ],
  });

/**
 * Kidney disease always reports these, whichever terms fired
 */
export const KIDNEY_DISEASE_KEY_FACTORS: readonly string[] = deepFreeze([
  'Diabetes risk',
  'Hypertension risk',
  'Age',
]);

/**
 * Upper bound of each condition's risk percentage
 */
export const RISK_CAPS: Readonly<Record<ConditionId, number>> = deepFreeze({
  hypertension: 95,
  diabetes: 95,
  kidney_disease: 80,
  stroke: 90,
  heart_disease: 90,
});
