/**
 * @fileoverview Recommended Investigations
 *
 * Tests to order next, keyed off the record's measurements and family
 * history. Independent of the computed risk levels.
 *
 * @module domain/risk-assessment/investigations
 */

import type { InvestigationPlan } from '@vitalrisk/types';

import { deepFreeze } from './freeze.js';
import type { PatientRecord } from './types.js';

interface InvestigationRule {
  readonly applies: (record: PatientRecord) => boolean;
  readonly tests: readonly string[];
}

const IMMEDIATE_INVESTIGATIONS: readonly InvestigationRule[] = deepFreeze([
  {
    applies: (r: PatientRecord) => r.hba1c >= 5.7,
    tests: ['Oral Glucose Tolerance Test', 'Fasting Insulin'],
  },
  {
    applies: (r: PatientRecord) => r.systolicBp >= 130,
    tests: ['24-hour BP monitoring', 'ECG'],
  },
  {
    applies: (r: PatientRecord) => r.age >= 45,
    tests: ['Lipid Profile', 'Kidney Function Tests'],
  },
]);

const FOLLOW_UP_INVESTIGATIONS: readonly InvestigationRule[] = deepFreeze([
  {
    applies: (r: PatientRecord) => r.familyCancer === 'Breast',
    tests: ['BRCA Gene Testing', 'Enhanced MRI Screening'],
  },
  {
    applies: () => true,
    tests: [
      'Annual HbA1c monitoring',
      'Cardiovascular risk assessment',
      'Cancer screening as per guidelines',
    ],
  },
]);

function collect(record: PatientRecord, rules: readonly InvestigationRule[]): string[] {
  return rules.filter((rule) => rule.applies(record)).flatMap((rule) => [...rule.tests]);
}

export function recommendInvestigations(record: PatientRecord): InvestigationPlan {
  return {
    immediate: collect(record, IMMEDIATE_INVESTIGATIONS),
    followUp: collect(record, FOLLOW_UP_INVESTIGATIONS),
  };
}
