/**
 * @fileoverview Patient Record
 *
 * Builds the immutable record one assessment run scores. BMI is derived here
 * once so every calculator sees the same value.
 *
 * @module domain/risk-assessment/patient-record
 */

import { GenderSchema, PATIENT_FIELD_RANGES } from '@vitalrisk/types';

import { InvalidRecordFieldError } from './errors.js';
import { deepFreeze } from './freeze.js';
import type { PatientRecord, PatientRecordInput, ScoredField } from './types.js';

/**
 * Body mass index in kg/m²
 */
export function computeBmi(weightKg: number, heightCm: number): number {
  const heightM = heightCm / 100;
  return weightKg / (heightM * heightM);
}

/**
 * Derive BMI and freeze the record for one assessment run
 */
export function createPatientRecord(input: PatientRecordInput): PatientRecord {
  assertRecordFields(input, ['weightKg', 'heightCm']);
  return deepFreeze({
    ...input,
    bmi: computeBmi(input.weightKg, input.heightCm),
  });
}

// ============================================================================
// FIELD GUARD
// ============================================================================

type FieldKind = 'number' | 'boolean' | 'gender';

const FIELD_KINDS: Readonly<Partial<Record<ScoredField, FieldKind>>> = Object.freeze({
  age: 'number',
  heightCm: 'number',
  weightKg: 'number',
  bmi: 'number',
  systolicBp: 'number',
  diastolicBp: 'number',
  heartRate: 'number',
  fastingGlucose: 'number',
  hba1c: 'number',
  totalCholesterol: 'number',
  ldlCholesterol: 'number',
  hdlCholesterol: 'number',
  gestationalDiabetes: 'boolean',
  depressionHistory: 'boolean',
  familyDiabetes: 'boolean',
  familyHypertension: 'boolean',
  gender: 'gender',
});

interface FieldRange {
  readonly min: number;
  readonly max: number;
}

const FIELD_RANGES: Readonly<Partial<Record<ScoredField, FieldRange>>> = PATIENT_FIELD_RANGES;

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'number') return String(value);
  return typeof value;
}

/**
 * Fail fast when a field a calculator reads is absent, mistyped or outside
 * the accepted intake range. Bounds are inclusive.
 */
export function assertRecordFields(
  record: Readonly<Partial<Record<ScoredField, unknown>>>,
  fields: readonly ScoredField[]
): void {
  for (const field of fields) {
    const value = record[field];

    if (value === undefined || value === null) {
      throw new InvalidRecordFieldError(field, 'value is missing');
    }

    switch (FIELD_KINDS[field]) {
      case 'number':
        if (typeof value !== 'number' || !Number.isFinite(value)) {
          throw new InvalidRecordFieldError(
            field,
            `expected a finite number, got ${describeValue(value)}`
          );
        }
        assertInRange(field, value);
        break;
      case 'boolean':
        if (typeof value !== 'boolean') {
          throw new InvalidRecordFieldError(field, `expected a boolean, got ${describeValue(value)}`);
        }
        break;
      case 'gender':
        if (!GenderSchema.safeParse(value).success) {
          throw new InvalidRecordFieldError(
            field,
            `expected one of ${GenderSchema.options.join(', ')}`
          );
        }
        break;
      case undefined:
        break;
    }
  }
}

function assertInRange(field: ScoredField, value: number): void {
  const range = FIELD_RANGES[field];
  if (range && (value < range.min || value > range.max)) {
    throw new InvalidRecordFieldError(field, `expected ${range.min}..${range.max}, got ${value}`);
  }
}
