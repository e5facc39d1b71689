/**
 * Patient record schemas
 *
 * Contract between the intake validator and the risk scoring engine.
 * The validator parses raw form input with {@link PatientRecordInputSchema};
 * the engine receives the parsed value and trusts it.
 */
import { z } from 'zod';

// =============================================================================
// Enumerations
// =============================================================================

export const GenderSchema = z.enum(['Female', 'Male', 'Other']);

export const SmokingStatusSchema = z.enum(['Never', 'Former', 'Current']);

export const AlcoholConsumptionSchema = z.enum(['None', 'Occasional', 'Moderate', 'Heavy']);

export const ExerciseLevelSchema = z.enum([
  'Sedentary',
  'Light',
  'Moderate',
  'Active',
  'Very Active',
]);

export const DietPatternSchema = z.enum([
  'Standard',
  'Mediterranean',
  'Plant-based',
  'Low-carb',
  'Other',
]);

export const FamilyCancerHistorySchema = z.enum([
  'None',
  'Breast',
  'Prostate',
  'Lung',
  'Colorectal',
  'Other',
]);

// =============================================================================
// Field ranges
// =============================================================================

/**
 * Accepted ranges for numeric intake fields (inclusive)
 */
export const PATIENT_FIELD_RANGES = {
  age: { min: 18, max: 100 },
  heightCm: { min: 100, max: 250 },
  weightKg: { min: 30, max: 200 },
  systolicBp: { min: 70, max: 200 },
  diastolicBp: { min: 40, max: 120 },
  heartRate: { min: 40, max: 150 },
  fastingGlucose: { min: 50, max: 300 },
  hba1c: { min: 3, max: 15 },
  totalCholesterol: { min: 100, max: 400 },
  ldlCholesterol: { min: 50, max: 300 },
  hdlCholesterol: { min: 20, max: 100 },
} as const;

type RangedField = keyof typeof PATIENT_FIELD_RANGES;

function ranged(field: RangedField) {
  const { min, max } = PATIENT_FIELD_RANGES[field];
  return z.number().min(min).max(max);
}

function rangedInt(field: RangedField) {
  return ranged(field).int();
}

// =============================================================================
// Patient record
// =============================================================================

/**
 * Raw patient record as collected by the intake form
 */
export const PatientRecordInputSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),

  age: rangedInt('age'),
  gender: GenderSchema,
  heightCm: ranged('heightCm'),
  weightKg: ranged('weightKg'),

  // Lifestyle is recorded but not scored yet
  smoking: SmokingStatusSchema,
  alcohol: AlcoholConsumptionSchema,
  exercise: ExerciseLevelSchema,
  diet: DietPatternSchema,

  gestationalDiabetes: z.boolean().default(false),
  depressionHistory: z.boolean().default(false),

  familyDiabetes: z.boolean().default(false),
  familyHypertension: z.boolean().default(false),
  familyCancer: FamilyCancerHistorySchema.default('None'),

  systolicBp: rangedInt('systolicBp'),
  diastolicBp: rangedInt('diastolicBp'),
  heartRate: rangedInt('heartRate'),

  fastingGlucose: ranged('fastingGlucose'),
  hba1c: ranged('hba1c'),
  totalCholesterol: ranged('totalCholesterol'),
  ldlCholesterol: ranged('ldlCholesterol'),
  hdlCholesterol: ranged('hdlCholesterol'),
});

/**
 * Patient record handed to the scoring engine, with BMI derived once
 */
export const PatientRecordSchema = PatientRecordInputSchema.extend({
  bmi: z.number().positive(),
});

export type Gender = z.infer<typeof GenderSchema>;
export type SmokingStatus = z.infer<typeof SmokingStatusSchema>;
export type AlcoholConsumption = z.infer<typeof AlcoholConsumptionSchema>;
export type ExerciseLevel = z.infer<typeof ExerciseLevelSchema>;
export type DietPattern = z.infer<typeof DietPatternSchema>;
export type FamilyCancerHistory = z.infer<typeof FamilyCancerHistorySchema>;
export type PatientRecordInput = z.infer<typeof PatientRecordInputSchema>;
export type PatientRecord = z.infer<typeof PatientRecordSchema>;
