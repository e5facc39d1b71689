/**
 * VitalRisk Types Package
 *
 * Zod schemas and inferred types shared by the scoring engine, the
 * assessment orchestration layer and the integrations.
 *
 * @module @vitalrisk/types
 */

// =============================================================================
// Common
// =============================================================================
export {
  IsoTimestampSchema,
  CorrelationIdSchema,
  LabelListSchema,
  type IsoTimestamp,
  type CorrelationId,
} from './schemas/common.js';

// =============================================================================
// Patient record
// =============================================================================
export {
  GenderSchema,
  SmokingStatusSchema,
  AlcoholConsumptionSchema,
  ExerciseLevelSchema,
  DietPatternSchema,
  FamilyCancerHistorySchema,
  PATIENT_FIELD_RANGES,
  PatientRecordInputSchema,
  PatientRecordSchema,
  type Gender,
  type SmokingStatus,
  type AlcoholConsumption,
  type ExerciseLevel,
  type DietPattern,
  type FamilyCancerHistory,
  type PatientRecordInput,
  type PatientRecord,
} from './schemas/patient-record.js';

// =============================================================================
// Risk assessment
// =============================================================================
export {
  RiskLevelSchema,
  ConditionIdSchema,
  RiskResultSchema,
  RiskResultSetSchema,
  InvestigationPlanSchema,
  InsightStatusSchema,
  RiskInsightSchema,
  RiskAssessmentReportSchema,
  type RiskLevel,
  type ConditionId,
  type RiskResult,
  type RiskResultSet,
  type InvestigationPlan,
  type InsightStatus,
  type RiskInsight,
  type RiskAssessmentReport,
} from './schemas/risk-assessment.js';
