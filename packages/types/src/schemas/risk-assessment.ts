/**
 * Risk assessment schemas
 *
 * Output contract of the risk scoring engine and of the assessment report
 * handed to presentation and insight consumers.
 */
import { z } from 'zod';

import { CorrelationIdSchema, IsoTimestampSchema, LabelListSchema } from './common.js';

/**
 * Categorical risk band
 */
export const RiskLevelSchema = z.enum(['LOW', 'MODERATE', 'HIGH']);

/**
 * Conditions scored by the engine
 */
export const ConditionIdSchema = z.enum([
  'hypertension',
  'diabetes',
  'kidney_disease',
  'stroke',
  'heart_disease',
]);

/**
 * Result of one condition calculator
 */
export const RiskResultSchema = z.object({
  riskPercentage: z.number().min(0).max(100),
  riskLevel: RiskLevelSchema,
  keyFactors: LabelListSchema,
  recommendations: LabelListSchema,
});

/**
 * Full result set, always carrying every condition
 */
export const RiskResultSetSchema = z.object({
  hypertension: RiskResultSchema,
  diabetes: RiskResultSchema,
  kidney_disease: RiskResultSchema,
  stroke: RiskResultSchema,
  heart_disease: RiskResultSchema,
});

/**
 * Follow-up tests suggested from the record
 */
export const InvestigationPlanSchema = z.object({
  immediate: LabelListSchema,
  followUp: LabelListSchema,
});

export const InsightStatusSchema = z.enum(['generated', 'unavailable', 'disabled']);

/**
 * Narrative produced by the insight generator, or its placeholder
 */
export const RiskInsightSchema = z.object({
  status: InsightStatusSchema,
  narrative: z.string().nullable(),
  reason: z.string().optional(),
});

/**
 * Everything one assessment run produces
 */
export const RiskAssessmentReportSchema = z.object({
  patientId: z.string().min(1),
  correlationId: CorrelationIdSchema,
  assessedAt: IsoTimestampSchema,
  results: RiskResultSetSchema,
  investigations: InvestigationPlanSchema,
  insight: RiskInsightSchema,
});

export type RiskLevel = z.infer<typeof RiskLevelSchema>;
export type ConditionId = z.infer<typeof ConditionIdSchema>;
export type RiskResult = z.infer<typeof RiskResultSchema>;
export type RiskResultSet = z.infer<typeof RiskResultSetSchema>;
export type InvestigationPlan = z.infer<typeof InvestigationPlanSchema>;
export type InsightStatus = z.infer<typeof InsightStatusSchema>;
export type RiskInsight = z.infer<typeof RiskInsightSchema>;
export type RiskAssessmentReport = z.infer<typeof RiskAssessmentReportSchema>;
