/**
 * @fileoverview Risk Assessment Module
 *
 * Deterministic, auditable linear rule engine scoring hypertension, type 2
 * diabetes, chronic kidney disease, stroke and ischemic heart disease risk.
 *
 * @module domain/risk-assessment
 */

export * from './types.js';
export * from './errors.js';
export { deepFreeze } from './freeze.js';
export { computeBmi, createPatientRecord, assertRecordFields } from './patient-record.js';
export { totalToHdlRatio } from './clinical-metrics.js';
export {
  DEFAULT_CONDITION_MODELS,
  ConditionModelRegistry,
  defaultConditionModelRegistry,
} from './condition-models.js';
export {
  evaluateContributions,
  firingFactors,
  linearExcess,
  flatWhen,
  tiered,
  scaled,
  branch,
  type Threshold,
} from './contribution.js';
export { RISK_LEVEL_THRESHOLDS, categorizeRisk } from './categorize.js';
export { attributeFactors, factor } from './factor-attribution.js';
export { CONDITION_RECOMMENDATIONS, KIDNEY_DISEASE_KEY_FACTORS, RISK_CAPS } from './lookup-tables.js';
export * from './calculators/index.js';
export { AssessmentPipeline, orderStages } from './assessment-pipeline.js';
export {
  CONDITION_IDS,
  RiskAggregator,
  createAssessmentPipeline,
  calculateAllRisks,
} from './risk-aggregator.js';
export { recommendInvestigations } from './investigations.js';
export { serializeRiskResultSet, deserializeRiskResultSet } from './serialization.js';
