export {
  createLogger,
  withCorrelationId,
  generateCorrelationId,
  redactObject,
  redactText,
  summarizePatient,
  type Logger,
  type CreateLoggerOptions,
} from './logger.js';

export {
  AppError,
  ExternalServiceError,
  ConfigurationError,
  isOperationalError,
  toSafeErrorResponse,
  type SafeErrorDetails,
} from './errors.js';

export { withRetry, sleep, roundTo } from './utils.js';

export {
  AppEnvSchema,
  validateEnv,
  getEnv,
  type AppEnv,
} from './env.js';

// Risk assessment orchestration
export {
  RiskAssessmentEngine,
  createRiskAssessmentEngine,
  summarizeResults,
  INSIGHT_UNAVAILABLE_NARRATIVE,
  type InsightGenerator,
  type RiskInsightRequest,
  type RiskAssessmentEngineDeps,
  type AssessRiskInput,
  type CalculatedRisks,
} from './clinical/risk-assessment-engine.js';
