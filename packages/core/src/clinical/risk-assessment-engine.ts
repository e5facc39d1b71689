/**
 * @fileoverview Risk Assessment Engine
 *
 * Orchestration layer for patient risk scoring.
 * Combines the pure domain engine with logging and the optional AI insight
 * generator.
 *
 * @module core/clinical/risk-assessment-engine
 */

import {
  CONDITION_IDS,
  RiskAggregator,
  createPatientRecord,
  recommendInvestigations,
  type PatientRecord,
  type PatientRecordInput,
  type RiskResultSet,
} from '@vitalrisk/domain';
import type { InvestigationPlan, RiskAssessmentReport, RiskInsight } from '@vitalrisk/types';

import { toSafeErrorResponse } from '../errors.js';
import {
  createLogger,
  generateCorrelationId,
  redactText,
  withCorrelationId,
  type Logger,
} from '../logger.js';
import { roundTo } from '../utils.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Input of one insight request
 */
export interface RiskInsightRequest {
  readonly record: PatientRecord;
  readonly results: RiskResultSet;
}

/**
 * Produces a narrative from a completed result set
 */
export interface InsightGenerator {
  generateRiskInsights(request: RiskInsightRequest): Promise<string>;
}

/**
 * Engine dependencies
 */
export interface RiskAssessmentEngineDeps {
  readonly aggregator?: RiskAggregator;
  readonly insightGenerator?: InsightGenerator | null;
  readonly logger?: Logger;
  readonly clock?: () => Date;
}

/**
 * Assess input
 */
export interface AssessRiskInput {
  readonly record: PatientRecordInput;
  readonly correlationId?: string;
}

/**
 * Synchronous scoring output
 */
export interface CalculatedRisks {
  readonly record: PatientRecord;
  readonly results: RiskResultSet;
  readonly investigations: InvestigationPlan;
}

export const INSIGHT_UNAVAILABLE_NARRATIVE = 'AI analysis temporarily unavailable.';

// ============================================================================
// ENGINE
// ============================================================================

/**
 * RiskAssessmentEngine
 *
 * Scores a patient record, suggests investigations and, when configured,
 * asks the insight generator for a narrative. The narrative is best effort:
 * a failed insight call never affects the computed results.
 */
export class RiskAssessmentEngine {
  private readonly aggregator: RiskAggregator;
  private readonly insightGenerator: InsightGenerator | null;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(deps: RiskAssessmentEngineDeps = {}) {
    this.aggregator = deps.aggregator ?? new RiskAggregator();
    this.insightGenerator = deps.insightGenerator ?? null;
    this.logger = deps.logger ?? createLogger({ name: 'risk-assessment-engine' });
    this.clock = deps.clock ?? (() => new Date());
  }

  get insightsEnabled(): boolean {
    return this.insightGenerator !== null;
  }

  /**
   * Score every condition and recommend investigations, without insights
   */
  calculateRisks(input: PatientRecordInput): CalculatedRisks {
    return this.score(createPatientRecord(input));
  }

  /**
   * Run one full assessment
   */
  async assess(input: AssessRiskInput): Promise<RiskAssessmentReport> {
    const correlationId = input.correlationId ?? generateCorrelationId();
    const log = withCorrelationId(this.logger, correlationId);

    const record = createPatientRecord(input.record);
    log.info({ patient: record }, 'Risk assessment started');

    const { results, investigations } = this.score(record);

    log.info({ summary: summarizeResults(results) }, 'Risk assessment completed');

    const insight = await this.generateInsight({ record, results }, log);

    return {
      patientId: record.id,
      correlationId,
      assessedAt: this.clock().toISOString(),
      results,
      investigations,
      insight,
    };
  }

  private score(record: PatientRecord): CalculatedRisks {
    const results = this.aggregator.calculateAllRisks(record);
    return { record, results, investigations: recommendInvestigations(record) };
  }

  private async generateInsight(request: RiskInsightRequest, log: Logger): Promise<RiskInsight> {
    if (!this.insightGenerator) {
      return { status: 'disabled', narrative: null };
    }

    try {
      const narrative = await this.insightGenerator.generateRiskInsights(request);
      return { status: 'generated', narrative };
    } catch (error) {
      const reason = redactText(toSafeErrorResponse(error).message);
      log.warn({ err: error }, 'Insight generation failed, returning placeholder');
      return { status: 'unavailable', narrative: INSIGHT_UNAVAILABLE_NARRATIVE, reason };
    }
  }
}

/**
 * Levels and percentages per condition, safe to log
 */
export function summarizeResults(
  results: RiskResultSet
): Record<string, { level: string; percentage: number }> {
  const summary: Record<string, { level: string; percentage: number }> = {};
  for (const condition of CONDITION_IDS) {
    const { riskLevel, riskPercentage } = results[condition];
    summary[condition] = { level: riskLevel, percentage: roundTo(riskPercentage, 1) };
  }
  return summary;
}

/**
 * Factory function
 */
export function createRiskAssessmentEngine(deps?: RiskAssessmentEngineDeps): RiskAssessmentEngine {
  return new RiskAssessmentEngine(deps);
}
