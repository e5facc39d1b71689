/**
 * @fileoverview Risk Assessment Domain Types
 *
 * Pure domain types for the risk scoring engine. No infrastructure
 * dependencies.
 *
 * @module domain/risk-assessment/types
 */

import type {
  ConditionId,
  PatientRecord,
  PatientRecordInput,
  RiskLevel,
  RiskResult,
  RiskResultSet,
} from '@vitalrisk/types';

export type { ConditionId, PatientRecord, PatientRecordInput, RiskLevel, RiskResult, RiskResultSet };

// ============================================================================
// CONDITION MODELS
// ============================================================================

/**
 * Named, immutable coefficient bundle for one condition
 */
export interface ConditionModel {
  /** Starting risk fraction before any factor fires */
  readonly baseRisk: number;
  /** Per-factor weights, keyed by factor name */
  readonly factors: Readonly<Record<string, number>>;
}

/** Conditions that score through a named coefficient table */
export type ModeledConditionId = Extract<ConditionId, 'hypertension' | 'diabetes'>;

// ============================================================================
// CONTRIBUTIONS
// ============================================================================

/**
 * One threshold-gated term of a risk formula
 */
export interface ContributionRule {
  /** Name used in traces and tests */
  readonly factor: string;
  /** Whether the term fires for this record */
  readonly applies: (record: PatientRecord) => boolean;
  /** Amount added to the risk fraction when the term fires */
  readonly magnitude: (record: PatientRecord) => number;
}

/**
 * Human-readable factor that is reported when its check holds
 */
export interface FactorCheck {
  readonly label: string;
  readonly holds: (record: PatientRecord) => boolean;
}

// ============================================================================
// CALCULATORS
// ============================================================================

/** Fields of the record a calculator reads */
export type ScoredField = keyof PatientRecord;

/**
 * Results already produced earlier in the same assessment run
 */
export type UpstreamResults = Readonly<Partial<Record<ConditionId, RiskResult>>>;

/**
 * One stage of the assessment pipeline
 */
export interface ConditionStage {
  readonly id: ConditionId;
  /** Conditions whose results this stage consumes */
  readonly dependsOn: readonly ConditionId[];
  /** Record fields checked before the stage runs */
  readonly requiredFields: readonly ScoredField[];
  readonly calculate: (record: PatientRecord, upstream: UpstreamResults) => RiskResult;
}
