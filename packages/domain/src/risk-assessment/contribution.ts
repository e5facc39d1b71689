/**
 * @fileoverview Contribution Evaluator
 *
 * Risk formulas are a base fraction plus an ordered list of threshold-gated
 * terms. Terms only ever add: a rule with a negative weight is rejected when
 * it is built and a negative magnitude is rejected when it is evaluated.
 *
 * @module domain/risk-assessment/contribution
 */

import { RiskEngineError } from './errors.js';
import type { ContributionRule, PatientRecord } from './types.js';

type NumericSelector = (record: PatientRecord) => number;

/**
 * Comparison against a threshold. `inclusive` turns `>` into `>=`.
 */
export interface Threshold {
  readonly threshold: number;
  readonly inclusive?: boolean;
}

function crosses(value: number, { threshold, inclusive = false }: Threshold): boolean {
  return inclusive ? value >= threshold : value > threshold;
}

function assertWeight(factor: string, weight: number): void {
  if (!Number.isFinite(weight) || weight < 0) {
    throw new RiskEngineError(
      'INVALID_WEIGHT',
      `Contribution "${factor}" must have a finite, non-negative weight (got ${weight})`,
      { factor, weight }
    );
  }
}

// ============================================================================
// EVALUATION
// ============================================================================

/**
 * Sum `baseRisk` with the magnitude of every rule that applies, in
 * declaration order.
 */
export function evaluateContributions(
  baseRisk: number,
  rules: readonly ContributionRule[],
  record: PatientRecord
): number {
  let risk = baseRisk;

  for (const rule of rules) {
    if (!rule.applies(record)) {
      continue;
    }

    const amount = rule.magnitude(record);
    if (!(amount >= 0)) {
      throw new RiskEngineError(
        'NEGATIVE_CONTRIBUTION',
        `Contribution "${rule.factor}" produced ${amount}; contributions never subtract`,
        { factor: rule.factor, amount }
      );
    }
    risk += amount;
  }

  return risk;
}

/**
 * Names of the rules that fire for a record, in declaration order
 */
export function firingFactors(
  rules: readonly ContributionRule[],
  record: PatientRecord
): readonly string[] {
  return rules.filter((rule) => rule.applies(record)).map((rule) => rule.factor);
}

// ============================================================================
// RULE BUILDERS
// ============================================================================

/**
 * `(value - threshold) * weight` once `value` crosses `threshold`
 */
export function linearExcess(options: {
  readonly factor: string;
  readonly select: NumericSelector;
  readonly threshold: number;
  readonly inclusive?: boolean;
  readonly weight: number;
}): ContributionRule {
  const { factor, select, threshold, inclusive = false, weight } = options;
  assertWeight(factor, weight);

  return {
    factor,
    applies: (record) => crosses(select(record), { threshold, inclusive }),
    magnitude: (record) => (select(record) - threshold) * weight,
  };
}

/**
 * Flat `weight` when `applies` holds
 */
export function flatWhen(options: {
  readonly factor: string;
  readonly applies: (record: PatientRecord) => boolean;
  readonly weight: number;
}): ContributionRule {
  const { factor, applies, weight } = options;
  assertWeight(factor, weight);

  return { factor, applies, magnitude: () => weight };
}

/**
 * Mutually exclusive bands over one value. Tiers are tried in order and only
 * the first one crossed contributes.
 */
export function tiered(options: {
  readonly factor: string;
  readonly select: NumericSelector;
  readonly tiers: readonly (Threshold & { readonly weight: number })[];
}): ContributionRule {
  const { factor, select, tiers } = options;
  for (const tier of tiers) {
    assertWeight(factor, tier.weight);
  }

  const matchingTier = (record: PatientRecord) => {
    const value = select(record);
    return tiers.find((tier) => crosses(value, tier));
  };

  return {
    factor,
    applies: (record) => matchingTier(record) !== undefined,
    magnitude: (record) => matchingTier(record)?.weight ?? 0,
  };
}

/**
 * Always-on term proportional to a value computed outside the record
 * (for example another condition's risk fraction)
 */
export function scaled(options: {
  readonly factor: string;
  readonly value: number;
  readonly weight: number;
}): ContributionRule {
  const { factor, value, weight } = options;
  assertWeight(factor, weight);

  return {
    factor,
    applies: () => true,
    magnitude: () => value * weight,
  };
}

/**
 * Pick one of several prebuilt rules per record (for example a gender-specific
 * age term). Exactly the chosen rule is evaluated.
 */
export function branch(options: {
  readonly factor: string;
  readonly choose: (record: PatientRecord) => ContributionRule;
}): ContributionRule {
  const { factor, choose } = options;

  return {
    factor,
    applies: (record) => choose(record).applies(record),
    magnitude: (record) => choose(record).magnitude(record),
  };
}
