/**
 * @fileoverview Assessment Pipeline
 *
 * Condition stages form a small directed acyclic graph. The graph is checked
 * and ordered once, at construction; every run then executes the stages in
 * that order so dependencies are always computed before their dependents.
 *
 * @module domain/risk-assessment/assessment-pipeline
 */

import { PipelineConfigurationError } from './errors.js';
import { assertRecordFields } from './patient-record.js';
import type {
  ConditionId,
  ConditionStage,
  PatientRecord,
  RiskResult,
} from './types.js';

/**
 * Order stages so each one follows its dependencies. Ties keep declaration
 * order, which makes the order itself deterministic.
 */
export function orderStages(stages: readonly ConditionStage[]): readonly ConditionStage[] {
  const declared = new Set<ConditionId>();
  for (const stage of stages) {
    if (declared.has(stage.id)) {
      throw new PipelineConfigurationError(`Duplicate assessment stage "${stage.id}"`, {
        stage: stage.id,
      });
    }
    declared.add(stage.id);
  }

  for (const stage of stages) {
    const unknown = stage.dependsOn.filter((dependency) => !declared.has(dependency));
    if (unknown.length > 0) {
      throw new PipelineConfigurationError(
        `Stage "${stage.id}" depends on undeclared stage(s): ${unknown.join(', ')}`,
        { stage: stage.id, unknown }
      );
    }
  }

  const remaining = [...stages];
  const completed = new Set<ConditionId>();
  const ordered: ConditionStage[] = [];

  while (remaining.length > 0) {
    const next = remaining.find((stage) =>
      stage.dependsOn.every((dependency) => completed.has(dependency))
    );
    if (!next) {
      throw new PipelineConfigurationError('Assessment stages contain a dependency cycle', {
        unresolved: remaining.map((stage) => stage.id),
      });
    }

    remaining.splice(remaining.indexOf(next), 1);
    completed.add(next.id);
    ordered.push(next);
  }

  return ordered;
}

export class AssessmentPipeline {
  private readonly orderedStages: readonly ConditionStage[];

  constructor(stages: readonly ConditionStage[]) {
    this.orderedStages = Object.freeze(orderStages(stages));
  }

  /** Stage ids in the order they run */
  get executionOrder(): readonly ConditionId[] {
    return this.orderedStages.map((stage) => stage.id);
  }

  get conditions(): ReadonlySet<ConditionId> {
    return new Set(this.executionOrder);
  }

  /**
   * Run every stage against one record. A stage failure aborts the run; no
   * partial result is returned.
   */
  run(record: PatientRecord): Readonly<Partial<Record<ConditionId, RiskResult>>> {
    const results: Partial<Record<ConditionId, RiskResult>> = {};

    for (const stage of this.orderedStages) {
      assertRecordFields(record, stage.requiredFields);

      const upstream: Partial<Record<ConditionId, RiskResult>> = {};
      for (const dependency of stage.dependsOn) {
        upstream[dependency] = results[dependency];
      }

      results[stage.id] = stage.calculate(record, upstream);
    }

    return results;
  }
}
