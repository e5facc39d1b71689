/**
 * Assessment pipeline and aggregator tests
 */

import { describe, it, expect, vi } from 'vitest';

import { AssessmentPipeline, orderStages } from '../risk-assessment/assessment-pipeline.js';
import {
  buildRiskResult,
  diabetesStage,
  heartDiseaseStage,
  hypertensionStage,
  kidneyDiseaseStage,
  strokeStage,
} from '../risk-assessment/calculators/index.js';
import { InvalidRecordFieldError, PipelineConfigurationError } from '../risk-assessment/errors.js';
import {
  CONDITION_IDS,
  RiskAggregator,
  calculateAllRisks,
  createAssessmentPipeline,
} from '../risk-assessment/risk-aggregator.js';
import type { ConditionId, ConditionStage, RiskResult } from '../risk-assessment/types.js';
import { createReferenceRecord } from './risk-assessment-fixtures.js';

const fixedStage = (
  id: ConditionId,
  riskPercentage: number,
  dependsOn: readonly ConditionId[] = []
): ConditionStage => ({
  id,
  dependsOn,
  requiredFields: [],
  calculate: () => buildRiskResult(id, riskPercentage / 100, []),
});

describe('orderStages', () => {
  it('keeps declaration order when dependencies are already satisfied', () => {
    expect(createAssessmentPipeline().executionOrder).toEqual([
      'hypertension',
      'diabetes',
      'kidney_disease',
      'stroke',
      'heart_disease',
    ]);
  });

  it('moves a stage after the dependencies declared later', () => {
    const pipeline = new AssessmentPipeline([
      kidneyDiseaseStage(),
      strokeStage(),
      hypertensionStage(),
      diabetesStage(),
      heartDiseaseStage(),
    ]);

    expect(pipeline.executionOrder).toEqual([
      'stroke',
      'hypertension',
      'diabetes',
      'kidney_disease',
      'heart_disease',
    ]);
  });

  it('rejects duplicate stages', () => {
    expect(() => orderStages([strokeStage(), strokeStage()])).toThrow(
      'Duplicate assessment stage "stroke"'
    );
  });

  it('rejects dependencies on undeclared stages', () => {
    expect(() => orderStages([kidneyDiseaseStage()])).toThrow(
      'Stage "kidney_disease" depends on undeclared stage(s): diabetes, hypertension'
    );
  });

  it('rejects cycles', () => {
    const stages = [
      fixedStage('hypertension', 10, ['diabetes']),
      fixedStage('diabetes', 10, ['hypertension']),
    ];

    try {
      orderStages(stages);
      expect.unreachable('expected a PipelineConfigurationError');
    } catch (error) {
      expect(error).toBeInstanceOf(PipelineConfigurationError);
      expect(error).toMatchObject({
        code: 'PIPELINE_CONFIGURATION',
        message: 'Assessment stages contain a dependency cycle',
        details: { unresolved: ['hypertension', 'diabetes'] },
      });
    }
  });
});

describe('AssessmentPipeline.run', () => {
  it('hands each stage the results of its dependencies from the same run', () => {
    const calculate = vi.fn(
      (): RiskResult => buildRiskResult('kidney_disease', 0.1, ['Diabetes risk'])
    );
    const pipeline = new AssessmentPipeline([
      fixedStage('hypertension', 50),
      fixedStage('diabetes', 40),
      { id: 'kidney_disease', dependsOn: ['diabetes', 'hypertension'], requiredFields: [], calculate },
    ]);
    const record = createReferenceRecord();

    const results = pipeline.run(record);

    expect(calculate).toHaveBeenCalledTimes(1);
    expect(calculate).toHaveBeenCalledWith(record, {
      diabetes: results.diabetes,
      hypertension: results.hypertension,
    });
  });

  it('checks the fields a stage reads before running it', () => {
    const pipeline = createAssessmentPipeline();
    const record = { ...createReferenceRecord(), hba1c: Number.NaN };

    expect(() => pipeline.run(record)).toThrow(
      new InvalidRecordFieldError('hba1c', 'expected a finite number, got NaN')
    );
  });

  it('rejects values outside the intake range before scoring', () => {
    const record = createReferenceRecord({ age: 250, systolicBp: 400, hdlCholesterol: 1 });

    expect(() => calculateAllRisks(record)).toThrow(
      new InvalidRecordFieldError('age', 'expected 18..100, got 250')
    );
  });

  it('rejects an out-of-range field only read by a later stage', () => {
    const record = createReferenceRecord({ hdlCholesterol: 0 });

    expect(() => calculateAllRisks(record)).toThrow(
      'Invalid record field "hdlCholesterol": expected 20..100, got 0'
    );
  });

  it('aborts the whole run when a stage throws', () => {
    const stroke = vi.fn((): RiskResult => buildRiskResult('stroke', 0.2, []));
    const pipeline = new AssessmentPipeline([
      fixedStage('hypertension', 10),
      {
        id: 'diabetes',
        dependsOn: [],
        requiredFields: [],
        calculate: () => {
          throw new Error('diabetes stage failed');
        },
      },
      { id: 'stroke', dependsOn: [], requiredFields: [], calculate: stroke },
    ]);

    expect(() => pipeline.run(createReferenceRecord())).toThrow('diabetes stage failed');
    expect(stroke).not.toHaveBeenCalled();
  });
});

describe('RiskAggregator', () => {
  it('requires a stage for every condition', () => {
    const partial = new AssessmentPipeline([hypertensionStage(), diabetesStage()]);

    expect(() => new RiskAggregator(partial)).toThrow(
      'Assessment pipeline is missing stage(s): kidney_disease, stroke, heart_disease'
    );
  });

  it('returns every condition in canonical order', () => {
    const results = calculateAllRisks(createReferenceRecord());

    expect(Object.keys(results)).toEqual([...CONDITION_IDS]);
  });

  it('returns a frozen result set', () => {
    const results = calculateAllRisks(createReferenceRecord());

    expect(Object.isFrozen(results)).toBe(true);
    expect(Object.isFrozen(results.stroke)).toBe(true);
    expect(Object.isFrozen(results.stroke.keyFactors)).toBe(true);
  });

  it('feeds kidney disease the diabetes and hypertension results of its own run', () => {
    const aggregator = new RiskAggregator(
      new AssessmentPipeline([
        fixedStage('hypertension', 50),
        fixedStage('diabetes', 40),
        kidneyDiseaseStage(),
        strokeStage(),
        heartDiseaseStage(),
      ])
    );

    const results = aggregator.calculateAllRisks(createReferenceRecord());

    // 0.05 + 0.4 * 0.3 + 0.5 * 0.2
    expect(results.kidney_disease.riskPercentage).toBeCloseTo(27, 10);
  });

  it('recomputes on every call', () => {
    const record = createReferenceRecord();

    const first = calculateAllRisks(record);
    const second = calculateAllRisks(record);

    expect(second).toEqual(first);
    expect(second).not.toBe(first);
  });

  it('does not score lifestyle fields', () => {
    const baseline = calculateAllRisks(createReferenceRecord());
    const lifestyle = calculateAllRisks(
      createReferenceRecord({
        smoking: 'Current',
        alcohol: 'Heavy',
        exercise: 'Sedentary',
        diet: 'Low-carb',
        depressionHistory: true,
      })
    );

    expect(lifestyle).toEqual(baseline);
  });
});
