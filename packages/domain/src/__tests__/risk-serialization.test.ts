/**
 * Result set serialization tests
 */

import { describe, it, expect } from 'vitest';

import { InvalidResultSetError } from '../risk-assessment/errors.js';
import { calculateAllRisks } from '../risk-assessment/risk-aggregator.js';
import {
  deserializeRiskResultSet,
  serializeRiskResultSet,
} from '../risk-assessment/serialization.js';
import { createReferenceRecord } from './risk-assessment-fixtures.js';

const results = calculateAllRisks(createReferenceRecord({ age: 62, familyDiabetes: true }));

describe('serializeRiskResultSet / deserializeRiskResultSet', () => {
  it('preserves numbers exactly and lists in order', () => {
    const restored = deserializeRiskResultSet(serializeRiskResultSet(results));

    expect(restored).toEqual(results);
    expect(restored.diabetes.riskPercentage).toBe(results.diabetes.riskPercentage);
    expect(restored.kidney_disease.keyFactors).toEqual(['Diabetes risk', 'Hypertension risk', 'Age']);
  });

  it('returns a frozen result set', () => {
    const restored = deserializeRiskResultSet(serializeRiskResultSet(results));

    expect(Object.isFrozen(restored.heart_disease.recommendations)).toBe(true);
  });

  it('rejects malformed JSON', () => {
    expect(() => deserializeRiskResultSet('{"hypertension":')).toThrow(InvalidResultSetError);
  });

  it('rejects a result set missing a condition', () => {
    const { stroke: _stroke, ...withoutStroke } = results;

    expect(() => deserializeRiskResultSet(JSON.stringify(withoutStroke))).toThrow(
      'Invalid risk result set: stroke: Required'
    );
  });

  it('rejects out-of-range percentages', () => {
    const tampered = {
      ...results,
      hypertension: { ...results.hypertension, riskPercentage: 120 },
    };

    try {
      deserializeRiskResultSet(JSON.stringify(tampered));
      expect.unreachable('expected an InvalidResultSetError');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidResultSetError);
      expect(error).toMatchObject({ code: 'INVALID_RESULT_SET' });
      expect(error instanceof Error ? error.message : '').toContain('hypertension.riskPercentage');
    }
  });

  it('rejects an unknown risk level', () => {
    const tampered = { ...results, stroke: { ...results.stroke, riskLevel: 'SEVERE' } };

    expect(() => deserializeRiskResultSet(JSON.stringify(tampered))).toThrow('stroke.riskLevel');
  });
});
