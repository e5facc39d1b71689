/**
 * @fileoverview Domain Package Exports
 *
 * Pure risk scoring engine: no I/O, no logging, no shared mutable state.
 *
 * @module @vitalrisk/domain
 *
 * @example
 * ```typescript
 * import { createPatientRecord, calculateAllRisks } from '@vitalrisk/domain';
 *
 * const record = createPatientRecord(parsedInput);
 * const results = calculateAllRisks(record);
 * results.kidney_disease.riskLevel; // 'LOW' | 'MODERATE' | 'HIGH'
 * ```
 */

export * from './risk-assessment/index.js';
