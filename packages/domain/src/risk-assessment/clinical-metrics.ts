/**
 * @fileoverview Derived clinical metrics
 *
 * @module domain/risk-assessment/clinical-metrics
 */

import { UndefinedRatioError } from './errors.js';
import type { PatientRecord } from './types.js';

/**
 * Total cholesterol over HDL cholesterol.
 *
 * @throws UndefinedRatioError when HDL is zero or negative
 */
export function totalToHdlRatio(
  record: Pick<PatientRecord, 'totalCholesterol' | 'hdlCholesterol'>
): number {
  if (record.hdlCholesterol <= 0) {
    throw new UndefinedRatioError('total/HDL cholesterol ratio', record.hdlCholesterol);
  }
  return record.totalCholesterol / record.hdlCholesterol;
}
