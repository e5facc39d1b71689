/**
 * @fileoverview Result set serialization
 *
 * JSON encoding of a result set. Decoding validates against the shared
 * schema before handing back a frozen value.
 *
 * @module domain/risk-assessment/serialization
 */

import { RiskResultSetSchema } from '@vitalrisk/types';

import { InvalidResultSetError } from './errors.js';
import { deepFreeze } from './freeze.js';
import type { RiskResultSet } from './types.js';

export function serializeRiskResultSet(results: RiskResultSet): string {
  return JSON.stringify(results);
}

export function deserializeRiskResultSet(json: string): RiskResultSet {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidResultSetError([`malformed JSON: ${message}`]);
  }

  const parsed = RiskResultSetSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidResultSetError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  return deepFreeze(parsed.data);
}
