/**
 * @fileoverview Risk Engine Errors
 *
 * @module domain/risk-assessment/errors
 */

/**
 * Base class for every error raised by the scoring engine
 */
export class RiskEngineError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RiskEngineError';
    Object.setPrototypeOf(this, RiskEngineError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * A field a calculator reads is missing, of the wrong type or out of range.
 * The intake validator should make this unreachable.
 */
export class InvalidRecordFieldError extends RiskEngineError {
  constructor(
    public readonly field: string,
    public readonly reason: string
  ) {
    super('INVALID_RECORD_FIELD', `Invalid record field "${field}": ${reason}`, {
      field,
      reason,
    });
    this.name = 'InvalidRecordFieldError';
    Object.setPrototypeOf(this, InvalidRecordFieldError.prototype);
  }
}

/**
 * A ratio whose denominator is zero or negative
 */
export class UndefinedRatioError extends RiskEngineError {
  constructor(
    public readonly ratio: string,
    denominator: number
  ) {
    super('UNDEFINED_RATIO', `Cannot compute ${ratio}: denominator is ${denominator}`, {
      ratio,
      denominator,
    });
    this.name = 'UndefinedRatioError';
    Object.setPrototypeOf(this, UndefinedRatioError.prototype);
  }
}

/**
 * The assessment pipeline graph is malformed (duplicate stage, unknown
 * dependency or cycle)
 */
export class PipelineConfigurationError extends RiskEngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('PIPELINE_CONFIGURATION', message, details);
    this.name = 'PipelineConfigurationError';
    Object.setPrototypeOf(this, PipelineConfigurationError.prototype);
  }
}

/**
 * A serialized result set does not match the result set schema
 */
export class InvalidResultSetError extends RiskEngineError {
  constructor(issues: readonly string[]) {
    super('INVALID_RESULT_SET', `Invalid risk result set: ${issues.join('; ')}`, {
      issues: [...issues],
    });
    this.name = 'InvalidResultSetError';
    Object.setPrototypeOf(this, InvalidResultSetError.prototype);
  }
}
