/**
 * Common schemas shared across the platform
 */
import { z } from 'zod';

/**
 * ISO 8601 timestamp string
 */
export const IsoTimestampSchema = z
  .string()
  .datetime({ offset: true })
  .describe('ISO 8601 timestamp');

/**
 * Correlation ID for request tracing
 */
export const CorrelationIdSchema = z
  .string()
  .min(1)
  .max(64)
  .describe('Correlation ID for distributed tracing');

/**
 * Ordered list of human-readable labels (factors, recommendations, tests)
 */
export const LabelListSchema = z.array(z.string().min(1));

export type IsoTimestamp = z.infer<typeof IsoTimestampSchema>;
export type CorrelationId = z.infer<typeof CorrelationIdSchema>;
