import { z } from 'zod';

import { ConfigurationError } from './errors.js';

/**
 * Environment Variable Validation
 * Ensures the insight provider is fully configured before it is used
 */

const BooleanFlagSchema = z
  .enum(['true', 'false'])
  .optional()
  .default('false')
  .transform((v) => v === 'true');

// Base runtime config
const RuntimeEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
});

// AI insight config
const InsightEnvSchema = z.object({
  AI_INSIGHTS_ENABLED: BooleanFlagSchema,
  ANTHROPIC_API_KEY: z.string().optional(),
  ANTHROPIC_MODEL: z.string().min(1).default('claude-sonnet-4-20250514'),
  /** Maximum tokens of one generated narrative */
  INSIGHT_MAX_TOKENS: z.coerce.number().int().positive().default(1000),
  /** Sampling temperature (0-1) */
  INSIGHT_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.1),
  /** Per-request timeout */
  INSIGHT_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
});

export const AppEnvSchema = RuntimeEnvSchema.merge(InsightEnvSchema).superRefine((env, ctx) => {
  if (env.AI_INSIGHTS_ENABLED && !env.ANTHROPIC_API_KEY) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['ANTHROPIC_API_KEY'],
      message: 'Anthropic API key is required when AI insights are enabled',
    });
  }
});

export type AppEnv = z.infer<typeof AppEnvSchema>;

/**
 * Validate environment variables
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  const result = AppEnvSchema.safeParse(source);

  if (!result.success) {
    const fieldErrors: Record<string, string[]> = {};
    for (const [field, messages] of Object.entries(result.error.flatten().fieldErrors)) {
      fieldErrors[field] = messages ?? [];
    }
    const errorMessages = Object.entries(fieldErrors)
      .map(([field, messages]) => `  ${field}: ${messages.join(', ')}`)
      .join('\n');

    throw new ConfigurationError(`Environment validation failed:\n${errorMessages}`, fieldErrors);
  }

  return result.data;
}

/**
 * Get validated env with type safety
 */
export function getEnv(): AppEnv {
  return validateEnv(process.env);
}
