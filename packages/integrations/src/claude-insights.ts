/**
 * @fileoverview Claude Risk Insights Integration
 *
 * Narrative insights and condition-specific recommendations over the
 * Anthropic Messages API. Prompts carry a de-identified patient profile:
 * the patient's name and id are never sent.
 *
 * @module @vitalrisk/integrations/claude-insights
 */

import { z } from 'zod';
import {
  createLogger,
  withRetry,
  ExternalServiceError,
  type AppEnv,
  type InsightGenerator,
  type RiskInsightRequest,
} from '@vitalrisk/core';
import {
  ConditionIdSchema,
  type ConditionId,
  type PatientRecord,
  type RiskResultSet,
} from '@vitalrisk/types';

const logger = createLogger({ name: 'claude-insights' });

const ANTHROPIC_MESSAGES_URL = 'https://api.anthropic.com/v1/messages';
const ANTHROPIC_VERSION = '2023-06-01';
const SERVICE_NAME = 'Claude';

/** Recommendations are shorter than full insights */
const RECOMMENDATION_MAX_TOKENS = 800;

// ============================================================================
// CONFIGURATION SCHEMAS
// ============================================================================

const ClaudeInsightConfigSchema = z.object({
  apiKey: z.string().min(1, 'API key is required'),
  model: z.string().optional().default('claude-sonnet-4-20250514'),
  maxTokens: z.number().int().min(1).max(200000).optional().default(1000),
  temperature: z.number().min(0).max(1).optional().default(0.1),
  timeoutMs: z.number().int().min(1).max(600000).optional().default(30000),
  retryConfig: z
    .object({
      maxRetries: z.number().int().min(0).max(5).default(3),
      baseDelayMs: z.number().int().min(1).max(30000).default(1000),
    })
    .optional()
    .default({ maxRetries: 3, baseDelayMs: 1000 }),
});

const MessagesResponseSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    })
  ),
});

// ============================================================================
// TYPES
// ============================================================================

export interface ClaudeInsightConfig {
  /** Anthropic API key */
  apiKey: string;
  /** Model to use (default: claude-sonnet-4-20250514) */
  model?: string;
  /** Maximum tokens for an insight narrative (default: 1000) */
  maxTokens?: number;
  /** Temperature for generation (default: 0.1) */
  temperature?: number;
  /** Request timeout in ms (default: 30000) */
  timeoutMs?: number;
  /** Retry configuration */
  retryConfig?: {
    maxRetries: number;
    baseDelayMs: number;
  };
}

type ResolvedConfig = z.output<typeof ClaudeInsightConfigSchema>;

// ============================================================================
// PROMPTS
// ============================================================================

const CONDITION_LABELS: Readonly<Record<ConditionId, string>> = {
  hypertension: 'Hypertension',
  diabetes: 'Diabetes',
  kidney_disease: 'Kidney Disease',
  stroke: 'Stroke',
  heart_disease: 'Heart Disease',
};

/**
 * Patient record with the identifying fields removed
 */
export function deidentifyRecord(record: PatientRecord): Omit<PatientRecord, 'id' | 'name'> {
  const { id: _id, name: _name, ...profile } = record;
  return profile;
}

export function buildRiskInsightPrompt(record: PatientRecord, results: RiskResultSet): string {
  const riskLines = ConditionIdSchema.options.map(
    (condition) =>
      `- ${CONDITION_LABELS[condition]}: ${results[condition].riskPercentage.toFixed(1)}%`
  );

  return `As a preventive care specialist, analyze this patient's risk profile and provide clinical insights.

Patient Profile:
- Age: ${record.age}, Gender: ${record.gender}
- BMI: ${record.bmi.toFixed(1)}
- BP: ${record.systolicBp}/${record.diastolicBp} mmHg
- HbA1c: ${record.hba1c}%
- Total Cholesterol: ${record.totalCholesterol} mg/dL
- LDL: ${record.ldlCholesterol} mg/dL
- HDL: ${record.hdlCholesterol} mg/dL
- Family History: Diabetes=${record.familyDiabetes}, Hypertension=${record.familyHypertension}
- Personal History: Gestational Diabetes=${record.gestationalDiabetes}

Risk Assessment Results:
${riskLines.join('\n')}

Please provide:
1. Key clinical insights about interconnected risks
2. Priority interventions based on risk profile
3. Specific recommendations for this patient
4. Timeline for reassessment

Focus on evidence-based recommendations and explain the rationale.`;
}

export function buildRecommendationPrompt(record: PatientRecord, condition: ConditionId): string {
  return `Provide personalized prevention recommendations for ${CONDITION_LABELS[condition]} based on this patient profile:

${JSON.stringify(deidentifyRecord(record), null, 2)}

Include specific, actionable recommendations for:
1. Lifestyle modifications
2. Monitoring parameters
3. When to seek medical attention
4. Evidence-based preventive measures`;
}

// ============================================================================
// CLIENT
// ============================================================================

/** Rate limited, server errors and overloaded */
const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504, 529]);

/**
 * Non-2xx answer from the Messages API
 */
export class ClaudeApiError extends ExternalServiceError {
  public readonly status: number;

  constructor(status: number, body: string) {
    super(SERVICE_NAME, `API error: ${status} - ${body}`);
    this.name = 'ClaudeApiError';
    this.status = status;
  }
}

/**
 * Whether a failed call is worth repeating
 */
export function isRetryableInsightError(error: unknown): boolean {
  if (error instanceof ClaudeApiError) {
    return RETRYABLE_STATUSES.has(error.status);
  }
  return error instanceof ExternalServiceError && error.originalError?.name === 'TimeoutError';
}

/**
 * Claude insight client
 *
 * @example
 * ```typescript
 * const client = new ClaudeInsightClient({ apiKey: env.ANTHROPIC_API_KEY });
 * const narrative = await client.generateRiskInsights({ record, results });
 * ```
 */
export class ClaudeInsightClient implements InsightGenerator {
  private readonly config: ResolvedConfig;

  constructor(config: ClaudeInsightConfig) {
    this.config = ClaudeInsightConfigSchema.parse(config);
  }

  get model(): string {
    return this.config.model;
  }

  async generateRiskInsights(request: RiskInsightRequest): Promise<string> {
    const prompt = buildRiskInsightPrompt(request.record, request.results);
    const startTime = Date.now();

    const narrative = await this.createMessage(prompt, this.config.maxTokens);

    logger.info(
      { model: this.config.model, durationMs: Date.now() - startTime, length: narrative.length },
      'Risk insights generated'
    );
    return narrative;
  }

  async generatePersonalizedRecommendations(
    record: PatientRecord,
    condition: ConditionId
  ): Promise<string> {
    const prompt = buildRecommendationPrompt(record, condition);
    return this.createMessage(prompt, Math.min(RECOMMENDATION_MAX_TOKENS, this.config.maxTokens));
  }

  private async createMessage(prompt: string, maxTokens: number): Promise<string> {
    const makeRequest = async (): Promise<string> => {
      const response = await this.post({
        model: this.config.model,
        max_tokens: maxTokens,
        temperature: this.config.temperature,
        messages: [{ role: 'user', content: prompt }],
      });

      if (!response.ok) {
        throw new ClaudeApiError(response.status, await response.text());
      }

      const parsed = MessagesResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new ExternalServiceError(SERVICE_NAME, 'Unexpected response shape from API');
      }

      const text = parsed.data.content.find((block) => block.type === 'text')?.text;
      if (!text) {
        throw new ExternalServiceError(SERVICE_NAME, 'Empty response from API');
      }

      return text;
    };

    return withRetry(makeRequest, {
      maxRetries: this.config.retryConfig.maxRetries,
      baseDelayMs: this.config.retryConfig.baseDelayMs,
      shouldRetry: (error) => {
        const retry = isRetryableInsightError(error);
        if (retry) {
          logger.warn({ err: error }, 'Retrying Claude request');
        }
        return retry;
      },
    });
  }

  private async post(body: Record<string, unknown>): Promise<Response> {
    try {
      return await fetch(ANTHROPIC_MESSAGES_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-api-key': this.config.apiKey,
          'anthropic-version': ANTHROPIC_VERSION,
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        throw new ExternalServiceError(
          SERVICE_NAME,
          `request timeout after ${this.config.timeoutMs}ms`,
          error
        );
      }
      throw new ExternalServiceError(
        SERVICE_NAME,
        `request failed: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined
      );
    }
  }
}

/**
 * Factory function
 */
export function createClaudeInsightClient(config: ClaudeInsightConfig): ClaudeInsightClient {
  return new ClaudeInsightClient(config);
}

/**
 * Insight generator for the configured environment, or null when insights
 * are switched off
 */
export function createInsightGenerator(
  env: Pick<
    AppEnv,
    | 'AI_INSIGHTS_ENABLED'
    | 'ANTHROPIC_API_KEY'
    | 'ANTHROPIC_MODEL'
    | 'INSIGHT_MAX_TOKENS'
    | 'INSIGHT_TEMPERATURE'
    | 'INSIGHT_TIMEOUT_MS'
  >
): ClaudeInsightClient | null {
  if (!env.AI_INSIGHTS_ENABLED || !env.ANTHROPIC_API_KEY) {
    return null;
  }

  return new ClaudeInsightClient({
    apiKey: env.ANTHROPIC_API_KEY,
    model: env.ANTHROPIC_MODEL,
    maxTokens: env.INSIGHT_MAX_TOKENS,
    temperature: env.INSIGHT_TEMPERATURE,
    timeoutMs: env.INSIGHT_TIMEOUT_MS,
  });
}
