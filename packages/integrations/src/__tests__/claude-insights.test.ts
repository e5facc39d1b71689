/**
 * @fileoverview Tests for the Claude risk insight client
 */

import { describe, it, expect } from 'vitest';
import { http, HttpResponse } from 'msw';
import {
  calculateAllRisks,
  createPatientRecord,
  type PatientRecord,
  type PatientRecordInput,
} from '@vitalrisk/domain';
import { ExternalServiceError, createRiskAssessmentEngine } from '@vitalrisk/core';

import {
  ClaudeApiError,
  ClaudeInsightClient,
  buildRiskInsightPrompt,
  createInsightGenerator,
  deidentifyRecord,
  isRetryableInsightError,
} from '../claude-insights.js';
import {
  server,
  testFixtures,
  ANTHROPIC_MESSAGES_URL,
  createFailingHandler,
  createRateLimitedHandler,
} from '../__mocks__/setup.js';

// ============================================================================
// HELPERS
// ============================================================================

const createInput = (): PatientRecordInput => ({
  id: 'patient-001',
  name: 'Test Patient',
  age: 45,
  gender: 'Female',
  heightCm: 165,
  weightKg: 70,
  smoking: 'Never',
  alcohol: 'Occasional',
  exercise: 'Moderate',
  diet: 'Standard',
  gestationalDiabetes: false,
  depressionHistory: false,
  familyDiabetes: false,
  familyHypertension: false,
  familyCancer: 'None',
  systolicBp: 128,
  diastolicBp: 82,
  heartRate: 72,
  fastingGlucose: 95,
  hba1c: 5.7,
  totalCholesterol: 201,
  ldlCholesterol: 120,
  hdlCholesterol: 54,
});

const createRecord = (): PatientRecord => createPatientRecord(createInput());

const createClient = (overrides: { maxRetries?: number; timeoutMs?: number } = {}) =>
  new ClaudeInsightClient({
    apiKey: 'test-key',
    timeoutMs: overrides.timeoutMs ?? 5000,
    retryConfig: { maxRetries: overrides.maxRetries ?? 3, baseDelayMs: 1 },
  });

interface CapturedRequest {
  headers: Headers;
  body: unknown;
}

const captureRequests = (text = testFixtures.insights.narrative): CapturedRequest[] => {
  const captured: CapturedRequest[] = [];
  server.use(
    http.post(ANTHROPIC_MESSAGES_URL, async ({ request }) => {
      captured.push({ headers: request.headers, body: await request.json() });
      return HttpResponse.json({ content: [{ type: 'text', text }] });
    })
  );
  return captured;
};

// ============================================================================
// TESTS
// ============================================================================

describe('ClaudeInsightClient', () => {
  const record = createRecord();
  const results = calculateAllRisks(record);

  describe('generateRiskInsights', () => {
    it('should return the narrative from the first text block', async () => {
      const narrative = await createClient().generateRiskInsights({ record, results });

      expect(narrative).toBe(testFixtures.insights.narrative);
    });

    it('should send the configured model and sampling settings', async () => {
      const captured = captureRequests();

      await createClient().generateRiskInsights({ record, results });

      expect(captured).toHaveLength(1);
      expect(captured[0]?.headers.get('x-api-key')).toBe('test-key');
      expect(captured[0]?.headers.get('anthropic-version')).toBe('2023-06-01');
      expect(captured[0]?.body).toMatchObject({
        model: 'claude-sonnet-4-20250514',
        max_tokens: 1000,
        temperature: 0.1,
        messages: [{ role: 'user', content: buildRiskInsightPrompt(record, results) }],
      });
    });

    it('should retry on service unavailable', async () => {
      server.use(createFailingHandler(ANTHROPIC_MESSAGES_URL, 'post', 2, 503));

      const narrative = await createClient().generateRiskInsights({ record, results });

      expect(narrative).toBe(testFixtures.insights.narrative);
    });

    it('should retry on rate limiting', async () => {
      server.use(createRateLimitedHandler(ANTHROPIC_MESSAGES_URL));

      const narrative = await createClient().generateRiskInsights({ record, results });

      expect(narrative).toBe(testFixtures.insights.narrative);
    });

    it('should not retry a client error whose body mentions a server status', async () => {
      let calls = 0;
      server.use(
        http.post(ANTHROPIC_MESSAGES_URL, () => {
          calls++;
          return HttpResponse.json({ error: 'max_tokens must be below 500' }, { status: 400 });
        })
      );

      await expect(createClient().generateRiskInsights({ record, results })).rejects.toMatchObject({
        status: 400,
      });
      expect(calls).toBe(1);
    });

    it('should not retry client errors', async () => {
      let calls = 0;
      server.use(
        http.post(ANTHROPIC_MESSAGES_URL, () => {
          calls++;
          return HttpResponse.json({ error: 'bad request' }, { status: 400 });
        })
      );

      await expect(createClient().generateRiskInsights({ record, results })).rejects.toThrow(
        'Claude error: API error: 400 - {"error":"bad request"}'
      );
      expect(calls).toBe(1);
    });

    it('should reject responses without text', async () => {
      server.use(http.post(ANTHROPIC_MESSAGES_URL, () => HttpResponse.json({ content: [] })));

      await expect(createClient().generateRiskInsights({ record, results })).rejects.toThrow(
        'Claude error: Empty response from API'
      );
    });

    it('should reject malformed responses', async () => {
      server.use(http.post(ANTHROPIC_MESSAGES_URL, () => HttpResponse.json({ text: 'hello' })));

      await expect(createClient().generateRiskInsights({ record, results })).rejects.toThrow(
        'Claude error: Unexpected response shape from API'
      );
    });

    it('should give up after the configured retries', async () => {
      server.use(createFailingHandler(ANTHROPIC_MESSAGES_URL, 'post', 5, 500));

      await expect(
        createClient({ maxRetries: 1 }).generateRiskInsights({ record, results })
      ).rejects.toThrow(ExternalServiceError);
    });
  });

  describe('generatePersonalizedRecommendations', () => {
    it('should send a condition prompt with the de-identified profile', async () => {
      const captured = captureRequests(testFixtures.insights.recommendations);

      const text = await createClient().generatePersonalizedRecommendations(record, 'stroke');

      expect(text).toBe(testFixtures.insights.recommendations);
      expect(captured[0]?.body).toMatchObject({ max_tokens: 800 });

      const body = JSON.stringify(captured[0]?.body);
      expect(body).toContain('Provide personalized prevention recommendations for Stroke');
      expect(body).not.toContain('Test Patient');
      expect(body).not.toContain('patient-001');
    });
  });
});

describe('buildRiskInsightPrompt', () => {
  const record = createRecord();
  const prompt = buildRiskInsightPrompt(record, calculateAllRisks(record));

  it('should include the profile and one-decimal percentages', () => {
    expect(prompt).toContain('- BMI: 25.7');
    expect(prompt).toContain('- BP: 128/82 mmHg');
    expect(prompt).toContain('- Hypertension: 14.1%');
    expect(prompt).toContain('- Diabetes: 26.3%');
    expect(prompt).toContain('- Kidney Disease: 15.7%');
    expect(prompt).toContain('- Stroke: 23.0%');
    expect(prompt).toContain('- Heart Disease: 16.0%');
  });

  it('should never include identifying fields', () => {
    expect(prompt).not.toContain('Test Patient');
    expect(prompt).not.toContain('patient-001');
  });
});

describe('deidentifyRecord', () => {
  it('should drop id and name only', () => {
    const profile = deidentifyRecord(createRecord());

    expect('id' in profile).toBe(false);
    expect('name' in profile).toBe(false);
    expect(profile.age).toBe(45);
  });
});

describe('isRetryableInsightError', () => {
  it('should retry transient statuses', () => {
    expect(isRetryableInsightError(new ClaudeApiError(529, 'overloaded'))).toBe(true);
    expect(isRetryableInsightError(new ClaudeApiError(429, 'rate limited'))).toBe(true);
    expect(isRetryableInsightError(new ClaudeApiError(401, 'unauthorized'))).toBe(false);
  });

  it('should judge by status, not by the response body', () => {
    expect(isRetryableInsightError(new ClaudeApiError(400, 'max_tokens above 500 or 503'))).toBe(
      false
    );
  });

  it('should retry timeouts only among transport failures', () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';

    expect(
      isRetryableInsightError(new ExternalServiceError('Claude', 'request timeout', timeout))
    ).toBe(true);
    expect(
      isRetryableInsightError(new ExternalServiceError('Claude', 'request failed: ECONNRESET 503'))
    ).toBe(false);
    expect(isRetryableInsightError(new Error('API error: 503'))).toBe(false);
  });
});

describe('createInsightGenerator', () => {
  const baseEnv = {
    AI_INSIGHTS_ENABLED: true,
    ANTHROPIC_API_KEY: 'test-key',
    ANTHROPIC_MODEL: 'claude-sonnet-4-20250514',
    INSIGHT_MAX_TOKENS: 1000,
    INSIGHT_TEMPERATURE: 0.1,
    INSIGHT_TIMEOUT_MS: 30000,
  };

  it('should build a client when insights are enabled', () => {
    expect(createInsightGenerator(baseEnv)?.model).toBe('claude-sonnet-4-20250514');
  });

  it('should return null when insights are disabled', () => {
    expect(createInsightGenerator({ ...baseEnv, AI_INSIGHTS_ENABLED: false })).toBeNull();
  });

  it('should return null without an API key', () => {
    expect(createInsightGenerator({ ...baseEnv, ANTHROPIC_API_KEY: undefined })).toBeNull();
  });
});

describe('RiskAssessmentEngine with Claude insights', () => {
  it('should fall back to a placeholder when the API keeps failing', async () => {
    server.use(createFailingHandler(ANTHROPIC_MESSAGES_URL, 'post', 5, 500));
    const engine = createRiskAssessmentEngine({ insightGenerator: createClient({ maxRetries: 0 }) });

    const report = await engine.assess({ record: createInput() });

    expect(report.results).toEqual(calculateAllRisks(createRecord()));
    expect(report.insight).toEqual({
      status: 'unavailable',
      narrative: 'AI analysis temporarily unavailable.',
      reason: 'Claude error: API error: 500 - ',
    });
  });
});
