import { http, HttpResponse } from 'msw';

/**
 * MSW Handlers for External Service Mocks
 * Used in tests to mock the Anthropic Messages API
 */

export const ANTHROPIC_MESSAGES_URL = 'https://api.anthropic.com/v1/messages';

// =============================================================================
// Test Fixtures
// =============================================================================

export const testFixtures = {
  insights: {
    narrative:
      'Elevated HbA1c and blood pressure compound cardiovascular risk. Prioritise glucose control and reassess in 3 months.',
    recommendations: 'Walk 30 minutes daily and recheck HbA1c in 3 months.',
  },
};

// =============================================================================
// Anthropic API Mocks
// =============================================================================

const anthropicHandlers = [
  http.post(ANTHROPIC_MESSAGES_URL, ({ request }) => {
    if (!request.headers.get('x-api-key')) {
      return HttpResponse.json(
        { type: 'error', error: { type: 'authentication_error', message: 'missing api key' } },
        { status: 401 }
      );
    }

    return HttpResponse.json({
      id: 'msg_test_001',
      type: 'message',
      role: 'assistant',
      model: 'claude-sonnet-4-20250514',
      content: [{ type: 'text', text: testFixtures.insights.narrative }],
      stop_reason: 'end_turn',
      usage: { input_tokens: 420, output_tokens: 64 },
    });
  }),
];

// =============================================================================
// Failure helpers
// =============================================================================

/**
 * Creates a handler that answers 429 twice, then succeeds
 */
export function createRateLimitedHandler(url: string, method: 'get' | 'post' = 'post') {
  let callCount = 0;
  return http[method](url, () => {
    callCount++;
    if (callCount <= 2) {
      return HttpResponse.json(
        { type: 'error', error: { type: 'rate_limit_error', message: 'rate limited' } },
        { status: 429 }
      );
    }
    return HttpResponse.json({ content: [{ type: 'text', text: testFixtures.insights.narrative }] });
  });
}

/**
 * Creates a handler that fails N times then succeeds
 */
export function createFailingHandler(
  url: string,
  method: 'get' | 'post' = 'post',
  failCount = 2,
  errorStatus = 503
) {
  let callCount = 0;
  return http[method](url, () => {
    callCount++;
    if (callCount <= failCount) {
      return new HttpResponse(null, { status: errorStatus });
    }
    return HttpResponse.json({ content: [{ type: 'text', text: testFixtures.insights.narrative }] });
  });
}

export const handlers = [...anthropicHandlers];
