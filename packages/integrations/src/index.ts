/**
 * @vitalrisk/integrations
 *
 * Third-party service clients for the risk assessment engine.
 */

export {
  ClaudeInsightClient,
  ClaudeApiError,
  createClaudeInsightClient,
  createInsightGenerator,
  buildRiskInsightPrompt,
  buildRecommendationPrompt,
  deidentifyRecord,
  isRetryableInsightError,
  type ClaudeInsightConfig,
} from './claude-insights.js';
