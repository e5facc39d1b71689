import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../errors.js';
import { validateEnv } from '../env.js';

describe('validateEnv', () => {
  it('should apply defaults to an empty environment', () => {
    expect(validateEnv({})).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      AI_INSIGHTS_ENABLED: false,
      ANTHROPIC_MODEL: 'claude-sonnet-4-20250514',
      INSIGHT_MAX_TOKENS: 1000,
      INSIGHT_TEMPERATURE: 0.1,
      INSIGHT_TIMEOUT_MS: 30000,
    });
  });

  it('should coerce numeric settings', () => {
    const env = validateEnv({
      AI_INSIGHTS_ENABLED: 'true',
      ANTHROPIC_API_KEY: 'test-key',
      INSIGHT_MAX_TOKENS: '500',
      INSIGHT_TEMPERATURE: '0.4',
    });

    expect(env.AI_INSIGHTS_ENABLED).toBe(true);
    expect(env.INSIGHT_MAX_TOKENS).toBe(500);
    expect(env.INSIGHT_TEMPERATURE).toBe(0.4);
  });

  it('should require an API key when insights are enabled', () => {
    expect(() => validateEnv({ AI_INSIGHTS_ENABLED: 'true' })).toThrow(
      'Environment validation failed:\n  ANTHROPIC_API_KEY: Anthropic API key is required when AI insights are enabled'
    );
  });

  it('should report every invalid field', () => {
    try {
      validateEnv({ LOG_LEVEL: 'verbose', INSIGHT_TEMPERATURE: '2' });
      expect.unreachable('expected a ConfigurationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(Object.keys(error.fields).sort()).toEqual(['INSIGHT_TEMPERATURE', 'LOG_LEVEL']);
      }
    }
  });
});
