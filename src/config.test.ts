import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  DEFAULT_API_URL,
  DEFAULT_MODEL_SETTINGS,
  loadAssistantConfig,
  validateConfig
} from './config.js';

const REQUIRED = { OPENROUTER_API_KEY: 'test-secret', ASSISTANT_MODEL: 'test/model' };

describe('loadAssistantConfig', () => {
  it('applies defaults for everything optional', () => {
    const config = loadAssistantConfig(REQUIRED);

    expect(config.apiKey).toBe('test-secret');
    expect(config.model).toBe('test/model');
    expect(config.apiUrl).toBe(DEFAULT_API_URL);
    expect(config.defaults).toEqual(DEFAULT_MODEL_SETTINGS);
    expect(config.concurrencyLimit).toBe(3);
    expect(config.reasoningScaffold).toBe(false);
    expect(config.server).toEqual({ port: 3000, apiToken: undefined });
    expect(config.debug).toBe(false);
  });

  it('reads overrides', () => {
    const config = loadAssistantConfig({
      ...REQUIRED,
      MODEL_API_URL: 'https://models.test/v1/chat/completions',
      MODEL_TEMPERATURE: '0.3',
      MODEL_MAX_TOKENS: '2048',
      MODEL_TIMEOUT_MS: '15000',
      MODEL_MAX_RETRIES: '0',
      ASSISTANT_CONCURRENCY_LIMIT: '5',
      REASONING_SCAFFOLD: 'true',
      PORT: '8080',
      ASSISTANT_API_TOKEN: 'test-token',
      ASSISTANT_DEBUG: '1'
    });

    expect(config.apiUrl).toBe('https://models.test/v1/chat/completions');
    expect(config.defaults).toMatchObject({ temperature: 0.3, maxTokens: 2048, timeoutMs: 15000, maxRetries: 0 });
    expect(config.concurrencyLimit).toBe(5);
    expect(config.reasoningScaffold).toBe(true);
    expect(config.server).toEqual({ port: 8080, apiToken: 'test-token' });
    expect(config.debug).toBe(true);
  });

  it('falls back on unparseable numbers', () => {
    const config = loadAssistantConfig({ ...REQUIRED, MODEL_TIMEOUT_MS: 'soon', ASSISTANT_CONCURRENCY_LIMIT: '0' });
    expect(config.defaults.timeoutMs).toBe(60000);
    expect(config.concurrencyLimit).toBe(3);
  });

  it('has no default model', () => {
    expect(() => loadAssistantConfig({ OPENROUTER_API_KEY: 'test-secret' })).toThrow(ConfigurationError);
    expect(() => loadAssistantConfig({ OPENROUTER_API_KEY: 'test-secret' }))
      .toThrow('Missing required configuration: ASSISTANT_MODEL.');
  });

  it('lists every missing variable', () => {
    expect(() => loadAssistantConfig({}))
      .toThrow('Missing required configuration: OPENROUTER_API_KEY, ASSISTANT_MODEL.');
  });
});

describe('validateConfig', () => {
  it('accepts a complete environment', () => {
    expect(validateConfig(REQUIRED)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('reports errors and warnings without throwing', () => {
    const result = validateConfig({ ASSISTANT_MODEL: 'test/model', MODEL_TIMEOUT_MS: '-5', MODEL_TEMPERATURE: 'warm' });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['OPENROUTER_API_KEY is required']);
    expect(result.warnings).toEqual([
      'MODEL_TIMEOUT_MS="-5" is not a positive integer; using 60000',
      'MODEL_TEMPERATURE="warm" is not a number; using 0.1'
    ]);
  });
});
