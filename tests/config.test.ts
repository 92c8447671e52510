import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../core/errors.js';
import { loadConfig } from '../src/config.js';
import { MockLLMClient, OpenAIClient, createClient } from '../src/llm/index.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      apiKey: undefined,
      baseURL: undefined,
      model: 'gpt-4',
      planningTemperature: 0.3,
      workerTemperature: 0.7,
      timeoutMs: undefined,
      mockScenario: undefined,
    });
  });

  it('reads every variable', () => {
    const config = loadConfig({
      OPENAI_API_KEY: ' test-secret ',
      OPENAI_BASE_URL: 'http://localhost:8080/v1',
      ORCHESTRATOR_MODEL: 'gpt-4o',
      ORCHESTRATOR_PLANNING_TEMPERATURE: '0',
      ORCHESTRATOR_WORKER_TEMPERATURE: '1',
      ORCHESTRATOR_TIMEOUT_MS: '30000',
      USE_MOCK: 'true',
      MOCK_SCENARIO: 'research',
    });

    expect(config).toEqual({
      apiKey: 'test-secret',
      baseURL: 'http://localhost:8080/v1',
      model: 'gpt-4o',
      planningTemperature: 0,
      workerTemperature: 1,
      timeoutMs: 30000,
      mockScenario: 'research',
    });
  });

  it('treats a blank API key as missing', () => {
    expect(loadConfig({ OPENAI_API_KEY: '   ' }).apiKey).toBeUndefined();
  });

  it('defaults the mock scenario to campaign', () => {
    expect(loadConfig({ USE_MOCK: 'true' }).mockScenario).toBe('campaign');
  });

  it.each([
    ['ORCHESTRATOR_PLANNING_TEMPERATURE', '1.5'],
    ['ORCHESTRATOR_WORKER_TEMPERATURE', 'warm'],
    ['ORCHESTRATOR_TIMEOUT_MS', '0'],
    ['ORCHESTRATOR_TIMEOUT_MS', '12.5'],
  ])('rejects %s=%s', (key, value) => {
    expect(() => loadConfig({ [key]: value })).toThrow(ConfigurationError);
    expect(() => loadConfig({ [key]: value })).toThrow(key);
  });

  it('rejects an unknown mock scenario', () => {
    expect(() => loadConfig({ USE_MOCK: 'true', MOCK_SCENARIO: 'nope' })).toThrow(
      'Unknown MOCK_SCENARIO: "nope"'
    );
  });
});

describe('createClient', () => {
  it('returns the mock client when a scenario is configured', () => {
    expect(createClient({ mockScenario: 'campaign' })).toBeInstanceOf(MockLLMClient);
  });

  it('returns the OpenAI client otherwise', () => {
    expect(createClient({})).toBeInstanceOf(OpenAIClient);
  });
});
