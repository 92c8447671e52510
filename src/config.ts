/**
 * Configuration
 *
 * Everything read from the environment is read here, once, at startup.
 * The resulting values are passed down explicitly; nothing deeper in the
 * call path looks at process.env.
 *
 * Variables:
 *   OPENAI_API_KEY                      default credential (optional)
 *   OPENAI_BASE_URL                     OpenAI-compatible endpoint (optional)
 *   ORCHESTRATOR_MODEL                  model for planning and workers (gpt-4)
 *   ORCHESTRATOR_PLANNING_TEMPERATURE   0..1 (0.3)
 *   ORCHESTRATOR_WORKER_TEMPERATURE     0..1 (0.7)
 *   ORCHESTRATOR_TIMEOUT_MS             request timeout (optional)
 *   USE_MOCK / MOCK_SCENARIO            scripted offline client
 */

import { config as loadDotenv } from 'dotenv';
import { ConfigurationError } from '../core/errors.js';
import { isScenarioName, type ScenarioName } from './llm/mock-client.js';

export const DEFAULT_MODEL = 'gpt-4';
export const DEFAULT_PLANNING_TEMPERATURE = 0.3;
export const DEFAULT_WORKER_TEMPERATURE = 0.7;

export interface AppConfig {
  apiKey?: string;
  baseURL?: string;
  model: string;
  planningTemperature: number;
  workerTemperature: number;
  timeoutMs?: number;
  /** Set when the scripted mock client should be used */
  mockScenario?: ScenarioName;
}

/**
 * Load .env, then .env.local. Existing process variables are never overridden.
 */
export function loadEnvFiles(): void {
  loadDotenv();
  loadDotenv({ path: '.env.local' });
}

function optional(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function temperature(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = optional(env, key);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (Number.isNaN(parsed) || parsed < 0 || parsed > 1) {
    throw new ConfigurationError(
      `Invalid value for ${key}: "${raw}" (expected a number between 0 and 1)`
    );
  }
  return parsed;
}

function positiveInt(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = optional(env, key);
  if (raw === undefined) return undefined;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(
      `Invalid value for ${key}: "${raw}" (expected a positive integer)`
    );
  }
  return parsed;
}

function mockScenario(env: NodeJS.ProcessEnv): ScenarioName | undefined {
  if (env.USE_MOCK !== 'true') return undefined;
  const name = optional(env, 'MOCK_SCENARIO') ?? 'campaign';
  if (!isScenarioName(name)) {
    throw new ConfigurationError(`Unknown MOCK_SCENARIO: "${name}"`);
  }
  return name;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    apiKey: optional(env, 'OPENAI_API_KEY'),
    baseURL: optional(env, 'OPENAI_BASE_URL'),
    model: optional(env, 'ORCHESTRATOR_MODEL') ?? DEFAULT_MODEL,
    planningTemperature: temperature(
      env,
      'ORCHESTRATOR_PLANNING_TEMPERATURE',
      DEFAULT_PLANNING_TEMPERATURE
    ),
    workerTemperature: temperature(
      env,
      'ORCHESTRATOR_WORKER_TEMPERATURE',
      DEFAULT_WORKER_TEMPERATURE
    ),
    timeoutMs: positiveInt(env, 'ORCHESTRATOR_TIMEOUT_MS'),
    mockScenario: mockScenario(env),
  };
}
