/**
 * LLM Client Module
 *
 * Exports both real (OpenAI) and mock clients.
 * Use mock for testing, OpenAI for production.
 */

export { OpenAIClient, createOpenAIClient } from './openai-client.js';
export type { OpenAIClientConfig } from './openai-client.js';
export {
  MockLLMClient,
  createMockClient,
  completionPayload,
  isScenarioName,
  SCENARIOS,
} from './mock-client.js';
export type { MockResponse, MockScenario, ScenarioName } from './mock-client.js';

import type { LLMClient } from '../../core/types.js';
import type { AppConfig } from '../config.js';
import { createOpenAIClient } from './openai-client.js';
import { createMockClient } from './mock-client.js';

/**
 * Create an LLM client based on configuration
 *
 * - mockScenario set (USE_MOCK=true): scripted mock client
 * - Otherwise: OpenAI client
 */
export function createClient(
  config: Pick<AppConfig, 'mockScenario' | 'baseURL' | 'timeoutMs'>
): LLMClient {
  if (config.mockScenario) {
    return createMockClient(config.mockScenario);
  }
  return createOpenAIClient({ baseURL: config.baseURL, timeoutMs: config.timeoutMs });
}
