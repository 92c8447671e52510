/**
 * Mock LLM Client for Deterministic Testing
 *
 * Returns scripted responses, one per call, in order.
 * Useful for:
 * - Unit testing without API calls
 * - Demonstrating the plan → dispatch flow offline
 * - Reproducing malformed responses and service failures
 */

import type { CompletionRequest, LLMClient } from '../../core/types.js';

/**
 * One scripted answer:
 * - `content`: wrapped in a well-formed chat-completion payload
 * - `payload`: returned as-is (for malformed shapes)
 * - `error`: thrown from `invoke`
 */
export type MockResponse =
  | { content: string }
  | { payload: unknown }
  | { error: Error };

export type MockScenario = MockResponse[];

/**
 * Pre-defined scenarios for offline runs
 */
export const SCENARIOS = {
  /**
   * Product launch campaign
   * 1. Planner assigns research, copy and ad concepts
   * 2-4. One answer per worker
   */
  campaign: [
    {
      content: [
        '```json',
        JSON.stringify(
          [
            { agent: 'ResearchAgent', task: 'Summarize the market for reusable water bottles' },
            { agent: 'CopywritingAgent', task: 'Write a product description for the launch page' },
            { agent: 'AdDesignAgent', task: 'Propose three campaign slogans' },
          ],
          null,
          2
        ),
        '```',
      ].join('\n'),
    },
    {
      content:
        'Reusable bottles are a growing segment driven by sustainability concerns. ' +
        'Key buyers are commuters and gym-goers; insulation and weight matter most.',
    },
    {
      content:
        'Meet the bottle that keeps up with you: cold for 24 hours, light enough to forget ' +
        "it's there. Order yours today.",
    },
    {
      content: '1. Refill the planet.\n2. Cold drinks, warm conscience.\n3. Carry less, live more.',
    },
  ] as MockScenario,

  /**
   * Single research step
   */
  research: [
    {
      content: JSON.stringify([
        { agent: 'ResearchAgent', task: 'Summarize the topic' },
      ]),
    },
    {
      content: 'A short summary of the topic with the main considerations.',
    },
  ] as MockScenario,
} as const;

export type ScenarioName = keyof typeof SCENARIOS;

export function isScenarioName(name: string): name is ScenarioName {
  return Object.prototype.hasOwnProperty.call(SCENARIOS, name);
}

/**
 * Wrap text in the chat-completion shape the real service returns.
 */
export function completionPayload(content: string) {
  return {
    id: 'mock-completion',
    object: 'chat.completion',
    choices: [
      {
        index: 0,
        finish_reason: 'stop',
        message: { role: 'assistant', content },
      },
    ],
  };
}

export class MockLLMClient implements LLMClient {
  private scenario: MockScenario;
  private step: number = 0;
  private callLog: CompletionRequest[] = [];

  constructor(scenario: MockScenario = SCENARIOS.campaign) {
    this.scenario = scenario;
  }

  async invoke(request: CompletionRequest): Promise<unknown> {
    this.callLog.push({ ...request, messages: [...request.messages] });

    if (this.step >= this.scenario.length) {
      throw new Error(`Mock scenario exhausted after ${this.scenario.length} responses`);
    }

    const response = this.scenario[this.step];
    this.step++;

    if ('error' in response) {
      throw response.error;
    }
    if ('payload' in response) {
      return response.payload;
    }
    return completionPayload(response.content);
  }

  /**
   * Get the log of all requests, in call order
   */
  getCallLog(): CompletionRequest[] {
    return [...this.callLog];
  }

  /**
   * Reset the mock to start over
   */
  reset(): void {
    this.step = 0;
    this.callLog = [];
  }

  /**
   * Set a new scenario
   */
  setScenario(scenario: MockScenario): void {
    this.scenario = scenario;
    this.reset();
  }
}

export function createMockClient(scenarioName: ScenarioName = 'campaign'): MockLLMClient {
  return new MockLLMClient(SCENARIOS[scenarioName]);
}
