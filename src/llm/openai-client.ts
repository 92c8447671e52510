/**
 * OpenAI LLM Client
 *
 * Uses the OpenAI SDK against any OpenAI-compatible chat-completions endpoint.
 * The credential travels with each request, so one SDK client is kept per key.
 */

import OpenAI from 'openai';
import type { CompletionRequest, LLMClient, Message } from '../../core/types.js';

export interface OpenAIClientConfig {
  baseURL?: string;
  /** Per-request timeout in milliseconds. SDK default when omitted. */
  timeoutMs?: number;
}

export class OpenAIClient implements LLMClient {
  private clients: Map<string, OpenAI> = new Map();
  private config: OpenAIClientConfig;

  constructor(config: OpenAIClientConfig = {}) {
    this.config = config;
  }

  async invoke(request: CompletionRequest): Promise<OpenAI.ChatCompletion> {
    return this.clientFor(request.apiKey).chat.completions.create({
      model: request.model,
      messages: request.messages.map((msg) => this.convertMessage(msg)),
      temperature: request.temperature,
    });
  }

  private clientFor(apiKey: string): OpenAI {
    let client = this.clients.get(apiKey);
    if (!client) {
      client = new OpenAI({
        apiKey,
        baseURL: this.config.baseURL,
        timeout: this.config.timeoutMs,
        // Failures surface to the caller on the first attempt
        maxRetries: 0,
      });
      this.clients.set(apiKey, client);
    }
    return client;
  }

  private convertMessage(msg: Message): OpenAI.ChatCompletionMessageParam {
    if (msg.role === 'system') {
      return { role: 'system', content: msg.content };
    }
    return { role: 'user', content: msg.content };
  }
}

export function createOpenAIClient(config: OpenAIClientConfig = {}): OpenAIClient {
  return new OpenAIClient(config);
}
