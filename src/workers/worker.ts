/**
 * Worker - a named, fixed-persona text transformer.
 *
 * A worker holds no state beyond its configuration. Each `execute` call is
 * one system + user request to the generation service; the reply is the
 * worker's output. Workers cannot delegate to other workers.
 */

import { ConfigurationError } from '../../core/errors.js';
import { requestCompletion, resolveCredential } from '../../core/completion.js';
import type { ExecuteOptions, LLMClient, Message, WorkerAgent } from '../../core/types.js';
import { DEFAULT_MODEL, DEFAULT_WORKER_TEMPERATURE } from '../config.js';

export interface WorkerConfig {
  name: string;
  roleDescription: string;
  /** Model selector. Default: gpt-4 */
  model?: string;
  /** Credential used when `execute` is not given one */
  defaultCredential?: string;
}

export class Worker implements WorkerAgent {
  readonly name: string;
  readonly roleDescription: string;
  readonly model: string;
  private readonly llm: LLMClient;
  private readonly defaultCredential?: string;

  constructor(config: WorkerConfig, llm: LLMClient) {
    const name = config.name.trim();
    if (!name) {
      throw new ConfigurationError('Worker name must not be empty');
    }
    this.name = name;
    this.roleDescription = config.roleDescription;
    this.model = config.model ?? DEFAULT_MODEL;
    this.defaultCredential = config.defaultCredential;
    this.llm = llm;
  }

  async execute(instruction: string, options: ExecuteOptions = {}): Promise<string> {
    const { temperature = DEFAULT_WORKER_TEMPERATURE, credential } = options;
    const apiKey = resolveCredential(credential, this.defaultCredential, this.name);

    const messages: Message[] = [
      { role: 'system', content: this.roleDescription },
      { role: 'user', content: instruction },
    ];

    return requestCompletion(
      this.llm,
      { model: this.model, messages, temperature, apiKey },
      this.name
    );
  }
}
