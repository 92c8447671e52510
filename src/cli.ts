/**
 * Command-line interface
 *
 * Runs the orchestrator on one goal with the default workers and prints
 * the results as JSON (or writes them to a file).
 *
 * Usage:
 *   task-orchestrator "Plan a marketing campaign for a water bottle"
 *   task-orchestrator "..." --model gpt-4o --output results.json
 *   task-orchestrator "..." --mock --verbose     # scripted client, no API key
 */

import { Command } from 'commander';
import { promises as fs } from 'fs';
import { homedir } from 'os';
import path from 'path';
import { ConfigurationError, OrchestratorError, errorMessage } from '../core/errors.js';
import type { LLMClient } from '../core/types.js';
import { loadConfig, type AppConfig } from './config.js';
import { createClient, isScenarioName } from './llm/index.js';
import { Orchestrator } from './orchestration/index.js';
import { EventStore } from './state/index.js';
import { createDefaultWorkers } from './workers/index.js';

export const VERSION = '1.0.0';

interface CliOptions {
  apiKey?: string;
  model?: string;
  output?: string;
  verbose?: boolean;
  mock?: string | boolean;
}

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  createLLMClient?: (config: AppConfig) => LLMClient;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

export function expandHome(filePath: string): string {
  return path.resolve(filePath.replace(/^~(?=$|[\\/])/, homedir()));
}

export function formatCliError(error: unknown): string {
  if (error instanceof OrchestratorError) {
    return `Error [${error.code}]: ${error.message}`;
  }
  return `Error: ${errorMessage(error)}`;
}

function applyMockOption(config: AppConfig, mock: CliOptions['mock']): AppConfig {
  let resolved = config;
  if (mock !== undefined && mock !== false) {
    const scenario = mock === true ? 'campaign' : mock;
    if (!isScenarioName(scenario)) {
      throw new ConfigurationError(`Unknown mock scenario: "${scenario}"`);
    }
    resolved = { ...config, mockScenario: scenario };
  }
  // The scripted client needs no real key, whether --mock or USE_MOCK chose it
  if (resolved.mockScenario && !resolved.apiKey) {
    resolved = { ...resolved, apiKey: 'mock-key' };
  }
  return resolved;
}

export function createProgram(deps: CliDependencies = {}): Command {
  const {
    env = process.env,
    createLLMClient = createClient,
    stdout = (text: string) => console.log(text),
    stderr = (text: string) => console.error(text),
  } = deps;

  const program = new Command();
  program
    .name('task-orchestrator')
    .description('Decompose a goal into subtasks and delegate them to specialized workers')
    .version(VERSION)
    .argument('<goal>', 'the high-level goal to decompose and delegate')
    .option('--api-key <key>', 'explicit API key (defaults to OPENAI_API_KEY)')
    .option('--model <model>', 'model for planning and workers (defaults to ORCHESTRATOR_MODEL or gpt-4)')
    .option('--output <path>', 'write the JSON results to a file instead of stdout')
    .option('--verbose', 'log planning and dispatch to stderr')
    .option('--mock [scenario]', 'use the scripted mock client (campaign, research)')
    .action(async (goal: string, opts: CliOptions) => {
      const config = applyMockOption(loadConfig(env), opts.mock);
      const llm = createLLMClient(config);
      const model = opts.model ?? config.model;
      const verbose = opts.verbose ?? false;

      const eventStore = new EventStore();
      const workers = createDefaultWorkers(llm, { model, defaultCredential: config.apiKey });
      const orchestrator = new Orchestrator(workers, llm, {
        model,
        planningTemperature: config.planningTemperature,
        workerTemperature: config.workerTemperature,
        defaultCredential: config.apiKey,
        verbose,
        logger: stderr,
        eventStore,
      });

      try {
        const results = await orchestrator.run(goal, { credential: opts.apiKey });
        const serialized = JSON.stringify(results, null, 2);

        if (opts.output) {
          const outputPath = expandHome(opts.output);
          await fs.writeFile(outputPath, serialized, 'utf-8');
          stdout(`Results written to ${outputPath}`);
        } else {
          stdout(serialized);
        }
      } finally {
        if (verbose) {
          stderr(eventStore.getSummary());
        }
      }
    });

  return program;
}
