/**
 * Orchestrator - Plan, Dispatch, Aggregate
 *
 * One orchestrator owns a registry of workers. For a goal it:
 * 1. PLAN     - asks the generation service to split the goal into
 *               {agent, task} pairs
 * 2. DISPATCH - runs each pair, in order, on the named worker
 * 3. COLLECT  - maps each worker's declared name to its output
 *
 * The pipeline is strictly sequential. The first error anywhere ends the
 * run and is rethrown; a partially filled result is never returned.
 */

import { OrchestratorError, PlanningError, ServiceError, UnknownWorkerError, errorMessage } from '../../core/errors.js';
import { requestCompletion, resolveCredential } from '../../core/completion.js';
import type { LLMClient, Plan, ResultMap, RunOptions, WorkerAgent } from '../../core/types.js';
import { DEFAULT_MODEL, DEFAULT_PLANNING_TEMPERATURE, DEFAULT_WORKER_TEMPERATURE } from '../config.js';
import { parsePlan } from '../planning/plan-parser.js';
import { buildPlanningMessages, composeInstruction } from '../planning/prompts.js';
import type { EventStore } from '../state/index.js';

const COMPONENT = 'Orchestrator';

// =============================================================================
// OPTIONS
// =============================================================================

export interface OrchestratorOptions {
  /** Model used for planning. Default: gpt-4 */
  model?: string;

  /** Temperature for the planning call. Default: 0.3 */
  planningTemperature?: number;

  /** Temperature passed to every worker. Default: 0.7 */
  workerTemperature?: number;

  /** Credential used when `plan`/`run` are not given one */
  defaultCredential?: string;

  /** Enable verbose logging of planning and dispatch. */
  verbose?: boolean;

  /** Custom logging function. Defaults to console.log. */
  logger?: (message: string) => void;

  /** Audit trail for each run. */
  eventStore?: EventStore;
}

// =============================================================================
// ORCHESTRATOR
// =============================================================================

export class Orchestrator {
  private workers: Map<string, WorkerAgent> = new Map();
  private llm: LLMClient;
  private model: string;
  private planningTemperature: number;
  private workerTemperature: number;
  private defaultCredential?: string;
  private eventStore?: EventStore;
  private log: (message: string) => void;

  constructor(workers: WorkerAgent[], llm: LLMClient, options: OrchestratorOptions = {}) {
    const {
      model = DEFAULT_MODEL,
      planningTemperature = DEFAULT_PLANNING_TEMPERATURE,
      workerTemperature = DEFAULT_WORKER_TEMPERATURE,
      defaultCredential,
      verbose = false,
      logger = console.log,
      eventStore,
    } = options;

    this.llm = llm;
    this.model = model;
    this.planningTemperature = planningTemperature;
    this.workerTemperature = workerTemperature;
    this.defaultCredential = defaultCredential;
    this.eventStore = eventStore;
    this.log = (msg: string) => {
      if (verbose) logger(msg);
    };

    // Last registration wins on a (case-insensitive) name clash
    for (const worker of workers) {
      const key = normalizeName(worker.name);
      const existing = this.workers.get(key);
      if (existing) {
        this.log(`Worker "${worker.name}" replaces previously registered "${existing.name}"`);
      }
      this.workers.set(key, worker);
    }
  }

  /**
   * Registered worker names, as declared, in registration order.
   */
  get workerNames(): string[] {
    return Array.from(this.workers.values(), (w) => w.name);
  }

  /**
   * Case-insensitive lookup.
   */
  getWorker(name: string): WorkerAgent | undefined {
    return this.workers.get(normalizeName(name));
  }

  /**
   * Ask the generation service for a plan and parse it.
   *
   * Unknown worker names are not rejected here; that happens at dispatch.
   */
  async plan(goal: string, options: RunOptions = {}): Promise<Plan> {
    const apiKey = resolveCredential(options.credential, this.defaultCredential, COMPONENT);
    const messages = buildPlanningMessages(goal, this.workers.values());

    this.log(`Planning goal: ${goal.substring(0, 100)}`);

    let text: string;
    try {
      text = await requestCompletion(
        this.llm,
        { model: this.model, messages, temperature: this.planningTemperature, apiKey },
        COMPONENT
      );
    } catch (error) {
      if (error instanceof ServiceError) {
        throw new PlanningError(`Orchestrator planning failed: ${error.message}`, '', {
          cause: error,
        });
      }
      throw error;
    }

    const plan = parsePlan(text);
    this.log(`Plan has ${plan.length} step(s)`);
    return plan;
  }

  /**
   * Full orchestration: Plan → Dispatch → Collect
   */
  async run(goal: string, options: RunOptions = {}): Promise<ResultMap> {
    const startTime = Date.now();
    this.eventStore?.append({ type: 'run_started', goal, workers: this.workerNames });

    try {
      const plan = await this.plan(goal, options);
      this.eventStore?.append({ type: 'plan_created', steps: plan });

      const results = new Map<string, string>();

      for (const [index, item] of plan.entries()) {
        const step = index + 1;
        const worker = this.getWorker(item.agent);
        if (!worker) {
          throw new UnknownWorkerError(item.agent, this.workerNames);
        }

        this.log(`  → [${step}/${plan.length}] ${worker.name}: ${item.task}`);
        this.eventStore?.append({
          type: 'worker_called',
          step,
          worker: worker.name,
          task: item.task,
        });

        const stepStart = Date.now();
        const output = await worker.execute(composeInstruction(item.task, goal), {
          temperature: this.workerTemperature,
          credential: options.credential,
        });
        const trimmed = output.trim();

        this.eventStore?.append({
          type: 'worker_result',
          step,
          worker: worker.name,
          output: trimmed.substring(0, 500),
          durationMs: Date.now() - stepStart,
        });

        const preview = trimmed.length > 100 ? trimmed.substring(0, 100) + '...' : trimmed;
        this.log(`  ← ${preview.split('\n')[0]}`);

        results.set(worker.name, trimmed);
      }

      this.eventStore?.append({
        type: 'run_completed',
        workers: Array.from(results.keys()),
        totalSteps: plan.length,
        totalDurationMs: Date.now() - startTime,
      });
      this.log(`Run completed: ${results.size} worker result(s)`);

      return Object.fromEntries(results);
    } catch (error) {
      this.eventStore?.append({
        type: 'error_occurred',
        error: errorMessage(error),
        code: error instanceof OrchestratorError ? error.code : undefined,
      });
      throw error;
    }
  }
}

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}
