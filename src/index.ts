/**
 * Task Orchestrator - library entry point
 *
 * Usage:
 *   const llm = createClient(loadConfig());
 *   const workers = createDefaultWorkers(llm, { defaultCredential: key });
 *   const results = await new Orchestrator(workers, llm, { defaultCredential: key }).run(goal);
 */

export * from '../core/index.js';
export * from './llm/index.js';
export * from './workers/index.js';
export * from './planning/index.js';
export * from './orchestration/index.js';
export * from './state/index.js';
export {
  loadConfig,
  loadEnvFiles,
  DEFAULT_MODEL,
  DEFAULT_PLANNING_TEMPERATURE,
  DEFAULT_WORKER_TEMPERATURE,
  type AppConfig,
} from './config.js';
