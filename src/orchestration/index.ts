/**
 * Orchestration Module
 *
 * Exports the orchestrator that plans a goal and dispatches it to workers.
 */

export { Orchestrator, type OrchestratorOptions } from './orchestrator.js';
