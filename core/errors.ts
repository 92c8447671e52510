/**
 * Error Taxonomy
 *
 * Every failure of a run surfaces as one of these. None of them is retried
 * or recovered from inside the orchestrator.
 */

export type OrchestratorErrorCode =
  | 'CONFIGURATION'
  | 'SERVICE'
  | 'MALFORMED_RESPONSE'
  | 'PLANNING'
  | 'UNKNOWN_WORKER';

export abstract class OrchestratorError extends Error {
  abstract readonly code: OrchestratorErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Missing or unusable credential, or an invalid configuration value.
 */
export class ConfigurationError extends OrchestratorError {
  readonly code: OrchestratorErrorCode = 'CONFIGURATION';
}

/**
 * The generation service call failed.
 *
 * `component` names whoever made the call (a worker name, or "Orchestrator").
 */
export class ServiceError extends OrchestratorError {
  readonly code: OrchestratorErrorCode = 'SERVICE';
  readonly component: string;

  constructor(component: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.component = component;
  }
}

/**
 * The service answered, but not with text at choices[0].message.content.
 */
export class MalformedResponseError extends ServiceError {
  override readonly code: OrchestratorErrorCode = 'MALFORMED_RESPONSE';
}

/**
 * The plan could not be obtained or decoded.
 *
 * `rawResponse` is the planner's text as received; empty when the call
 * itself failed.
 */
export class PlanningError extends OrchestratorError {
  readonly code: OrchestratorErrorCode = 'PLANNING';
  readonly rawResponse: string;

  constructor(message: string, rawResponse: string, options?: { cause?: unknown }) {
    super(rawResponse ? `${message}. Raw response: ${rawResponse}` : message, options);
    this.rawResponse = rawResponse;
  }
}

export class UnknownWorkerError extends OrchestratorError {
  readonly code: OrchestratorErrorCode = 'UNKNOWN_WORKER';
  readonly workerName: string;
  readonly availableWorkers: string[];

  constructor(workerName: string, availableWorkers: string[]) {
    super(
      `Unknown worker "${workerName}" in plan. Available workers: ${availableWorkers.join(', ')}`
    );
    this.workerName = workerName;
    this.availableWorkers = availableWorkers;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error && error.message) return error.message;
  return String(error);
}
