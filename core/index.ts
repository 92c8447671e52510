/**
 * Core contracts: types, errors and completion helpers.
 */

export type {
  Message,
  MessageRole,
  CompletionRequest,
  LLMClient,
  ExecuteOptions,
  WorkerAgent,
  PlanItem,
  Plan,
  ResultMap,
  RunOptions,
} from './types.js';

export {
  OrchestratorError,
  ConfigurationError,
  ServiceError,
  MalformedResponseError,
  PlanningError,
  UnknownWorkerError,
  errorMessage,
} from './errors.js';
export type { OrchestratorErrorCode } from './errors.js';

export { extractCompletionText, resolveCredential, requestCompletion } from './completion.js';
