/**
 * Shared Types
 *
 * The contracts every other module is written against: chat messages,
 * the generation service boundary, workers and plans.
 */

// =============================================================================
// MESSAGES
// =============================================================================

export type MessageRole = 'system' | 'user';

export interface Message {
  role: MessageRole;
  content: string;
}

// =============================================================================
// GENERATION SERVICE
// =============================================================================

/**
 * A single chat-completion request.
 *
 * `apiKey` is always resolved before the request is built; clients never
 * read credentials from the environment themselves.
 */
export interface CompletionRequest {
  model: string;
  messages: Message[];
  temperature: number;
  apiKey: string;
}

/**
 * Boundary to the text-generation service.
 *
 * Returns the raw response payload. Callers extract the text with
 * `extractCompletionText`, which is where a malformed payload is detected.
 */
export interface LLMClient {
  invoke(request: CompletionRequest): Promise<unknown>;
}

// =============================================================================
// WORKERS
// =============================================================================

export interface ExecuteOptions {
  /** Sampling temperature. Default: 0.7 */
  temperature?: number;

  /** Explicit credential; overrides the worker's default credential. */
  credential?: string;
}

/**
 * Anything the orchestrator can dispatch a subtask to.
 *
 * The orchestrator only ever calls `execute`; it never looks at which
 * persona a worker carries.
 */
export interface WorkerAgent {
  readonly name: string;
  readonly roleDescription: string;
  execute(instruction: string, options?: ExecuteOptions): Promise<string>;
}

// =============================================================================
// PLANS & RESULTS
// =============================================================================

export interface PlanItem {
  /** Worker name as written by the planner (resolved at dispatch time) */
  agent: string;
  task: string;
}

export type Plan = PlanItem[];

/** Worker name (as declared on the worker) → produced text */
export type ResultMap = Record<string, string>;

export interface RunOptions {
  /** Explicit credential for planning and every worker call */
  credential?: string;
}
