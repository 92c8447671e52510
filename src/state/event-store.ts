/**
 * Event Store for orchestration runs
 *
 * Records what a run did as an append-only, in-memory event log:
 * the goal, the plan, every worker call and how the run ended.
 * The run's state is derived from the events, never stored separately.
 */

// =============================================================================
// EVENT TYPES
// =============================================================================

interface BaseEvent {
  type: string;
  timestamp: number;
}

export interface RunStartedEvent extends BaseEvent {
  type: 'run_started';
  goal: string;
  workers: string[];
}

export interface PlanCreatedEvent extends BaseEvent {
  type: 'plan_created';
  steps: Array<{ agent: string; task: string }>;
}

export interface WorkerCalledEvent extends BaseEvent {
  type: 'worker_called';
  step: number;
  worker: string;
  task: string;
}

export interface WorkerResultEvent extends BaseEvent {
  type: 'worker_result';
  step: number;
  worker: string;
  output: string;
  durationMs: number;
}

export interface RunCompletedEvent extends BaseEvent {
  type: 'run_completed';
  workers: string[];
  totalSteps: number;
  totalDurationMs: number;
}

export interface ErrorOccurredEvent extends BaseEvent {
  type: 'error_occurred';
  error: string;
  code?: string;
}

export type RunEvent =
  | RunStartedEvent
  | PlanCreatedEvent
  | WorkerCalledEvent
  | WorkerResultEvent
  | RunCompletedEvent
  | ErrorOccurredEvent;

/** An event as passed to `append`; the store stamps the time. */
export type RunEventInput = WithoutTimestamp<RunEvent>;

type WithoutTimestamp<E> = E extends RunEvent ? Omit<E, 'timestamp'> : never;

// =============================================================================
// RUN STATE (derived from events)
// =============================================================================

export interface RunState {
  status: 'idle' | 'planning' | 'dispatching' | 'completed' | 'failed';
  goal: string;
  startTime: number;
  endTime?: number;
  plannedSteps: number;
  completedSteps: number;
  callsByWorker: Record<string, number>;
  errors: string[];
}

/**
 * Derive current state from event history.
 */
export function deriveState(events: RunEvent[]): RunState {
  const state: RunState = {
    status: 'idle',
    goal: '',
    startTime: 0,
    plannedSteps: 0,
    completedSteps: 0,
    callsByWorker: {},
    errors: [],
  };

  for (const event of events) {
    switch (event.type) {
      case 'run_started':
        state.status = 'planning';
        state.goal = event.goal;
        state.startTime = event.timestamp;
        break;

      case 'plan_created':
        state.status = 'dispatching';
        state.plannedSteps = event.steps.length;
        break;

      case 'worker_called':
        state.callsByWorker[event.worker] = (state.callsByWorker[event.worker] ?? 0) + 1;
        break;

      case 'worker_result':
        state.completedSteps++;
        break;

      case 'run_completed':
        state.status = 'completed';
        state.endTime = event.timestamp;
        break;

      case 'error_occurred':
        state.status = 'failed';
        state.endTime = event.timestamp;
        state.errors.push(event.error);
        break;
    }
  }

  return state;
}

// =============================================================================
// EVENT STORE
// =============================================================================

/**
 * Append-only event store.
 *
 * Usage:
 *   const store = new EventStore();
 *   store.append({ type: 'run_started', goal: '...', workers: [...] });
 *   const state = deriveState(store.all());
 */
export class EventStore {
  private events: RunEvent[] = [];
  private now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  /**
   * Append an event. Timestamp is added automatically.
   */
  append(event: RunEventInput): void {
    this.events.push({ ...event, timestamp: this.now() });
  }

  all(): RunEvent[] {
    return [...this.events];
  }

  filter<K extends RunEvent['type']>(type: K): Extract<RunEvent, { type: K }>[] {
    return this.events.filter(
      (e): e is Extract<RunEvent, { type: K }> => e.type === type
    );
  }

  getState(): RunState {
    return deriveState(this.events);
  }

  clear(): void {
    this.events = [];
  }

  /**
   * Get summary statistics.
   */
  getSummary(): string {
    const state = this.getState();
    const duration = (state.endTime ?? this.now()) - state.startTime;
    const calls = Object.entries(state.callsByWorker)
      .map(([worker, count]) => `${worker}=${count}`)
      .join(', ');

    return [
      `Status: ${state.status}`,
      `Goal: ${state.goal}`,
      `Steps: ${state.completedSteps}/${state.plannedSteps} completed`,
      calls ? `Worker Calls: ${calls}` : null,
      `Duration: ${duration}ms`,
      state.errors.length > 0 ? `Errors: ${state.errors.join(', ')}` : null,
    ]
      .filter(Boolean)
      .join('\n');
  }
}
