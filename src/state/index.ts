/**
 * State Management Module
 *
 * Exports the run audit trail.
 */

export {
  EventStore,
  deriveState,
  type RunEvent,
  type RunEventInput,
  type RunStartedEvent,
  type PlanCreatedEvent,
  type WorkerCalledEvent,
  type WorkerResultEvent,
  type RunCompletedEvent,
  type ErrorOccurredEvent,
  type RunState,
} from './event-store.js';
