import { describe, it, expect } from 'vitest';
import { EventStore, deriveState } from '../src/state/index.js';

function clock(...times: number[]): () => number {
  let i = 0;
  return () => times[Math.min(i++, times.length - 1)];
}

describe('EventStore', () => {
  it('stamps events and derives a completed run', () => {
    const store = new EventStore(clock(1000, 1010, 1020, 1030, 1100));
    store.append({ type: 'run_started', goal: 'Launch X', workers: ['ResearchAgent'] });
    store.append({ type: 'plan_created', steps: [{ agent: 'ResearchAgent', task: 'Summarize X' }] });
    store.append({ type: 'worker_called', step: 1, worker: 'ResearchAgent', task: 'Summarize X' });
    store.append({
      type: 'worker_result',
      step: 1,
      worker: 'ResearchAgent',
      output: 'Summary',
      durationMs: 10,
    });
    store.append({
      type: 'run_completed',
      workers: ['ResearchAgent'],
      totalSteps: 1,
      totalDurationMs: 100,
    });

    expect(store.all().map((e) => e.timestamp)).toEqual([1000, 1010, 1020, 1030, 1100]);
    expect(store.getState()).toEqual({
      status: 'completed',
      goal: 'Launch X',
      startTime: 1000,
      endTime: 1100,
      plannedSteps: 1,
      completedSteps: 1,
      callsByWorker: { ResearchAgent: 1 },
      errors: [],
    });
    expect(store.getSummary()).toBe(
      [
        'Status: completed',
        'Goal: Launch X',
        'Steps: 1/1 completed',
        'Worker Calls: ResearchAgent=1',
        'Duration: 100ms',
      ].join('\n')
    );
  });

  it('marks a run failed on error', () => {
    const store = new EventStore(clock(0, 5, 40));
    store.append({ type: 'run_started', goal: 'Launch X', workers: [] });
    store.append({ type: 'plan_created', steps: [] });
    store.append({ type: 'error_occurred', error: 'boom', code: 'PLANNING' });

    const state = store.getState();
    expect(state.status).toBe('failed');
    expect(state.errors).toEqual(['boom']);
    expect(store.getSummary()).toBe(
      ['Status: failed', 'Goal: Launch X', 'Steps: 0/0 completed', 'Duration: 40ms', 'Errors: boom'].join(
        '\n'
      )
    );
  });

  it('filters by event type', () => {
    const store = new EventStore(clock(1));
    store.append({ type: 'worker_called', step: 1, worker: 'A', task: 't1' });
    store.append({ type: 'worker_called', step: 2, worker: 'B', task: 't2' });
    store.append({ type: 'run_started', goal: 'g', workers: ['A', 'B'] });

    expect(store.filter('worker_called').map((e) => e.worker)).toEqual(['A', 'B']);
  });

  it('clears all events', () => {
    const store = new EventStore();
    store.append({ type: 'run_started', goal: 'g', workers: [] });
    store.clear();
    expect(store.all()).toEqual([]);
    expect(deriveState(store.all()).status).toBe('idle');
  });
});
