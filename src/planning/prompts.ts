/**
 * Planning and dispatch prompts.
 */

import type { Message, WorkerAgent } from '../../core/types.js';

const ORCHESTRATOR_PROMPT = `You are a Task Orchestrator. Your job is to break a complex goal into manageable subtasks and assign each subtask to one of the specialized workers listed below.

Return your plan as a JSON array. Each entry must have exactly two keys:
- "agent": the name of the worker that performs the subtask
- "task": a short description of the subtask`;

/**
 * First sentence of a role description, used as a one-line summary.
 */
export function summarizeRole(roleDescription: string): string {
  const [firstSentence = ''] = roleDescription.split('.');
  return `${firstSentence.trim()}...`;
}

export function describeWorkers(workers: Iterable<WorkerAgent>): string {
  return Array.from(workers, (w) => `- ${w.name}: ${summarizeRole(w.roleDescription)}`).join('\n');
}

export function buildPlanningMessages(goal: string, workers: Iterable<WorkerAgent>): Message[] {
  const listing = describeWorkers(workers);
  return [
    {
      role: 'system',
      content: `${ORCHESTRATOR_PROMPT}\n\nAvailable workers:\n${listing}`,
    },
    {
      role: 'user',
      content: [
        `Goal: ${goal}`,
        '',
        `Available workers:\n${listing}`,
        '',
        'Propose a decomposition of the goal into subtasks. Use only the worker names listed above, and respond with the JSON array only.',
      ].join('\n'),
    },
  ];
}

/**
 * The instruction a worker receives: its subtask, framed by the overall goal.
 */
export function composeInstruction(task: string, goal: string): string {
  return [
    `Subtask: ${task}`,
    '',
    `Context: the overall goal is "${goal}". Carry out your role on this specific subtask.`,
  ].join('\n');
}
