/**
 * Plan Parser
 *
 * Turns the planner's free-text answer into PlanItems in two stages:
 *
 *   1. stripCodeFences - drop a leading and/or trailing ``` line
 *   2. parsePlan       - decode JSON, validate the shape, clean the items
 *
 * Items whose `agent` or `task` is empty after trimming are dropped, not
 * reported. Anything that is not a JSON array of records is a PlanningError
 * carrying the raw text.
 */

import { z } from 'zod';
import { PlanningError, errorMessage } from '../../core/errors.js';
import type { Plan } from '../../core/types.js';

const FENCE = '```';

/**
 * Text form of a field. Strings, numbers and booleans are kept; anything
 * else (missing, null, nested structures) reads as empty.
 */
const PlanField = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value).trim())
  .catch('');

const PlanEntrySchema = z.object({
  agent: PlanField,
  task: PlanField,
});

const PlanSchema = z.array(PlanEntrySchema);

export function stripCodeFences(text: string): string {
  const lines = text.trim().split(/\r?\n/);
  if (lines.length > 0 && lines[0].trimStart().startsWith(FENCE)) {
    lines.shift();
  }
  if (lines.length > 0 && lines[lines.length - 1].trimStart().startsWith(FENCE)) {
    lines.pop();
  }
  return lines.join('\n');
}

export function parsePlan(rawResponse: string): Plan {
  const text = stripCodeFences(rawResponse);

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new PlanningError(
      `Failed to parse orchestration plan as JSON: ${errorMessage(error)}`,
      rawResponse,
      { cause: error }
    );
  }

  const parsed = PlanSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.') || '/'} ${i.message}`)
      .join('; ');
    throw new PlanningError(
      `Orchestration plan is not a list of {agent, task} records: ${issues}`,
      rawResponse,
      { cause: parsed.error }
    );
  }

  return parsed.data.filter((item) => item.agent !== '' && item.task !== '');
}
