/**
 * Planning Module
 */

export { stripCodeFences, parsePlan } from './plan-parser.js';
export {
  summarizeRole,
  describeWorkers,
  buildPlanningMessages,
  composeInstruction,
} from './prompts.js';
