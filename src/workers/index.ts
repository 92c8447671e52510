/**
 * Workers Module
 */

export { Worker, type WorkerConfig } from './worker.js';
export {
  RESEARCH_PERSONA,
  COPYWRITING_PERSONA,
  AD_DESIGN_PERSONA,
  DEFAULT_PERSONAS,
  createWorkers,
  createDefaultWorkers,
  type Persona,
  type CreateWorkersOptions,
} from './personas.js';
