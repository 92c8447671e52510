/**
 * Default personas.
 *
 * A persona is only a name and a role description. Adding one means adding
 * an entry here (or passing your own to `createWorkers`); the orchestrator
 * never needs to know about it.
 */

import type { LLMClient } from '../../core/types.js';
import { Worker } from './worker.js';

export interface Persona {
  name: string;
  roleDescription: string;
}

export const RESEARCH_PERSONA: Persona = {
  name: 'ResearchAgent',
  roleDescription:
    'You are a Research Agent. You gather relevant facts, data and context about the ' +
    'subject you are assigned, drawing on general knowledge (you have no web access). ' +
    'Answer with a concise summary and point out any important considerations.',
};

export const COPYWRITING_PERSONA: Persona = {
  name: 'CopywritingAgent',
  roleDescription:
    'You are a Copywriting Agent. You write engaging, persuasive text for marketing and ' +
    'communications. Tailor the copy to the audience and objective of the task, and lead ' +
    'with clear benefits and a call to action where it fits.',
};

export const AD_DESIGN_PERSONA: Persona = {
  name: 'AdDesignAgent',
  roleDescription:
    'You are an Ad Design Agent. You come up with advertising concepts, slogans, headlines ' +
    'and campaign ideas. Keep each idea short and imaginative, and keep it in line with ' +
    'the brand and its target audience.',
};

export const DEFAULT_PERSONAS: readonly Persona[] = [
  RESEARCH_PERSONA,
  COPYWRITING_PERSONA,
  AD_DESIGN_PERSONA,
];

export interface CreateWorkersOptions {
  model?: string;
  defaultCredential?: string;
}

/**
 * One worker per persona, all sharing the same client and model.
 */
export function createWorkers(
  personas: readonly Persona[],
  llm: LLMClient,
  options: CreateWorkersOptions = {}
): Worker[] {
  return personas.map(
    (persona) =>
      new Worker(
        {
          name: persona.name,
          roleDescription: persona.roleDescription,
          model: options.model,
          defaultCredential: options.defaultCredential,
        },
        llm
      )
  );
}

export function createDefaultWorkers(
  llm: LLMClient,
  options: CreateWorkersOptions = {}
): Worker[] {
  return createWorkers(DEFAULT_PERSONAS, llm, options);
}
