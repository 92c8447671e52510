import { describe, it, expect } from 'vitest';
import { PlanningError } from '../core/errors.js';
import { parsePlan, stripCodeFences } from '../src/planning/plan-parser.js';

const PLAN_JSON = JSON.stringify([
  { agent: 'ResearchAgent', task: 'Summarize X' },
  { agent: 'CopywritingAgent', task: 'Write a tagline for X' },
]);

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}

describe('stripCodeFences', () => {
  it('leaves unfenced text alone (apart from trimming)', () => {
    expect(stripCodeFences(`  ${PLAN_JSON}\n`)).toBe(PLAN_JSON);
  });

  it('drops a leading ```json line and a trailing ``` line', () => {
    expect(stripCodeFences(`\`\`\`json\n${PLAN_JSON}\n\`\`\``)).toBe(PLAN_JSON);
  });

  it('drops a bare fence pair', () => {
    expect(stripCodeFences('```\n[1, 2]\n```')).toBe('[1, 2]');
  });

  it('drops a trailing fence without a leading one', () => {
    expect(stripCodeFences('[]\n```')).toBe('[]');
  });

  it('handles CRLF line endings', () => {
    expect(stripCodeFences('```json\r\n[]\r\n```')).toBe('[]');
  });
});

describe('parsePlan', () => {
  it('parses fenced and unfenced responses into the same items', () => {
    const plain = parsePlan(PLAN_JSON);
    const fenced = parsePlan(`\`\`\`json\n${PLAN_JSON}\n\`\`\``);

    expect(plain).toEqual([
      { agent: 'ResearchAgent', task: 'Summarize X' },
      { agent: 'CopywritingAgent', task: 'Write a tagline for X' },
    ]);
    expect(fenced).toEqual(plain);
  });

  it('trims both fields and drops items with an empty field', () => {
    const plan = parsePlan(
      JSON.stringify([
        { agent: '  ResearchAgent ', task: '  Summarize X  ' },
        { agent: 'CopywritingAgent', task: '   ' },
        { agent: '', task: 'Orphan task' },
        { task: 'No agent at all' },
        { agent: 'AdDesignAgent', task: 'Slogans' },
      ])
    );

    expect(plan).toEqual([
      { agent: 'ResearchAgent', task: 'Summarize X' },
      { agent: 'AdDesignAgent', task: 'Slogans' },
    ]);
  });

  it('reads numbers as text and null or nested values as empty', () => {
    const plan = parsePlan(
      JSON.stringify([
        { agent: 'ResearchAgent', task: 42 },
        { agent: null, task: 'Dropped' },
        { agent: 'ResearchAgent', task: { nested: true } },
      ])
    );

    expect(plan).toEqual([{ agent: 'ResearchAgent', task: '42' }]);
  });

  it('ignores extra keys on an item', () => {
    expect(parsePlan('[{"agent":"A","task":"T","priority":1}]')).toEqual([
      { agent: 'A', task: 'T' },
    ]);
  });

  it('accepts an empty array', () => {
    expect(parsePlan('[]')).toEqual([]);
  });

  it('rejects text that is not JSON, keeping the raw response', () => {
    const raw = 'Sure! Here is the plan: research, then copy.';
    const error = catchError(() => parsePlan(raw));

    expect(error).toBeInstanceOf(PlanningError);
    if (!(error instanceof PlanningError)) return;
    expect(error.rawResponse).toBe(raw);
    expect(error.message).toContain(raw);
    expect(error.message).toMatch(/^Failed to parse orchestration plan as JSON/);
  });

  it('rejects JSON that is not an array', () => {
    const raw = '{"agent":"ResearchAgent","task":"Summarize X"}';
    const error = catchError(() => parsePlan(raw));

    expect(error).toBeInstanceOf(PlanningError);
    if (!(error instanceof PlanningError)) return;
    expect(error.rawResponse).toBe(raw);
    expect(error.code).toBe('PLANNING');
  });

  it('rejects an array containing a non-record entry', () => {
    const raw = '[{"agent":"ResearchAgent","task":"Summarize X"}, "do the copy"]';
    expect(() => parsePlan(raw)).toThrow(PlanningError);
  });

  it('keeps the fenced original as the raw response', () => {
    const raw = '```json\nnot json\n```';
    const error = catchError(() => parsePlan(raw));

    expect(error).toBeInstanceOf(PlanningError);
    if (!(error instanceof PlanningError)) return;
    expect(error.rawResponse).toBe(raw);
  });
});
