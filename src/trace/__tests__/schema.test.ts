/**
 * Trace parsing tests
 */

import { describe, expect, it } from 'vitest';
import { TraceMalformedError } from '../../errors.js';
import { parseTrace } from '../schema.js';

describe('parseTrace', () => {
  it('accepts a well-formed trace', () => {
    const trace = parseTrace({
      question: 'Who invented the telephone?',
      plan_steps: [{ action: 'Search', tool: 'search', rationale: 'facts' }],
      executed_steps: [{ tool: 'search', succeeded: true, output: 'Bell, 1876' }],
      final_answer: 'Alexander Graham Bell',
    });

    expect(trace.question).toBe('Who invented the telephone?');
    expect(trace.plan_steps[0].tool).toBe('search');
    expect(trace.executed_steps[0].output).toBe('Bell, 1876');
  });

  it('normalizes legacy tool names and null tools', () => {
    const trace = parseTrace({
      question: 'What is the population of Tokyo?',
      plan_steps: [
        { action: 'Search', tool: 'web_search', rationale: 'facts' },
        { action: 'Answer', tool: null, rationale: 'done' },
      ],
      executed_steps: [{ tool: 'summarizer', succeeded: true, output: null }],
      final_answer: '37 million',
    });

    expect(trace.plan_steps.map((step) => step.tool)).toEqual(['search', undefined]);
    expect(trace.executed_steps[0].tool).toBe('summarize');
  });

  it('defaults a missing rationale to an empty string', () => {
    const trace = parseTrace({
      question: 'Explain recursion',
      plan_steps: [{ action: 'Answer' }],
      executed_steps: [],
      final_answer: 'A function calling itself.',
    });

    expect(trace.plan_steps[0].rationale).toBe('');
  });

  it('rejects a trace without a final answer', () => {
    expect(() =>
      parseTrace({ question: 'What is 2 + 2?', plan_steps: [], executed_steps: [] }),
    ).toThrow(TraceMalformedError);

    try {
      parseTrace({ question: 'What is 2 + 2?', plan_steps: [], executed_steps: [] });
    } catch (err) {
      expect(err).toBeInstanceOf(TraceMalformedError);
      if (err instanceof TraceMalformedError) {
        expect(err.code).toBe('TRACE_MALFORMED');
        expect(err.issues).toEqual(['final_answer: Required']);
      }
    }
  });

  it('rejects tools outside the closed set', () => {
    try {
      parseTrace({
        question: 'What is new today?',
        plan_steps: [],
        executed_steps: [{ tool: 'browser', succeeded: true, output: 'page' }],
        final_answer: 'Nothing',
      });
      expect.unreachable('parseTrace should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(TraceMalformedError);
      if (err instanceof TraceMalformedError) {
        expect(err.issues).toHaveLength(1);
        expect(err.issues[0].startsWith('executed_steps.0.tool: ')).toBe(true);
      }
    }
  });

  it('rejects an empty question', () => {
    expect(() =>
      parseTrace({ question: '   ', plan_steps: [], executed_steps: [], final_answer: 'x' }),
    ).toThrow('question must not be empty');
  });
});
