/**
 * Evaluator tests
 */

import { describe, expect, it } from 'vitest';
import { groundedTrace, prematureTrace, reversedTrace } from '../../__tests__/fixtures.js';
import type { Trace } from '../../trace/types.js';
import { Evaluator, computeScore, evaluate, formatFeedback } from '../evaluator.js';
import { searchOutputMatcher } from '../heuristics.js';

describe('Evaluator', () => {
  describe('answering without research', () => {
    it('fails required tools and support, passes sequence', () => {
      const verdict = evaluate(prematureTrace());

      expect(verdict.criteria.required_tools_used).toEqual({
        passed: false,
        weight: 1 / 3,
        detail: 'No steps were executed before answering',
        tools: ['search'],
      });
      expect(verdict.criteria.correct_sequence.passed).toBe(true);
      expect(verdict.criteria.correct_sequence.detail).toBe('No tools were used');
      expect(verdict.criteria.answer_supported_by_data.passed).toBe(false);
      expect(verdict.score).toBeCloseTo(1 / 3);
      expect(verdict.passed).toBe(false);
      expect(verdict.issues).toEqual([
        'No steps were executed before answering',
        'Final answer produced without executing any step',
      ]);
    });
  });

  describe('a fully grounded run', () => {
    it('passes every criterion', () => {
      const verdict = evaluate(groundedTrace());

      expect(verdict.score).toBe(1);
      expect(verdict.passed).toBe(true);
      expect(verdict.issues).toEqual([]);
      expect(verdict.criteria.required_tools_used.detail).toBe(
        'All required tools executed: search, summarize',
      );
      expect(verdict.criteria.answer_supported_by_data.detail).toBe(
        'Answer shares 3 term(s) with tool output: capital, france, paris',
      );
    });
  });

  describe('tools in the wrong order', () => {
    it('fails only the sequence criterion and still passes overall', () => {
      const verdict = evaluate(reversedTrace());

      expect(verdict.criteria.required_tools_used.passed).toBe(true);
      expect(verdict.criteria.answer_supported_by_data.passed).toBe(true);
      expect(verdict.criteria.correct_sequence).toEqual({
        passed: false,
        weight: 1 / 3,
        detail: 'summarize executed before search',
        tools: ['search', 'summarize'],
      });
      expect(verdict.score).toBeCloseTo(2 / 3);
      expect(verdict.passed).toBe(true);
    });

    it('fails overall under a stricter threshold', () => {
      const verdict = evaluate(reversedTrace(), { passThreshold: 0.7 });
      expect(verdict.passed).toBe(false);
    });
  });

  it('is deterministic', () => {
    const evaluator = new Evaluator();
    const first = evaluator.evaluate(reversedTrace());
    const second = evaluator.evaluate(reversedTrace());

    expect(second).toEqual(first);
    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  it('applies custom weights to the score', () => {
    const weights = { required_tools_used: 1, correct_sequence: 1, answer_supported_by_data: 2 };

    expect(evaluate(reversedTrace(), { weights }).score).toBe(0.75);
    expect(evaluate(prematureTrace(), { weights }).score).toBe(0.25);
  });

  it('scores zero when every weight is zero', () => {
    const verdict = evaluate(groundedTrace(), {
      weights: { required_tools_used: 0, correct_sequence: 0, answer_supported_by_data: 0 },
    });
    expect(verdict.score).toBe(0);
    expect(computeScore(verdict.criteria)).toBe(0);
  });

  it('does not require optional planned tools', () => {
    const trace: Trace = {
      question: 'Explain recursion',
      plan_steps: [{ action: 'Summarize', tool: 'summarize', rationale: 'tidy', optional: true }],
      executed_steps: [{ tool: 'search', succeeded: true, output: 'Recursion is when a function calls itself.' }],
      final_answer: 'Recursion is when a function calls itself.',
    };

    const evaluator = new Evaluator();
    expect(evaluator.requiredTools(trace)).toEqual([]);
    expect(evaluator.evaluate(trace).criteria.required_tools_used.detail).toBe('No tools required');
  });

  it('lets an explicit research flag override the detector', () => {
    const trace: Trace = {
      question: 'What is recursion?',
      plan_steps: [],
      executed_steps: [{ tool: 'summarize', succeeded: true, output: 'A function calling itself.' }],
      final_answer: 'A function calling itself.',
      requires_research: false,
    };

    expect(new Evaluator().requiredTools(trace)).toEqual([]);
    expect(new Evaluator().requiredTools({ ...trace, requires_research: undefined })).toEqual(['search']);
  });

  it('treats a failed search as not executed', () => {
    const trace: Trace = {
      question: 'Who invented the telephone?',
      plan_steps: [],
      executed_steps: [{ tool: 'search', succeeded: false, output: null, error: 'timeout' }],
      final_answer: 'Bell',
    };

    const verdict = evaluate(trace);
    expect(verdict.criteria.required_tools_used).toMatchObject({
      passed: false,
      detail: 'Required tool(s) not executed successfully: search',
      tools: ['search'],
    });
    expect(verdict.criteria.correct_sequence.detail).toBe('Tools executed in the expected order');
    expect(verdict.criteria.answer_supported_by_data.detail).toBe('No executed step produced output');
  });

  it('fails an answer unrelated to the tool output', () => {
    const trace: Trace = {
      question: 'Describe bananas',
      plan_steps: [{ action: 'Search', tool: 'search', rationale: 'facts' }],
      executed_steps: [{ tool: 'search', succeeded: true, output: 'Tokyo is the capital of Japan.' }],
      final_answer: 'Bananas are yellow fruit.',
    };

    const verdict = evaluate(trace);
    expect(verdict.criteria.answer_supported_by_data).toMatchObject({
      passed: false,
      detail: 'Answer shares 0 of 2 required term(s) with tool output',
    });
    expect(verdict.score).toBeCloseTo(2 / 3);
  });

  it('accepts any search output under the search-output matcher', () => {
    const trace: Trace = {
      question: 'Describe bananas',
      plan_steps: [],
      executed_steps: [{ tool: 'search', succeeded: true, output: 'Tokyo is the capital of Japan.' }],
      final_answer: 'Bananas are yellow fruit.',
    };

    const verdict = evaluate(trace, { supportMatcher: searchOutputMatcher });
    expect(verdict.criteria.answer_supported_by_data.passed).toBe(true);
  });

  it('fails an undecidable criterion instead of throwing', () => {
    const verdict = evaluate(groundedTrace(), {
      researchDetector: () => {
        throw new Error('detector offline');
      },
    });

    expect(verdict.criteria.required_tools_used).toEqual({
      passed: false,
      weight: 1 / 3,
      detail: 'Could not decide: detector offline',
      tools: [],
    });
    expect(verdict.criteria.correct_sequence.passed).toBe(true);
  });
});

describe('formatFeedback', () => {
  it('headlines a perfect run', () => {
    const lines = formatFeedback(evaluate(groundedTrace()));
    expect(lines[0]).toBe('All criteria met.');
    expect(lines).toHaveLength(4);
  });

  it('marks failed criteria', () => {
    const lines = formatFeedback(evaluate(prematureTrace()));
    expect(lines[0]).toBe('Failed evaluation.');
    expect(lines[1]).toBe('✗ Required tools used: No steps were executed before answering');
    expect(lines[2]).toBe('✓ Correct sequence: No tools were used');
  });

  it('flags an acceptable run with room to improve', () => {
    expect(formatFeedback(evaluate(reversedTrace()))[0]).toBe('Acceptable but could improve.');
  });
});
