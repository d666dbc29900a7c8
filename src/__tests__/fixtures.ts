/**
 * Traces shared across test suites.
 */

import type { Logger } from '../logger.js';
import type { Trace } from '../trace/types.js';
import { vi } from 'vitest';

/** Answered from memory: nothing executed. */
export function prematureTrace(): Trace {
  return {
    question: 'What is the capital of France?',
    plan_steps: [{ action: 'Answer directly', rationale: 'Well known' }],
    executed_steps: [],
    final_answer: 'The capital of France is Paris.',
  };
}

/** search -> summarize, answer grounded in the summary. */
export function groundedTrace(): Trace {
  return {
    question: 'What is the capital of France?',
    plan_steps: [
      { action: 'Search the web', tool: 'search', rationale: 'Gather facts' },
      { action: 'Summarize results', tool: 'summarize', rationale: 'Extract key facts' },
      { action: 'Answer', rationale: 'Use the summary' },
    ],
    executed_steps: [
      {
        tool: 'search',
        succeeded: true,
        output: [
          {
            snippet: 'Paris is the capital and largest city of France.',
            title: 'Paris',
            url: 'corpus://france-capital',
          },
        ],
      },
      { tool: 'summarize', succeeded: true, output: 'Paris is the capital and largest city of France.' },
    ],
    final_answer: 'The capital of France is Paris.',
  };
}

/** Same tools as the grounded trace, summarize run first. */
export function reversedTrace(): Trace {
  const trace = groundedTrace();
  return { ...trace, executed_steps: [...trace.executed_steps].reverse() };
}

export function spyLogger(): Logger & {
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
} {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn() };
}
