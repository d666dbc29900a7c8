/**
 * Offline planner and executor.
 *
 * Lets the loop run without a language model. With a non-zero mistake rate
 * they cut the corners the evaluator looks for (answering directly, skipping
 * search, summarizing first) so the learning loop has something to learn.
 */

import type { Constraint } from '../behavior/modifier.js';
import { describeCause } from '../errors.js';
import { outputText } from '../evaluator/heuristics.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ExecutedStep, PlannedStep } from '../trace/types.js';
import type { Execution, Executor, Planner } from './types.js';

export interface SimulationOptions {
  /** Probability (0-1) of each corner-cutting decision. */
  mistakeRate?: number;
  /** Uniform [0, 1) source; Math.random by default. */
  random?: () => number;
}

const RESEARCH_PLAN: PlannedStep[] = [
  { action: 'Search for sources on the question', tool: 'search', rationale: 'Gather current facts' },
  { action: 'Summarize the search results', tool: 'summarize', rationale: 'Extract the key facts' },
  { action: 'Answer from the summary', rationale: 'Ground the answer in gathered data' },
];

const DIRECT_PLAN: PlannedStep[] = [
  { action: 'Answer from general knowledge', rationale: 'The answer seems well known' },
];

class Dice {
  private readonly rate: number;
  private readonly random: () => number;

  constructor(options?: SimulationOptions) {
    this.rate = Math.min(1, Math.max(0, options?.mistakeRate ?? 0));
    this.random = options?.random ?? Math.random;
  }

  slip(): boolean {
    return this.rate > 0 && this.random() < this.rate;
  }
}

export class SimulatedPlanner implements Planner {
  private readonly dice: Dice;

  constructor(options?: SimulationOptions) {
    this.dice = new Dice(options);
  }

  /** Any learned constraint steers the plan to full research. */
  async plan(_question: string, constraints: Constraint[]): Promise<PlannedStep[]> {
    if (constraints.length === 0 && this.dice.slip()) {
      return DIRECT_PLAN.map((step) => ({ ...step }));
    }
    return RESEARCH_PLAN.map((step) => ({ ...step }));
  }
}

export class ToolExecutor implements Executor {
  private readonly dice: Dice;

  constructor(
    private readonly tools: ToolRegistry,
    options?: SimulationOptions,
  ) {
    this.dice = new Dice(options);
  }

  async execute(question: string, plan: PlannedStep[]): Promise<Execution> {
    const toolSteps = plan.filter((step) => step.tool !== undefined);
    if (toolSteps.length > 1 && this.dice.slip()) {
      [toolSteps[0], toolSteps[1]] = [toolSteps[1], toolSteps[0]];
    }

    const executed: ExecutedStep[] = [];
    let evidence = '';

    for (const step of toolSteps) {
      const tool = step.tool;
      if (!tool) continue;
      if (tool === 'search' && this.dice.slip()) continue;

      const input = tool === 'search' ? question : evidence;
      try {
        const output = await this.tools.execute(tool, input);
        executed.push({ tool, succeeded: true, output });
        const text = outputText(output);
        if (text) {
          evidence = text;
        }
      } catch (err) {
        executed.push({ tool, succeeded: false, output: null, error: describeCause(err) });
      }
    }

    return {
      executed_steps: executed,
      final_answer: evidence || `Based on general knowledge, the answer to "${question}" is widely known.`,
    };
  }
}
