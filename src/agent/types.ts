/**
 * Planner / executor boundary
 *
 * The loop only depends on these interfaces. Any planner (a language model,
 * a script) plugs in as long as it returns plan steps and an execution.
 */

import type { Constraint } from '../behavior/modifier.js';
import type { Verdict } from '../evaluator/types.js';
import type { Mistake, MistakeStats } from '../mistakes/types.js';
import type { ExecutedStep, PlannedStep, Trace } from '../trace/types.js';

export interface Planner {
  /** Learned constraints arrive ordered by priority, highest first. */
  plan(question: string, constraints: Constraint[]): Promise<PlannedStep[]>;
}

export interface Execution {
  executed_steps: ExecutedStep[];
  final_answer: string;
}

export interface Executor {
  execute(question: string, plan: PlannedStep[]): Promise<Execution>;
}

export interface Assessment {
  trace: Trace;
  verdict: Verdict;
  mistakes: Mistake[];
  /** At least one mistake was persisted. */
  learned: boolean;
  /** Set when learning could not be saved for this run. */
  persistence_error?: string;
  stats: MistakeStats;
}

export interface RunResult extends Assessment {
  question: string;
  answer: string;
  plan: PlannedStep[];
  constraints: Constraint[];
}
