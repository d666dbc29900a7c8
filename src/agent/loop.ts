/**
 * Research loop: plan -> execute -> evaluate -> learn
 *
 * The store is passed in and owned by the caller; the loop never reaches
 * for ambient state.
 */

import { compileConstraints } from '../behavior/modifier.js';
import { PersistenceUnavailableError } from '../errors.js';
import { Evaluator } from '../evaluator/evaluator.js';
import { Learner } from '../learner/learner.js';
import { consoleLogger, type Logger } from '../logger.js';
import type { MistakeStore } from '../mistakes/store.js';
import type { Mistake } from '../mistakes/types.js';
import { parseTrace } from '../trace/schema.js';
import type { Assessment, Executor, Planner, RunResult } from './types.js';

export interface ResearchLoopOptions {
  store: MistakeStore;
  planner: Planner;
  executor: Executor;
  evaluator?: Evaluator;
  learner?: Learner;
  /** Minimum mistake frequency that becomes a planning constraint. */
  constraintThreshold?: number;
  logger?: Logger;
  now?: () => Date;
}

export interface AssessOptions {
  /** Score only; nothing is written to the store. */
  learn?: boolean;
}

export class ResearchLoop {
  private readonly store: MistakeStore;
  private readonly planner: Planner;
  private readonly executor: Executor;
  private readonly evaluator: Evaluator;
  private readonly learner: Learner;
  private readonly constraintThreshold?: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: ResearchLoopOptions) {
    this.store = options.store;
    this.planner = options.planner;
    this.executor = options.executor;
    this.evaluator = options.evaluator ?? new Evaluator();
    this.learner = options.learner ?? new Learner({ now: options.now });
    this.constraintThreshold = options.constraintThreshold;
    this.logger = options.logger ?? consoleLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run one question through the loop.
   *
   * @throws TraceMalformedError when planner or executor output does not form
   *   a valid trace; such runs are neither scored nor recorded.
   */
  async run(question: string): Promise<RunResult> {
    const constraints = compileConstraints(this.store, { threshold: this.constraintThreshold });
    this.logger.debug(`Planning with ${constraints.length} learned constraint(s)`);

    const startedAt = this.now().getTime();
    const plan = await this.planner.plan(question, constraints);
    this.logger.debug(`Plan has ${plan.length} step(s)`);

    const execution = await this.executor.execute(question, plan);
    const elapsedSeconds = Math.max(0, (this.now().getTime() - startedAt) / 1000);

    const assessment = await this.assess({
      question,
      plan_steps: plan,
      executed_steps: execution.executed_steps,
      final_answer: execution.final_answer,
      execution_time_seconds: elapsedSeconds,
    });

    return {
      ...assessment,
      question: assessment.trace.question,
      answer: assessment.trace.final_answer,
      plan: assessment.trace.plan_steps,
      constraints,
    };
  }

  /**
   * Validate, score and learn from a finished trace.
   */
  assess(input: unknown, options?: AssessOptions): Promise<Assessment> {
    return assessTrace(
      input,
      { store: this.store, evaluator: this.evaluator, learner: this.learner, logger: this.logger },
      options,
    );
  }
}

export interface AssessDependencies {
  store: MistakeStore;
  evaluator: Evaluator;
  learner: Learner;
  logger?: Logger;
}

/**
 * Evaluate a trace, persist the mistakes it teaches and count the run.
 *
 * Mistakes and the run count are written in one flush. A failed write does
 * not throw: the assessment comes back with `persistence_error` set and the
 * store holds nothing from this run.
 *
 * @throws TraceMalformedError before anything is scored
 */
export async function assessTrace(
  input: unknown,
  deps: AssessDependencies,
  options?: AssessOptions,
): Promise<Assessment> {
  const { store, evaluator, learner } = deps;
  const logger = deps.logger ?? consoleLogger;

  const trace = parseTrace(input);
  const verdict = evaluator.evaluate(trace);
  const mistakes = learner.learn(trace, verdict);
  logger.debug(`Score ${verdict.score.toFixed(3)}, ${mistakes.length} mistake(s)`);

  if (options?.learn === false) {
    return { trace, verdict, mistakes, learned: false, stats: store.getStats() };
  }

  let saved: Mistake[];
  try {
    saved = await store.upsertAll(mistakes, { success: verdict.passed });
  } catch (err) {
    if (!(err instanceof PersistenceUnavailableError)) {
      throw err;
    }
    logger.warn(`Learning could not be saved for this run: ${err.message}`);
    return {
      trace,
      verdict,
      mistakes,
      learned: false,
      persistence_error: err.message,
      stats: store.getStats(),
    };
  }

  return {
    trace,
    verdict,
    mistakes: saved,
    learned: saved.length > 0,
    stats: store.getStats(),
  };
}
