/**
 * Wire the loop's components from a loaded configuration.
 */

import type { ResearchLoopConfig } from '../config.js';
import { Evaluator } from '../evaluator/evaluator.js';
import { createResearchDetector, createSupportMatcher } from '../evaluator/heuristics.js';
import { Learner } from '../learner/learner.js';
import { consoleLogger, type Logger } from '../logger.js';
import { JsonFileMistakeStorage, defaultMistakesPath } from '../mistakes/storage.js';
import { MistakeStore } from '../mistakes/store.js';
import type { MistakeStorage } from '../mistakes/types.js';
import { createDefaultTools } from '../tools/index.js';
import { loadCorpus, type CorpusDocument } from '../tools/search.js';
import { ResearchLoop } from './loop.js';
import { SimulatedPlanner, ToolExecutor } from './simulated.js';

export function createEvaluator(config: ResearchLoopConfig): Evaluator {
  const { evaluation } = config;
  return new Evaluator({
    passThreshold: evaluation.passThreshold,
    weights: evaluation.weights,
    researchDetector: createResearchDetector(evaluation.researchPatterns),
    supportMatcher: createSupportMatcher(evaluation.support.mode, {
      minSharedTerms: evaluation.support.minSharedTerms,
    }),
  });
}

export function createLearner(config: ResearchLoopConfig, now?: () => Date): Learner {
  return new Learner({ now, onlyFailedRuns: config.learning.onlyFailedRuns });
}

export interface OpenStoreOptions {
  cwd?: string;
  storage?: MistakeStorage;
  logger?: Logger;
}

export async function openStore(config: ResearchLoopConfig, options?: OpenStoreOptions): Promise<MistakeStore> {
  const storage = options?.storage ?? new JsonFileMistakeStorage(defaultMistakesPath(options?.cwd));
  return MistakeStore.open(storage, {
    logger: options?.logger,
    maxMistakes: config.learning.maxMistakes,
    recurringThreshold: config.learning.frequencyThreshold,
  });
}

/**
 * Mistake rate for the early runs of a fresh store: 0.6 for the first three,
 * 0.3 for the next two, then 0.
 */
export function autoLearningRate(totalRuns: number): number {
  if (totalRuns < 3) return 0.6;
  if (totalRuns < 5) return 0.3;
  return 0;
}

/**
 * An explicit rate wins; otherwise a zero configured rate follows the
 * auto-learning schedule when `agent.autoLearning` is on.
 */
export function resolveMistakeRate(config: ResearchLoopConfig, totalRuns: number, explicit?: number): number {
  if (explicit !== undefined) return explicit;
  const { mistakeRate, autoLearning } = config.agent;
  if (autoLearning && mistakeRate === 0) {
    return autoLearningRate(totalRuns);
  }
  return mistakeRate;
}

export interface CreateLoopOptions {
  store: MistakeStore;
  /** Overrides `agent.mistakeRate` and the auto-learning schedule. */
  mistakeRate?: number;
  corpus?: CorpusDocument[];
  random?: () => number;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Loop backed by the offline simulated agent and the local corpus.
 */
export async function createResearchLoop(
  config: ResearchLoopConfig,
  options: CreateLoopOptions,
): Promise<ResearchLoop> {
  const corpus = options.corpus ?? (await loadCorpus(config.agent.corpusPath));
  const simulation = {
    mistakeRate: resolveMistakeRate(config, options.store.getStats().total_runs, options.mistakeRate),
    random: options.random,
  };
  const tools = createDefaultTools(corpus, {
    maxSearchResults: config.agent.maxSearchResults,
    summaryMaxLength: config.agent.summaryMaxLength,
    now: options.now,
  });

  return new ResearchLoop({
    store: options.store,
    planner: new SimulatedPlanner(simulation),
    executor: new ToolExecutor(tools, simulation),
    evaluator: createEvaluator(config),
    learner: createLearner(config, options.now),
    constraintThreshold: config.learning.frequencyThreshold,
    logger: options.logger ?? consoleLogger,
    now: options.now,
  });
}
