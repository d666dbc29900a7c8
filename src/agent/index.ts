/**
 * Research loop orchestration
 */

export type { Planner, Executor, Execution, Assessment, RunResult } from './types.js';
export { ResearchLoop, assessTrace } from './loop.js';
export type { ResearchLoopOptions, AssessOptions, AssessDependencies } from './loop.js';
export { SimulatedPlanner, ToolExecutor } from './simulated.js';
export type { SimulationOptions } from './simulated.js';
export {
  createEvaluator,
  createLearner,
  openStore,
  createResearchLoop,
  autoLearningRate,
  resolveMistakeRate,
} from './setup.js';
export type { OpenStoreOptions, CreateLoopOptions } from './setup.js';
