/**
 * research-loop — a research agent that learns from its own mistakes
 *
 * Public API for programmatic usage.
 */

// Trace model
export type { ToolName, PlannedStep, ExecutedStep, Trace } from './trace/index.js';
export { TOOL_NAMES, TraceSchema, parseTrace, isToolName } from './trace/index.js';

// Evaluation
export type {
  CriterionName,
  CriterionResult,
  Verdict,
  EvaluatorOptions,
  OrderRule,
  ResearchPredicate,
  SupportMatcher,
  SupportMode,
} from './evaluator/index.js';
export {
  Evaluator,
  evaluate,
  computeScore,
  formatFeedback,
  CRITERION_NAMES,
  DEFAULT_PASS_THRESHOLD,
  DEFAULT_RESEARCH_PATTERNS,
  createResearchDetector,
  createKeywordOverlapMatcher,
  searchOutputMatcher,
  createSupportMatcher,
} from './evaluator/index.js';

// Learning
export { Learner, learn, correctiveRule } from './learner/index.js';
export type { LearnerOptions } from './learner/index.js';

// Mistake store
export type {
  MistakeType,
  Mistake,
  RunStats,
  MistakeStats,
  MistakeStoreFile,
  MistakeStorage,
  MistakeStoreOptions,
} from './mistakes/index.js';
export {
  MISTAKE_TYPES,
  MistakeStore,
  JsonFileMistakeStorage,
  InMemoryMistakeStorage,
  deriveIdentityKey,
  DEFAULT_RECURRING_THRESHOLD,
} from './mistakes/index.js';

// Behavior modification
export { compileConstraints, formatConstraints } from './behavior/index.js';
export type { Constraint, CompileConstraintsOptions } from './behavior/index.js';

// Orchestration
export type { Planner, Executor, Execution, Assessment, RunResult } from './agent/index.js';
export {
  ResearchLoop,
  assessTrace,
  SimulatedPlanner,
  ToolExecutor,
  createEvaluator,
  createLearner,
  openStore,
  createResearchLoop,
  autoLearningRate,
  resolveMistakeRate,
} from './agent/index.js';

// Tools
export { ToolRegistry, createDefaultTools, createCorpusSearch, loadCorpus, summarize } from './tools/index.js';
export type { CorpusDocument, SearchResult, ToolInfo, ToolExecutionRecord } from './tools/index.js';

// Config
export type { ResearchLoopConfig } from './config.js';
export {
  loadConfig,
  saveConfig,
  defaultConfig,
  parseConfig,
  getConfigValue,
  setConfigValue,
  localConfigDir,
  ConfigInvalidError,
} from './config.js';

// Errors and logging
export {
  ResearchLoopError,
  TraceMalformedError,
  PersistenceUnavailableError,
  UnknownMistakeTypeError,
} from './errors.js';
export type { Logger } from './logger.js';
export { consoleLogger, silentLogger, createConsoleLogger } from './logger.js';
