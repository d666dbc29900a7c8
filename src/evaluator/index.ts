/**
 * Trace evaluation
 */

export type {
  CriterionName,
  CriterionResult,
  CriterionWeights,
  Verdict,
  OrderRule,
  ResearchPredicate,
  SupportInput,
  SupportDecision,
  SupportMatcher,
  EvaluatorOptions,
} from './types.js';
export { CRITERION_NAMES } from './types.js';

export {
  Evaluator,
  evaluate,
  computeScore,
  formatFeedback,
  DEFAULT_PASS_THRESHOLD,
  DEFAULT_WEIGHTS,
  DEFAULT_ORDER_RULES,
} from './evaluator.js';

export {
  DEFAULT_RESEARCH_PATTERNS,
  createResearchDetector,
  isResearchQuestion,
  outputText,
  extractTerms,
  evidenceSteps,
  createKeywordOverlapMatcher,
  searchOutputMatcher,
  createSupportMatcher,
} from './heuristics.js';
export type { KeywordOverlapOptions, SupportMode } from './heuristics.js';
