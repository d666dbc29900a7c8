/**
 * Evaluator types
 */

import type { ExecutedStep, ToolName } from '../trace/types.js';

export const CRITERION_NAMES = [
  'required_tools_used',
  'correct_sequence',
  'answer_supported_by_data',
] as const;

export type CriterionName = (typeof CRITERION_NAMES)[number];

export interface CriterionResult {
  passed: boolean;
  weight: number;
  detail: string;
  /** Tools the outcome is about: missing tools, or the out-of-order pair. */
  tools: ToolName[];
}

export interface Verdict {
  criteria: Record<CriterionName, CriterionResult>;
  /** Weighted fraction of passed criteria, derived from `criteria`. */
  score: number;
  passed: boolean;
  /** Details of the failing criteria, in criterion order. */
  issues: string[];
}

export type CriterionWeights = Record<CriterionName, number>;

/** `[before, after]`: `before` must run ahead of `after` when both are used. */
export type OrderRule = readonly [ToolName, ToolName];

/** Decides whether a question needs fresh research (and so the search tool). */
export type ResearchPredicate = (question: string) => boolean;

export interface SupportInput {
  answer: string;
  steps: ExecutedStep[];
}

export interface SupportDecision {
  supported: boolean;
  detail: string;
}

/** Best-effort grounding check between the final answer and tool output. */
export type SupportMatcher = (input: SupportInput) => SupportDecision;

export interface EvaluatorOptions {
  weights?: Partial<CriterionWeights>;
  /** Inclusive pass threshold for the score (default 0.66). */
  passThreshold?: number;
  researchDetector?: ResearchPredicate;
  supportMatcher?: SupportMatcher;
  orderRules?: readonly OrderRule[];
}
