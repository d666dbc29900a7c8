/**
 * Rule-based trace evaluator
 *
 * Scores a Trace against three deterministic criteria. Scoring is a pure
 * function of the trace: no clock, no I/O, no model calls.
 */

import { describeCause } from '../errors.js';
import { sortTools, type ToolName, type Trace } from '../trace/types.js';
import { createKeywordOverlapMatcher, evidenceSteps, isResearchQuestion } from './heuristics.js';
import {
  CRITERION_NAMES,
  type CriterionName,
  type CriterionResult,
  type CriterionWeights,
  type EvaluatorOptions,
  type OrderRule,
  type ResearchPredicate,
  type SupportMatcher,
  type Verdict,
} from './types.js';

export const DEFAULT_PASS_THRESHOLD = 0.66;

export const DEFAULT_WEIGHTS: CriterionWeights = {
  required_tools_used: 1 / 3,
  correct_sequence: 1 / 3,
  answer_supported_by_data: 1 / 3,
};

export const DEFAULT_ORDER_RULES: readonly OrderRule[] = [['search', 'summarize']];

type Decision = Omit<CriterionResult, 'weight'>;

export class Evaluator {
  private readonly weights: CriterionWeights;
  private readonly passThreshold: number;
  private readonly researchDetector: ResearchPredicate;
  private readonly supportMatcher: SupportMatcher;
  private readonly orderRules: readonly OrderRule[];

  constructor(options?: EvaluatorOptions) {
    this.weights = { ...DEFAULT_WEIGHTS, ...options?.weights };
    this.passThreshold = options?.passThreshold ?? DEFAULT_PASS_THRESHOLD;
    this.researchDetector = options?.researchDetector ?? isResearchQuestion;
    this.supportMatcher = options?.supportMatcher ?? createKeywordOverlapMatcher();
    this.orderRules = options?.orderRules ?? DEFAULT_ORDER_RULES;
  }

  evaluate(trace: Trace): Verdict {
    const criteria: Record<CriterionName, CriterionResult> = {
      required_tools_used: this.decide('required_tools_used', () => this.checkRequiredTools(trace)),
      correct_sequence: this.decide('correct_sequence', () => this.checkSequence(trace)),
      answer_supported_by_data: this.decide('answer_supported_by_data', () => this.checkSupport(trace)),
    };

    const score = computeScore(criteria);

    return {
      criteria,
      score,
      passed: score >= this.passThreshold,
      issues: CRITERION_NAMES.filter((name) => !criteria[name].passed).map(
        (name) => criteria[name].detail,
      ),
    };
  }

  /** Tools the trace must have run successfully. */
  requiredTools(trace: Trace): ToolName[] {
    const required = new Set<ToolName>();
    for (const step of trace.plan_steps) {
      if (step.tool && !step.optional) {
        required.add(step.tool);
      }
    }
    if (trace.requires_research ?? this.researchDetector(trace.question)) {
      required.add('search');
    }
    return sortTools(required);
  }

  private decide(name: CriterionName, check: () => Decision): CriterionResult {
    const weight = this.weights[name];
    try {
      return { ...check(), weight };
    } catch (err) {
      // An undecidable criterion counts as failed; scoring stays total.
      return { passed: false, weight, detail: `Could not decide: ${describeCause(err)}`, tools: [] };
    }
  }

  private checkRequiredTools(trace: Trace): Decision {
    const required = this.requiredTools(trace);

    if (trace.executed_steps.length === 0) {
      return {
        passed: false,
        detail: 'No steps were executed before answering',
        tools: required,
      };
    }

    const succeeded = new Set<ToolName>();
    for (const step of trace.executed_steps) {
      if (step.tool && step.succeeded) {
        succeeded.add(step.tool);
      }
    }

    const missing = required.filter((tool) => !succeeded.has(tool));
    if (missing.length > 0) {
      return {
        passed: false,
        detail: `Required tool(s) not executed successfully: ${missing.join(', ')}`,
        tools: missing,
      };
    }

    return {
      passed: true,
      detail: required.length > 0
        ? `All required tools executed: ${required.join(', ')}`
        : 'No tools required',
      tools: [],
    };
  }

  private checkSequence(trace: Trace): Decision {
    const order: ToolName[] = [];
    for (const step of trace.executed_steps) {
      if (step.tool) {
        order.push(step.tool);
      }
    }

    for (const [before, after] of this.orderRules) {
      const beforeIndex = order.indexOf(before);
      const afterIndex = order.indexOf(after);
      if (beforeIndex === -1 || afterIndex === -1) {
        continue;
      }
      if (afterIndex < beforeIndex) {
        return {
          passed: false,
          detail: `${after} executed before ${before}`,
          tools: [before, after],
        };
      }
    }

    return {
      passed: true,
      detail: order.length > 0 ? 'Tools executed in the expected order' : 'No tools were used',
      tools: [],
    };
  }

  private checkSupport(trace: Trace): Decision {
    if (trace.executed_steps.length === 0) {
      return { passed: false, detail: 'Final answer produced without executing any step', tools: [] };
    }

    if (evidenceSteps(trace.executed_steps).length === 0) {
      return { passed: false, detail: 'No executed step produced output', tools: [] };
    }

    const decision = this.supportMatcher({
      answer: trace.final_answer,
      steps: trace.executed_steps,
    });
    return { passed: decision.supported, detail: decision.detail, tools: [] };
  }
}

/**
 * Weighted fraction of passed criteria. Zero when every weight is zero.
 */
export function computeScore(criteria: Record<CriterionName, CriterionResult>): number {
  let total = 0;
  let passed = 0;
  for (const name of CRITERION_NAMES) {
    const criterion = criteria[name];
    total += criterion.weight;
    if (criterion.passed) {
      passed += criterion.weight;
    }
  }
  return total > 0 ? passed / total : 0;
}

export function evaluate(trace: Trace, options?: EvaluatorOptions): Verdict {
  return new Evaluator(options).evaluate(trace);
}

const CRITERION_LABELS: Record<CriterionName, string> = {
  required_tools_used: 'Required tools used',
  correct_sequence: 'Correct sequence',
  answer_supported_by_data: 'Answer supported by data',
};

/**
 * Human-readable breakdown of a verdict, one line per finding.
 */
export function formatFeedback(verdict: Verdict): string[] {
  const lines = CRITERION_NAMES.map((name) => {
    const criterion = verdict.criteria[name];
    return `${criterion.passed ? '✓' : '✗'} ${CRITERION_LABELS[name]}: ${criterion.detail}`;
  });

  if (verdict.score === 1) {
    return ['All criteria met.', ...lines];
  }
  return [verdict.passed ? 'Acceptable but could improve.' : 'Failed evaluation.', ...lines];
}
