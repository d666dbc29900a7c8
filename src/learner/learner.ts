/**
 * Learner: failing criteria -> typed mistakes
 *
 * Each failing criterion maps to exactly one mistake type with a fixed
 * corrective rule. PREMATURE_ANSWER subsumes TOOL_SKIPPED when nothing ran.
 */

import { UnknownMistakeTypeError } from '../errors.js';
import type { CriterionName, Verdict } from '../evaluator/types.js';
import { deriveIdentityKey, mistakePriority } from '../mistakes/identity.js';
import type { Mistake, MistakeType } from '../mistakes/types.js';
import { sortTools, type ToolName, type Trace } from '../trace/types.js';

export interface LearnerOptions {
  now?: () => Date;
  /**
   * Only learn from runs whose verdict failed overall. By default a passing
   * verdict with a failed criterion still yields that criterion's mistake.
   */
  onlyFailedRuns?: boolean;
}

interface Finding {
  type: MistakeType;
  /** Sorted, for the identity key. */
  tools: ToolName[];
  /** As reported by the criterion; WRONG_ORDER keeps `[before, after]`. */
  ruleTools: ToolName[];
  detail: string;
}

export class Learner {
  private readonly now: () => Date;
  private readonly onlyFailedRuns: boolean;

  constructor(options?: LearnerOptions) {
    this.now = options?.now ?? (() => new Date());
    this.onlyFailedRuns = options?.onlyFailedRuns ?? false;
  }

  learn(trace: Trace, verdict: Verdict): Mistake[] {
    if (this.onlyFailedRuns && verdict.passed) {
      return [];
    }

    const findings = classify(trace, verdict);
    const lastSeen = this.now().toISOString();

    return findings
      .sort((a, b) => mistakePriority(a.type) - mistakePriority(b.type))
      .map((finding) => ({
        mistake_type: finding.type,
        description: describeMistake(finding, trace),
        corrective_rule: correctiveRule(finding.type, finding.ruleTools),
        tools: finding.tools,
        identity_key: deriveIdentityKey(finding.type, finding.tools),
        frequency: 1,
        last_seen: lastSeen,
        question: trace.question,
      }));
  }
}

function classify(trace: Trace, verdict: Verdict): Finding[] {
  const failed = (name: CriterionName) => !verdict.criteria[name].passed;
  const nothingRan = trace.executed_steps.length === 0;
  const findings: Finding[] = [];

  if (failed('answer_supported_by_data')) {
    findings.push({
      type: nothingRan ? 'PREMATURE_ANSWER' : 'UNSUPPORTED_CLAIM',
      tools: [],
      ruleTools: [],
      detail: verdict.criteria.answer_supported_by_data.detail,
    });
  }

  if (failed('required_tools_used') && !(nothingRan && failed('answer_supported_by_data'))) {
    // An undecided criterion names no tools; search is the research tool.
    const reported = verdict.criteria.required_tools_used.tools;
    const tools = sortTools(reported.length > 0 ? reported : ['search']);
    findings.push({
      type: 'TOOL_SKIPPED',
      tools,
      ruleTools: tools,
      detail: verdict.criteria.required_tools_used.detail,
    });
  }

  if (failed('correct_sequence')) {
    findings.push({
      type: 'WRONG_ORDER',
      tools: sortTools(verdict.criteria.correct_sequence.tools),
      ruleTools: [...verdict.criteria.correct_sequence.tools],
      detail: verdict.criteria.correct_sequence.detail,
    });
  }

  return findings;
}

/**
 * Imperative constraint text for a mistake.
 *
 * For WRONG_ORDER the tools are the `[before, after]` pair; with the default
 * ordering rule that is `search` then `summarize`.
 */
export function correctiveRule(type: MistakeType, tools: readonly ToolName[]): string {
  switch (type) {
    case 'PREMATURE_ANSWER':
      return 'NEVER answer without using a research tool first';
    case 'TOOL_SKIPPED':
      return `ALWAYS execute ${tools.join(' and ')} before attempting to answer`;
    case 'WRONG_ORDER':
      return `Execute ${tools[0] ?? 'search'} BEFORE ${tools[1] ?? 'summarize'}`;
    case 'UNSUPPORTED_CLAIM':
      return 'Base the final answer strictly on tool output';
    default:
      throw new UnknownMistakeTypeError(type satisfies never);
  }
}

function describeMistake(finding: Finding, trace: Trace): string {
  switch (finding.type) {
    case 'PREMATURE_ANSWER':
      return `Answered without gathering data: ${trace.question}`;
    case 'TOOL_SKIPPED':
      return `Skipped ${finding.tools.join(', ')} for: ${trace.question}`;
    case 'WRONG_ORDER':
      return `Tools executed in wrong order (${finding.detail}) for: ${trace.question}`;
    case 'UNSUPPORTED_CLAIM':
      return `Answer not backed by tool output (${finding.detail}) for: ${trace.question}`;
    default:
      throw new UnknownMistakeTypeError(finding.type satisfies never);
  }
}

export function learn(trace: Trace, verdict: Verdict, options?: LearnerOptions): Mistake[] {
  return new Learner(options).learn(trace, verdict);
}
