/**
 * Trace model: one research run's plan, executed steps and answer.
 */

export const TOOL_NAMES = ['search', 'summarize'] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

/** Legacy spellings accepted when parsing externally produced traces. */
export const TOOL_ALIASES: Readonly<Record<string, ToolName>> = {
  web_search: 'search',
  summarizer: 'summarize',
};

export interface PlannedStep {
  action: string;
  tool?: ToolName;
  rationale: string;
  /** Optional steps are not counted as required tool usage. */
  optional?: boolean;
}

export interface ExecutedStep {
  tool?: ToolName;
  succeeded: boolean;
  /** Opaque tool output; only its textual content is inspected. */
  output: unknown;
  error?: string;
}

export interface Trace {
  question: string;
  plan_steps: PlannedStep[];
  /** Actual execution order, independent of `plan_steps`. */
  executed_steps: ExecutedStep[];
  final_answer: string;
  /** Explicit research flag; overrides the question heuristic when set. */
  requires_research?: boolean;
  execution_time_seconds?: number;
}

export function isToolName(value: unknown): value is ToolName {
  return typeof value === 'string' && (TOOL_NAMES as readonly string[]).includes(value);
}

export function sortTools(tools: Iterable<ToolName>): ToolName[] {
  return [...new Set(tools)].sort((a, b) => a.localeCompare(b));
}
