/**
 * Trace validation
 *
 * Externally produced traces (planner/executor output, JSON files handed to
 * `research-loop evaluate`) are validated here before anything scores them.
 */

import { z } from 'zod';
import { TraceMalformedError } from '../errors.js';
import { TOOL_ALIASES, TOOL_NAMES, type Trace } from './types.js';

export const ToolNameSchema = z.preprocess(
  (value) => (typeof value === 'string' ? TOOL_ALIASES[value.trim()] ?? value.trim() : value),
  z.enum(TOOL_NAMES),
);

const OptionalToolSchema = ToolNameSchema.nullish().transform((value) => value ?? undefined);

export const PlannedStepSchema = z.object({
  action: z.string(),
  tool: OptionalToolSchema,
  rationale: z.string().default(''),
  optional: z.boolean().optional(),
});

export const ExecutedStepSchema = z.object({
  tool: OptionalToolSchema,
  succeeded: z.boolean(),
  output: z.unknown(),
  error: z.string().optional(),
});

export const TraceSchema = z.object({
  question: z.string().trim().min(1, 'question must not be empty'),
  plan_steps: z.array(PlannedStepSchema),
  executed_steps: z.array(ExecutedStepSchema),
  final_answer: z.string(),
  requires_research: z.boolean().optional(),
  execution_time_seconds: z.number().nonnegative().optional(),
});

/**
 * Validate an unknown value as a Trace.
 *
 * @throws TraceMalformedError listing every schema issue as `path: message`
 */
export function parseTrace(input: unknown): Trace {
  const result = TraceSchema.safeParse(input);
  if (!result.success) {
    throw new TraceMalformedError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  const data = result.data;
  return {
    question: data.question,
    plan_steps: data.plan_steps.map((step) => ({
      action: step.action,
      tool: step.tool,
      rationale: step.rationale,
      optional: step.optional,
    })),
    executed_steps: data.executed_steps.map((step) => ({
      tool: step.tool,
      succeeded: step.succeeded,
      output: step.output,
      error: step.error,
    })),
    final_answer: data.final_answer,
    requires_research: data.requires_research,
    execution_time_seconds: data.execution_time_seconds,
  };
}
