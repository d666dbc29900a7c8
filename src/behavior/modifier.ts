/**
 * Behavior Modifier
 *
 * Projects recurring mistakes into planning constraints. Single occurrences
 * are noise until they reach the threshold. The planner receives the texts
 * verbatim; whether it complies only shows up in the next evaluation.
 */

import { DEFAULT_RECURRING_THRESHOLD, type MistakeStore } from '../mistakes/store.js';
import type { MistakeType } from '../mistakes/types.js';

export interface Constraint {
  text: string;
  /** Frequency of the source mistake. */
  priority: number;
  identity_key: string;
  mistake_type: MistakeType;
}

export interface CompileConstraintsOptions {
  /** Minimum frequency for a mistake to become a constraint (default 2). */
  threshold?: number;
}

/**
 * Ordered by priority descending, then most recently seen. A rule text that
 * two records share is emitted once, at its highest priority.
 */
export function compileConstraints(
  store: Pick<MistakeStore, 'getRecurring'>,
  options?: CompileConstraintsOptions,
): Constraint[] {
  const threshold = options?.threshold ?? DEFAULT_RECURRING_THRESHOLD;
  const seen = new Set<string>();
  const constraints: Constraint[] = [];

  for (const mistake of store.getRecurring(threshold)) {
    if (seen.has(mistake.corrective_rule)) continue;
    seen.add(mistake.corrective_rule);
    constraints.push({
      text: mistake.corrective_rule,
      priority: mistake.frequency,
      identity_key: mistake.identity_key,
      mistake_type: mistake.mistake_type,
    });
  }

  return constraints;
}

/**
 * Planner-facing block of learned constraints; empty when there are none.
 */
export function formatConstraints(constraints: Constraint[]): string {
  if (constraints.length === 0) {
    return '';
  }
  const lines = constraints.map((constraint) => `- ${constraint.text} (priority: ${constraint.priority})`);
  return ['LEARNED CONSTRAINTS (follow these strictly):', ...lines].join('\n');
}
