/**
 * Mistake model and durable store file shape
 */

import type { ToolName } from '../trace/types.js';

export const MISTAKE_TYPES = [
  'PREMATURE_ANSWER',
  'TOOL_SKIPPED',
  'WRONG_ORDER',
  'UNSUPPORTED_CLAIM',
] as const;

/** Listed in priority order: earlier types subsume later ones in one run. */
export type MistakeType = (typeof MISTAKE_TYPES)[number];

export interface Mistake {
  mistake_type: MistakeType;
  description: string;
  corrective_rule: string;
  /** Sorted tool names the mistake is about. */
  tools: ToolName[];
  /** `mistake_type + ":" + tools.join(",")` */
  identity_key: string;
  frequency: number;
  /** ISO-8601 */
  last_seen: string;
  /** Question of the most recent occurrence. */
  question?: string;
}

export interface RunStats {
  total_runs: number;
  successful_runs: number;
}

export interface MistakeStoreFile {
  version: 1;
  mistakes: Mistake[];
  run_stats: RunStats;
}

export interface MistakeStats extends RunStats {
  failed_runs: number;
  /** successful_runs / total_runs, 0 when no runs were recorded. */
  success_rate: number;
  total_mistakes: number;
  recurring_patterns: number;
}

/**
 * Durable backing for a MistakeStore. `read` resolves null when nothing has
 * been written yet; `write` replaces the whole file.
 */
export interface MistakeStorage {
  readonly location: string;
  read(): Promise<unknown | null>;
  write(file: MistakeStoreFile): Promise<void>;
}

export function emptyStoreFile(): MistakeStoreFile {
  return { version: 1, mistakes: [], run_stats: { total_runs: 0, successful_runs: 0 } };
}
