/**
 * Shared command plumbing: config + store loading and result printing.
 */

import chalk from 'chalk';
import { openStore } from '../agent/setup.js';
import type { Assessment } from '../agent/types.js';
import { loadConfig, type ResearchLoopConfig } from '../config.js';
import { ResearchLoopError, describeCause } from '../errors.js';
import { formatFeedback } from '../evaluator/evaluator.js';
import { createConsoleLogger, type Logger } from '../logger.js';
import type { MistakeStore } from '../mistakes/store.js';
import type { MistakeStats } from '../mistakes/types.js';

export interface CommonOptions {
  json?: boolean;
  verbose?: boolean;
}

export interface CommandContext {
  config: ResearchLoopConfig;
  store: MistakeStore;
  logger: Logger;
}

export async function openContext(options: CommonOptions): Promise<CommandContext> {
  const logger = createConsoleLogger({ verbose: options.verbose });
  try {
    const config = await loadConfig();
    const store = await openStore(config, { logger });
    return { config, store, logger };
  } catch (err) {
    fail(err);
  }
}

export function fail(err: unknown): never {
  const message = err instanceof ResearchLoopError ? err.message : describeCause(err);
  console.log(chalk.red(`✗ ${message}`));
  console.log();
  process.exit(1);
}

export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

export function printAssessment(assessment: Assessment): void {
  const { verdict, mistakes } = assessment;

  console.log(chalk.yellow('📊 Evaluation'));
  const [headline, ...lines] = formatFeedback(verdict);
  console.log(`  ${verdict.passed ? chalk.green(headline) : chalk.red(headline)}`);
  for (const line of lines) {
    console.log(`    ${line}`);
  }
  console.log(`  Score: ${chalk.bold(formatPercent(verdict.score))}`);
  console.log();

  if (mistakes.length > 0) {
    console.log(chalk.yellow('🧠 Learning from mistakes'));
    for (const mistake of mistakes) {
      console.log(`  • ${chalk.red(mistake.mistake_type)}: ${mistake.description}`);
      console.log(`    → ${chalk.green(mistake.corrective_rule)} ${chalk.dim(`(seen ${mistake.frequency}x)`)}`);
    }
    console.log();
  } else if (verdict.score === 1) {
    console.log(chalk.green('  ✓ No mistakes detected'));
    console.log();
  }

  if (assessment.persistence_error) {
    console.log(chalk.yellow('⚠ Learning could not be saved for this run'));
    console.log(chalk.dim(`  ${assessment.persistence_error}`));
    console.log();
  }
}

export function printStats(stats: MistakeStats): void {
  console.log(`  total runs:         ${stats.total_runs}`);
  console.log(`  successful runs:    ${stats.successful_runs}`);
  console.log(`  failed runs:        ${stats.failed_runs}`);
  console.log(`  success rate:       ${formatPercent(stats.success_rate)}`);
  console.log(`  mistakes recorded:  ${stats.total_mistakes}`);
  console.log(`  recurring patterns: ${stats.recurring_patterns}`);
}
