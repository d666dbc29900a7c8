/**
 * research-loop evaluate <trace-file> — Score an externally produced trace
 */

import { readFile } from 'node:fs/promises';
import chalk from 'chalk';
import { createEvaluator, createLearner } from '../agent/setup.js';
import { assessTrace } from '../agent/loop.js';
import type { Assessment } from '../agent/types.js';
import { fail, openContext, printAssessment, type CommonOptions } from './shared.js';

interface EvaluateOptions extends CommonOptions {
  /** Commander sets this false for --no-learn. */
  learn?: boolean;
}

export async function evaluateCommand(traceFile: string, options: EvaluateOptions): Promise<void> {
  console.log();

  const { config, store, logger } = await openContext(options);

  let assessment: Assessment;
  try {
    const raw = JSON.parse(await readFile(traceFile, 'utf-8')) as unknown;
    assessment = await assessTrace(
      raw,
      { store, evaluator: createEvaluator(config), learner: createLearner(config), logger },
      { learn: options.learn },
    );
  } catch (err) {
    fail(err);
  }

  if (options.json) {
    console.log(JSON.stringify(assessment, null, 2));
    return;
  }

  console.log(`${chalk.bold('🔬 Question:')} ${assessment.trace.question}`);
  console.log(chalk.dim(`   ${traceFile}`));
  console.log();
  printAssessment(assessment);

  if (options.learn === false) {
    console.log(chalk.dim('  Scored only; nothing was saved (--no-learn).'));
    console.log();
  }
}
