/**
 * research-loop run <question> — Plan, execute, evaluate and learn
 */

import chalk from 'chalk';
import ora from 'ora';
import { createResearchLoop, resolveMistakeRate } from '../agent/setup.js';
import type { RunResult } from '../agent/types.js';
import { fail, formatPercent, openContext, printAssessment, printStats, type CommonOptions } from './shared.js';

interface RunOptions extends CommonOptions {
  mistakeRate?: string;
}

export async function runCommand(question: string, options: RunOptions): Promise<void> {
  console.log();

  const { config, store, logger } = await openContext(options);
  const mistakeRate = parseMistakeRate(options.mistakeRate);

  const { total_runs } = store.getStats();
  const autoRate = config.agent.autoLearning && config.agent.mistakeRate === 0 && mistakeRate === undefined;
  if (autoRate && !options.json) {
    const rate = resolveMistakeRate(config, total_runs);
    if (rate > 0) {
      console.log(chalk.yellow(`🎓 Learning mode: run ${total_runs + 1}, mistake rate ${formatPercent(rate)}`));
      console.log();
    }
  }

  const spinner = options.json ? null : ora('Researching...').start();
  let result: RunResult;
  try {
    const loop = await createResearchLoop(config, { store, mistakeRate, logger });
    result = await loop.run(question);
    spinner?.succeed('Research complete');
  } catch (err) {
    spinner?.fail('Research failed');
    fail(err);
  }

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  printRun(result);
}

export function printRun(result: RunResult): void {
  console.log();
  console.log(`${chalk.bold('🔬 Question:')} ${result.question}`);
  console.log();

  if (result.constraints.length > 0) {
    console.log(chalk.cyan(`🧠 Applied ${result.constraints.length} learned constraint(s)`));
    for (const constraint of result.constraints) {
      console.log(chalk.dim(`  - ${constraint.text} (priority: ${constraint.priority})`));
    }
    console.log();
  }

  console.log(chalk.yellow('📋 Plan'));
  result.plan.forEach((step, index) => {
    const tool = step.tool ? chalk.blue(`[${step.tool}]`) : chalk.dim('[no tool]');
    console.log(`  ${index + 1}. ${step.action} ${tool}`);
  });
  console.log();

  console.log(chalk.yellow('⚙️  Execution'));
  if (result.trace.executed_steps.length === 0) {
    console.log(chalk.dim('  No tools executed'));
  }
  for (const step of result.trace.executed_steps) {
    const status = step.succeeded ? chalk.green('✓') : chalk.red('✗');
    console.log(`  ${status} ${step.tool ?? 'step'}${step.error ? chalk.dim(` (${step.error})`) : ''}`);
  }
  console.log();

  console.log(chalk.green('💡 Answer'));
  console.log(`  ${result.answer}`);
  console.log();

  printAssessment(result);

  console.log(chalk.cyan('📈 Learning progress'));
  printStats(result.stats);
  console.log();
}

function parseMistakeRate(raw?: string): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    console.log(chalk.red('✗ --mistake-rate must be a number between 0 and 1'));
    process.exit(1);
  }
  return value;
}
