/**
 * research-loop demo — Show learning across repeated runs
 *
 * The first half of the runs cut corners often; the second half rarely.
 * Recurring mistakes from the first half become constraints for the second.
 */

import chalk from 'chalk';
import { createResearchLoop } from '../agent/setup.js';
import { silentLogger } from '../logger.js';
import { fail, formatPercent, openContext, printStats, type CommonOptions } from './shared.js';

interface DemoOptions extends CommonOptions {
  runs?: string;
  keep?: boolean;
}

const DEMO_QUESTIONS = [
  'What is the capital of France?',
  'What is the population of Tokyo?',
  'Who invented the telephone?',
  'How tall is Mount Everest?',
  'When does water boil at sea level?',
  'How fast does light travel?',
];

const EARLY_MISTAKE_RATE = 0.7;
const LATE_MISTAKE_RATE = 0.2;

export async function demoCommand(options: DemoOptions): Promise<void> {
  console.log();

  const runs = parseRuns(options.runs);
  const { config, store } = await openContext(options);

  try {
    if (!options.keep) {
      await store.clear();
    }

    console.log(chalk.magenta.bold('🎓 Self-improving research loop'));
    console.log(chalk.dim(`   ${runs} runs, mistake rate ${EARLY_MISTAKE_RATE} then ${LATE_MISTAKE_RATE}`));
    console.log();

    const early = await createResearchLoop(config, { store, mistakeRate: EARLY_MISTAKE_RATE, logger: silentLogger });
    const late = await createResearchLoop(config, { store, mistakeRate: LATE_MISTAKE_RATE, logger: silentLogger });
    const switchAt = Math.ceil(runs / 2);

    for (let index = 0; index < runs; index++) {
      const loop = index < switchAt ? early : late;
      const question = DEMO_QUESTIONS[index % DEMO_QUESTIONS.length];
      const result = await loop.run(question);

      const status = result.verdict.passed ? chalk.green('pass') : chalk.red('fail');
      const learned = result.mistakes.map((mistake) => mistake.mistake_type).join(', ') || '—';
      console.log(
        `  ${String(index + 1).padStart(2)}. ${status} ${formatPercent(result.verdict.score).padStart(6)}  ` +
          `constraints=${result.constraints.length}  mistakes=${learned}`,
      );
      console.log(chalk.dim(`      ${question}`));
    }
  } catch (err) {
    fail(err);
  }

  console.log();
  console.log(chalk.cyan('📈 Final statistics'));
  printStats(store.getStats());
  console.log();
}

function parseRuns(raw?: string): number {
  if (raw === undefined) return 6;
  const value = parseInt(raw, 10);
  if (!Number.isInteger(value) || value < 1 || value > 100) {
    console.log(chalk.red('✗ --runs must be an integer between 1 and 100'));
    process.exit(1);
  }
  return value;
}
