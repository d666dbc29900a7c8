/**
 * research-loop clear — Forget all learned mistakes and run statistics
 */

import chalk from 'chalk';
import { fail, openContext, type CommonOptions } from './shared.js';

interface ClearOptions extends CommonOptions {
  force?: boolean;
}

export async function clearCommand(options: ClearOptions): Promise<void> {
  console.log();

  const { store } = await openContext(options);
  const stats = store.getStats();

  if (!options.force) {
    console.log(chalk.yellow(`This removes ${stats.total_mistakes} mistake(s) and ${stats.total_runs} recorded run(s).`));
    console.log(chalk.dim('  Use --force to confirm.'));
    console.log();
    return;
  }

  try {
    await store.clear();
  } catch (err) {
    fail(err);
  }

  console.log(chalk.green('✓ Memory cleared'));
  console.log();
}
