/**
 * research-loop stats — Learning statistics
 */

import chalk from 'chalk';
import { openContext, printStats, type CommonOptions } from './shared.js';

export async function statsCommand(options: CommonOptions): Promise<void> {
  console.log();

  const { store } = await openContext(options);
  const stats = store.getStats();

  if (options.json) {
    console.log(JSON.stringify(stats, null, 2));
    return;
  }

  console.log(chalk.bold('📊 Learning statistics'));
  console.log(chalk.dim(`   ${store.location}`));
  console.log();
  printStats(stats);
  console.log();
}
