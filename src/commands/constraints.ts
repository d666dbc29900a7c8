/**
 * research-loop constraints — Planning constraints the next run will receive
 */

import chalk from 'chalk';
import { compileConstraints } from '../behavior/modifier.js';
import { openContext, type CommonOptions } from './shared.js';

export async function constraintsCommand(options: CommonOptions): Promise<void> {
  console.log();

  const { config, store } = await openContext(options);
  const constraints = compileConstraints(store, { threshold: config.learning.frequencyThreshold });

  if (options.json) {
    console.log(JSON.stringify(constraints, null, 2));
    return;
  }

  console.log(chalk.bold('🧭 Planning constraints'));
  console.log(chalk.dim(`   threshold: frequency >= ${config.learning.frequencyThreshold}`));
  console.log();

  if (constraints.length === 0) {
    console.log(chalk.dim('  No learned constraints yet.'));
    console.log();
    return;
  }

  constraints.forEach((constraint, index) => {
    console.log(`  ${index + 1}. ${constraint.text} ${chalk.dim(`(priority: ${constraint.priority})`)}`);
  });
  console.log();
}
