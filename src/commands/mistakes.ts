/**
 * research-loop mistakes — List learned mistakes
 */

import chalk from 'chalk';
import { openContext, type CommonOptions } from './shared.js';

interface MistakesOptions extends CommonOptions {
  all?: boolean;
  min?: string;
}

export async function mistakesCommand(options: MistakesOptions): Promise<void> {
  console.log();

  const { config, store } = await openContext(options);
  const minFrequency = options.all ? 1 : parseMin(options.min) ?? config.learning.frequencyThreshold;
  const mistakes = store.getRecurring(minFrequency);

  if (options.json) {
    console.log(JSON.stringify(mistakes, null, 2));
    return;
  }

  console.log(chalk.bold('🧠 Learned mistakes'));
  console.log(chalk.dim(`   ${store.location}  (frequency >= ${minFrequency})`));
  console.log();

  if (mistakes.length === 0) {
    console.log(chalk.dim('  No mistakes recorded at this frequency.'));
    if (!options.all) {
      console.log(chalk.dim('  Show single occurrences too: research-loop mistakes --all'));
    }
    console.log();
    return;
  }

  for (const mistake of mistakes) {
    console.log(`  ${chalk.cyan(mistake.identity_key.padEnd(32))} ${String(mistake.frequency).padStart(4)}x  ${chalk.dim(mistake.last_seen)}`);
    console.log(`    rule: ${mistake.corrective_rule}`);
    console.log(chalk.dim(`    ${mistake.description}`));
  }
  console.log();
}

function parseMin(raw?: string): number | undefined {
  if (raw === undefined) return undefined;
  const value = parseInt(raw, 10);
  if (!Number.isInteger(value) || value < 1) {
    console.log(chalk.red('✗ --min must be a positive integer'));
    process.exit(1);
  }
  return value;
}
