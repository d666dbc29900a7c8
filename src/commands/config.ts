/**
 * research-loop config — View/edit configuration
 */

import chalk from 'chalk';
import { loadConfig, localConfigPath, saveConfig, setConfigValue } from '../config.js';
import { fail } from './shared.js';

interface ConfigOptions {
  set?: string;
  json?: boolean;
}

export async function configCommand(options: ConfigOptions): Promise<void> {
  console.log();

  try {
    const config = await loadConfig();

    if (options.set) {
      const separator = options.set.indexOf('=');
      if (separator <= 0) {
        console.log(chalk.red('✗ Use --set key=value, e.g. --set learning.frequencyThreshold=3'));
        process.exit(1);
      }
      const key = options.set.slice(0, separator).trim();
      const value = options.set.slice(separator + 1).trim();
      const updated = setConfigValue(config, key, value);
      await saveConfig(updated);
      console.log(chalk.green(`✓ Set ${key} = ${value}`));
      console.log(chalk.dim(`  ${localConfigPath()}`));
      console.log();
      return;
    }

    if (options.json) {
      console.log(JSON.stringify(config, null, 2));
      return;
    }

    console.log(chalk.bold('⚙️  Configuration'));
    console.log(chalk.dim(`   ${localConfigPath()}`));
    console.log();
    console.log(`  pass threshold:       ${config.evaluation.passThreshold}`);
    console.log(`  support check:        ${config.evaluation.support.mode} (min ${config.evaluation.support.minSharedTerms} terms)`);
    console.log(`  research patterns:    ${config.evaluation.researchPatterns.length}`);
    console.log(`  constraint threshold: ${config.learning.frequencyThreshold}`);
    console.log(`  max mistakes:         ${config.learning.maxMistakes}`);
    console.log(`  learn from:           ${config.learning.onlyFailedRuns ? 'failed runs' : 'every failed criterion'}`);
    console.log(`  agent mistake rate:   ${config.agent.mistakeRate}`);
    console.log(`  corpus:               ${config.agent.corpusPath ?? chalk.dim('bundled')}`);
    console.log();
  } catch (err) {
    fail(err);
  }
}
