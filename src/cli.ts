#!/usr/bin/env node

/**
 * research-loop CLI
 *
 * A research agent that learns from its own mistakes.
 *
 * Usage:
 *   research-loop run <question>        Plan, execute, evaluate and learn
 *   research-loop evaluate <trace.json> Score an externally produced trace
 *   research-loop stats                 Learning statistics
 *   research-loop mistakes              List learned mistakes
 *   research-loop constraints           Constraints for the next plan
 *   research-loop clear --force         Forget everything learned
 *   research-loop demo                  Watch the loop improve
 *   research-loop config                View/edit configuration
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import {
  runCommand,
  evaluateCommand,
  statsCommand,
  mistakesCommand,
  constraintsCommand,
  clearCommand,
  demoCommand,
  configCommand,
} from './commands/index.js';

// Get version from package.json
const require = createRequire(import.meta.url);
const { version } = require('../package.json');

const program = new Command();

program
  .name('research-loop')
  .description('A research agent that learns from its own mistakes.')
  .version(version);

// ─── research-loop run ───────────────────────────────────────

program
  .command('run <question>')
  .description('Plan, execute, evaluate and learn from one research question')
  .option('-m, --mistake-rate <p>', 'Probability (0-1) that the simulated agent cuts corners')
  .option('--json', 'Output as JSON')
  .option('-v, --verbose', 'Show detailed progress')
  .action(runCommand);

// ─── research-loop evaluate ──────────────────────────────────

program
  .command('evaluate <trace-file>')
  .description('Score a trace JSON file and learn from its mistakes')
  .option('--no-learn', 'Score only; do not update the mistake store')
  .option('--json', 'Output as JSON')
  .option('-v, --verbose', 'Show detailed progress')
  .action(evaluateCommand);

// ─── research-loop stats ─────────────────────────────────────

program
  .command('stats')
  .description('Show learning statistics')
  .option('--json', 'Output as JSON')
  .action(statsCommand);

// ─── research-loop mistakes ──────────────────────────────────

program
  .command('mistakes')
  .description('List learned mistakes, most frequent first')
  .option('--all', 'Include single occurrences')
  .option('--min <n>', 'Minimum frequency to show')
  .option('--json', 'Output as JSON')
  .action(mistakesCommand);

// ─── research-loop constraints ───────────────────────────────

program
  .command('constraints')
  .description('Show the planning constraints the next run will receive')
  .option('--json', 'Output as JSON')
  .action(constraintsCommand);

// ─── research-loop clear ─────────────────────────────────────

program
  .command('clear')
  .description('Forget all learned mistakes and run statistics')
  .option('-f, --force', 'Clear without confirmation')
  .action(clearCommand);

// ─── research-loop demo ──────────────────────────────────────

program
  .command('demo')
  .description('Run several questions and watch the agent learn')
  .option('-r, --runs <n>', 'Number of runs (default 6)')
  .option('--keep', 'Keep existing memory instead of starting fresh')
  .action(demoCommand);

// ─── research-loop config ────────────────────────────────────

program
  .command('config')
  .description('View/edit research-loop configuration')
  .option('--set <key=value>', 'Set a config value')
  .option('--json', 'Output as JSON')
  .action(configCommand);

// ─── Parse & run ─────────────────────────────────────────────

program.parse();
