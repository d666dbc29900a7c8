/**
 * research-loop configuration
 *
 * Manages .research-loop/config.json in the current project directory.
 * Also supports global config at ~/.research-loop/config.json.
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { ResearchLoopError } from './errors.js';
import { DEFAULT_RESEARCH_PATTERNS } from './evaluator/heuristics.js';

/** Directory name for local research-loop state */
export const CONFIG_DIR = '.research-loop';

/** Config filename */
export const CONFIG_FILE = 'config.json';

/** Global research-loop home directory */
export const GLOBAL_CONFIG_DIR = join(homedir(), CONFIG_DIR);

function isRegexSource(source: string): boolean {
  try {
    new RegExp(source, 'i');
    return true;
  } catch {
    return false;
  }
}

const WeightsSchema = z.object({
  required_tools_used: z.number().nonnegative().default(1 / 3),
  correct_sequence: z.number().nonnegative().default(1 / 3),
  answer_supported_by_data: z.number().nonnegative().default(1 / 3),
});

export const ResearchLoopConfigSchema = z.object({
  version: z.string().default('0.1.0'),
  evaluation: z
    .object({
      /** Inclusive score threshold for a passing run */
      passThreshold: z.number().min(0).max(1).default(0.66),
      weights: WeightsSchema.default({}),
      /** Regex sources for research-requiring questions */
      researchPatterns: z
        .array(z.string().refine(isRegexSource, { message: 'invalid regular expression' }))
        .default([...DEFAULT_RESEARCH_PATTERNS]),
      support: z
        .object({
          mode: z.enum(['keyword-overlap', 'search-output']).default('keyword-overlap'),
          minSharedTerms: z.number().int().min(1).default(2),
        })
        .default({}),
    })
    .default({}),
  learning: z
    .object({
      /** Frequency at which a mistake becomes a planning constraint */
      frequencyThreshold: z.number().int().min(1).default(2),
      maxMistakes: z.number().int().min(1).default(100),
      onlyFailedRuns: z.boolean().default(false),
    })
    .default({}),
  agent: z
    .object({
      /** Probability (0-1) that the simulated agent cuts a corner */
      mistakeRate: z.number().min(0).max(1).default(0),
      /** Follow the early-run mistake schedule while mistakeRate is 0 */
      autoLearning: z.boolean().default(true),
      maxSearchResults: z.number().int().min(1).default(5),
      summaryMaxLength: z.number().int().min(50).default(500),
      /** JSON corpus for the offline search tool; bundled corpus when unset */
      corpusPath: z.string().optional(),
    })
    .default({}),
});

export type ResearchLoopConfig = z.infer<typeof ResearchLoopConfigSchema>;

export class ConfigInvalidError extends ResearchLoopError {
  constructor(
    readonly path: string,
    readonly issues: string[],
  ) {
    super('CONFIG_INVALID', `Invalid configuration in ${path}: ${issues.join('; ')}`);
  }
}

/**
 * Default configuration for new projects.
 */
export function defaultConfig(): ResearchLoopConfig {
  return ResearchLoopConfigSchema.parse({});
}

/**
 * Resolve the local .research-loop directory for the current project.
 */
export function localConfigDir(cwd?: string): string {
  return join(resolve(cwd ?? process.cwd()), CONFIG_DIR);
}

/**
 * Resolve the path to the local config file.
 */
export function localConfigPath(cwd?: string): string {
  return join(localConfigDir(cwd), CONFIG_FILE);
}

/**
 * Validate a raw config object, filling defaults.
 */
export function parseConfig(raw: unknown, source = '(inline)'): ResearchLoopConfig {
  const result = ResearchLoopConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigInvalidError(
      source,
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return result.data;
}

/**
 * Load the config from the local .research-loop/ directory.
 * Falls back to global config, then to defaults.
 */
export async function loadConfig(cwd?: string): Promise<ResearchLoopConfig> {
  const localPath = localConfigPath(cwd);
  const globalPath = join(GLOBAL_CONFIG_DIR, CONFIG_FILE);

  for (const configPath of [localPath, globalPath]) {
    if (existsSync(configPath)) {
      const raw = await readFile(configPath, 'utf-8');
      return parseConfig(JSON.parse(raw) as unknown, configPath);
    }
  }

  return defaultConfig();
}

/**
 * Save the config to the local .research-loop/ directory.
 */
export async function saveConfig(config: ResearchLoopConfig, cwd?: string): Promise<void> {
  const dir = localConfigDir(cwd);
  await mkdir(dir, { recursive: true });
  const configPath = join(dir, CONFIG_FILE);
  await writeFile(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

/**
 * Get a config value by dot path, e.g. "learning.frequencyThreshold".
 */
export function getConfigValue(config: ResearchLoopConfig, path: string): unknown {
  let current: unknown = config;

  for (const part of path.split('.')) {
    if (current === null || typeof current !== 'object') {
      return undefined;
    }
    current = (current as Record<string, unknown>)[part];
  }

  return current;
}

/**
 * Set a config value by dot path and re-validate. The raw value is read as
 * JSON when it parses ("0.5", "true", "[...]"), else kept as a string.
 */
export function setConfigValue(
  config: ResearchLoopConfig,
  path: string,
  rawValue: string,
): ResearchLoopConfig {
  const result = JSON.parse(JSON.stringify(config)) as Record<string, unknown>;
  const parts = path.split('.');
  let current = result;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (next === null || typeof next !== 'object' || Array.isArray(next)) {
      current[part] = {};
    }
    current = current[part] as Record<string, unknown>;
  }

  current[parts[parts.length - 1]] = parseRawValue(rawValue);
  const updated = parseConfig(result, `--set ${path}`);

  // Unknown keys are stripped by the schema.
  if (getConfigValue(updated, path) === undefined) {
    throw new ConfigInvalidError(`--set ${path}`, [`${path}: unknown setting`]);
  }
  return updated;
}

function parseRawValue(raw: string): unknown {
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return raw;
  }
}
