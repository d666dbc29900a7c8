/**
 * Mistake Store
 *
 * Owns the learned mistakes and run statistics for one process. State is
 * loaded once at open() and every mutation is flushed to storage before it
 * returns. Two processes sharing one file get last-writer-wins.
 */

import { PersistenceUnavailableError, describeCause } from '../errors.js';
import { consoleLogger, type Logger } from '../logger.js';
import { sortTools } from '../trace/types.js';
import { assertMistakeType, sameTools, toolsFromIdentityKey } from './identity.js';
import { MistakeStoreFileSchema } from './schema.js';
import { JsonFileMistakeStorage } from './storage.js';
import {
  emptyStoreFile,
  type Mistake,
  type MistakeStats,
  type MistakeStorage,
  type MistakeStoreFile,
  type RunStats,
} from './types.js';

export const DEFAULT_RECURRING_THRESHOLD = 2;
export const DEFAULT_MAX_MISTAKES = 100;

export interface MistakeStoreOptions {
  logger?: Logger;
  /** Oldest, least frequent records are evicted past this count. */
  maxMistakes?: number;
  /** Frequency at which a mistake counts as a recurring pattern in stats. */
  recurringThreshold?: number;
}

export class MistakeStore {
  private mistakes: Map<string, Mistake>;
  private runStats: RunStats;
  private readonly logger: Logger;
  private readonly maxMistakes: number;
  private readonly recurringThreshold: number;

  private constructor(
    private readonly storage: MistakeStorage,
    file: MistakeStoreFile,
    options?: MistakeStoreOptions,
  ) {
    this.logger = options?.logger ?? consoleLogger;
    this.maxMistakes = options?.maxMistakes ?? DEFAULT_MAX_MISTAKES;
    this.recurringThreshold = options?.recurringThreshold ?? DEFAULT_RECURRING_THRESHOLD;
    this.mistakes = new Map(file.mistakes.map((mistake) => [mistake.identity_key, copyMistake(mistake)]));
    this.runStats = { ...file.run_stats };
  }

  /**
   * Load the store. A missing file is an empty store; an unreadable or
   * malformed one is reported through the logger and also treated as empty.
   */
  static async open(
    storage: MistakeStorage = new JsonFileMistakeStorage(),
    options?: MistakeStoreOptions,
  ): Promise<MistakeStore> {
    const logger = options?.logger ?? consoleLogger;
    let raw: unknown;

    try {
      raw = await storage.read();
    } catch (err) {
      logger.warn(`Mistake store at ${storage.location} is unreadable (${describeCause(err)}); starting empty`);
      return new MistakeStore(storage, emptyStoreFile(), options);
    }

    if (raw === null || raw === undefined) {
      return new MistakeStore(storage, emptyStoreFile(), options);
    }

    const file = normalizeStoreFile(raw);
    if (!file) {
      logger.warn(`Mistake store at ${storage.location} is malformed; starting empty`);
      return new MistakeStore(storage, emptyStoreFile(), options);
    }

    logger.debug(`Loaded ${file.mistakes.length} mistake(s) from ${storage.location}`);
    return new MistakeStore(storage, file, options);
  }

  get location(): string {
    return this.storage.location;
  }

  get size(): number {
    return this.mistakes.size;
  }

  get(identityKey: string): Mistake | undefined {
    const mistake = this.mistakes.get(identityKey);
    return mistake ? copyMistake(mistake) : undefined;
  }

  /** All mistakes, most frequent first. */
  list(): Mistake[] {
    return [...this.mistakes.values()].sort(compareMistakes).map(copyMistake);
  }

  /**
   * Insert a mistake or reinforce the record sharing its identity key.
   *
   * @throws PersistenceUnavailableError when the flush fails; the in-memory
   *   state is left as it was before the call.
   */
  async upsert(mistake: Mistake): Promise<Mistake> {
    const [stored] = await this.upsertAll([mistake]);
    return stored;
  }

  /**
   * Apply a run's mistakes, and optionally count the run, in one flush.
   * Either everything is written or nothing changes.
   *
   * @throws PersistenceUnavailableError when the flush fails
   */
  async upsertAll(mistakes: Mistake[], run?: { success: boolean }): Promise<Mistake[]> {
    for (const mistake of mistakes) {
      assertMistakeType(mistake.mistake_type);
    }

    const next = new Map(this.mistakes);
    const stored = mistakes.map((mistake) => mergeInto(next, mistake));
    const runStats: RunStats = run
      ? {
          total_runs: this.runStats.total_runs + 1,
          successful_runs: this.runStats.successful_runs + (run.success ? 1 : 0),
        }
      : this.runStats;

    const evicted = this.evict(next);
    await this.flush(toStoreFile(next, runStats), 'save');

    this.mistakes = next;
    this.runStats = { ...runStats };
    for (const key of evicted) {
      this.logger.debug(`Evicted mistake ${key} (store limit ${this.maxMistakes})`);
    }
    return stored.map((mistake) => copyMistake(next.get(mistake.identity_key) ?? mistake));
  }

  /**
   * Count a finished run. A failed flush keeps the counters in memory and
   * warns; run statistics are not learning state.
   */
  async recordRun(success: boolean): Promise<void> {
    const next: RunStats = {
      total_runs: this.runStats.total_runs + 1,
      successful_runs: this.runStats.successful_runs + (success ? 1 : 0),
    };
    this.runStats = next;

    try {
      await this.flush(toStoreFile(this.mistakes, next), 'save');
    } catch (err) {
      this.logger.warn(`${describeCause(err)}; run statistics kept in memory only`);
    }
  }

  /**
   * Mistakes seen at least `minFrequency` times, by frequency then recency.
   */
  getRecurring(minFrequency: number = DEFAULT_RECURRING_THRESHOLD): Mistake[] {
    return this.list().filter((mistake) => mistake.frequency >= minFrequency);
  }

  getStats(): MistakeStats {
    const { total_runs, successful_runs } = this.runStats;
    return {
      total_runs,
      successful_runs,
      failed_runs: total_runs - successful_runs,
      success_rate: total_runs > 0 ? successful_runs / total_runs : 0,
      total_mistakes: this.mistakes.size,
      recurring_patterns: [...this.mistakes.values()].filter(
        (mistake) => mistake.frequency >= this.recurringThreshold,
      ).length,
    };
  }

  /**
   * Drop every mistake and reset run statistics. The empty state is written
   * before memory is touched, so a failure leaves both sides unchanged.
   */
  async clear(): Promise<void> {
    const empty = emptyStoreFile();
    await this.flush(empty, 'clear');
    this.mistakes = new Map();
    this.runStats = { ...empty.run_stats };
  }

  /** The durable shape of the current state. */
  snapshot(): MistakeStoreFile {
    return toStoreFile(this.mistakes, this.runStats);
  }

  private evict(mistakes: Map<string, Mistake>): string[] {
    if (mistakes.size <= this.maxMistakes) {
      return [];
    }
    const ranked = [...mistakes.values()].sort(compareMistakes);
    const evicted = ranked.slice(this.maxMistakes).map((mistake) => mistake.identity_key);
    for (const key of evicted) {
      mistakes.delete(key);
    }
    return evicted;
  }

  private async flush(file: MistakeStoreFile, operation: 'save' | 'clear'): Promise<void> {
    try {
      await this.storage.write(file);
    } catch (err) {
      throw new PersistenceUnavailableError(operation, this.storage.location, err);
    }
  }
}

/**
 * Frequency descending, then last_seen descending, then identity key.
 */
export function compareMistakes(a: Mistake, b: Mistake): number {
  return (
    b.frequency - a.frequency ||
    Date.parse(b.last_seen) - Date.parse(a.last_seen) ||
    a.identity_key.localeCompare(b.identity_key)
  );
}

function mergeInto(mistakes: Map<string, Mistake>, mistake: Mistake): Mistake {
  const existing = mistakes.get(mistake.identity_key);
  let stored: Mistake;

  if (existing) {
    const toolsChanged = !sameTools(existing.tools, mistake.tools);
    stored = {
      ...existing,
      description: toolsChanged ? mistake.description : existing.description,
      corrective_rule: toolsChanged ? mistake.corrective_rule : existing.corrective_rule,
      tools: toolsChanged ? sortTools(mistake.tools) : existing.tools,
      frequency: existing.frequency + 1,
      last_seen: mistake.last_seen,
      question: mistake.question ?? existing.question,
    };
  } else {
    stored = { ...copyMistake(mistake), tools: sortTools(mistake.tools), frequency: 1 };
  }
  mistakes.set(stored.identity_key, stored);
  return stored;
}

function toStoreFile(mistakes: Map<string, Mistake>, runStats: RunStats): MistakeStoreFile {
  return {
    version: 1,
    mistakes: [...mistakes.values()].sort(compareMistakes).map(copyMistake),
    run_stats: { ...runStats },
  };
}

function copyMistake(mistake: Mistake): Mistake {
  return { ...mistake, tools: [...mistake.tools] };
}

/**
 * Validate a raw store file. Records repeated under one key are merged so the
 * loaded state never holds duplicates.
 */
export function normalizeStoreFile(raw: unknown): MistakeStoreFile | null {
  const result = MistakeStoreFileSchema.safeParse(raw);
  if (!result.success) {
    return null;
  }

  const merged = new Map<string, Mistake>();
  for (const record of result.data.mistakes) {
    const mistake: Mistake = {
      mistake_type: record.mistake_type,
      description: record.description,
      corrective_rule: record.corrective_rule,
      tools: record.tools ? sortTools(record.tools) : toolsFromIdentityKey(record.identity_key),
      identity_key: record.identity_key,
      frequency: record.frequency,
      last_seen: record.last_seen,
      question: record.question,
    };

    const existing = merged.get(mistake.identity_key);
    if (!existing) {
      merged.set(mistake.identity_key, mistake);
      continue;
    }

    const newer = Date.parse(mistake.last_seen) >= Date.parse(existing.last_seen) ? mistake : existing;
    merged.set(mistake.identity_key, {
      ...newer,
      frequency: existing.frequency + mistake.frequency,
    });
  }

  return {
    version: 1,
    mistakes: [...merged.values()],
    run_stats: { ...result.data.run_stats },
  };
}
