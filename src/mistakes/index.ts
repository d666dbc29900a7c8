/**
 * Mistake model and persistent store
 */

export type {
  MistakeType,
  Mistake,
  RunStats,
  MistakeStoreFile,
  MistakeStats,
  MistakeStorage,
} from './types.js';
export { MISTAKE_TYPES, emptyStoreFile } from './types.js';

export {
  deriveIdentityKey,
  toolsFromIdentityKey,
  isMistakeType,
  assertMistakeType,
  mistakePriority,
  sameTools,
} from './identity.js';

export { MistakeRecordSchema, RunStatsSchema, MistakeStoreFileSchema } from './schema.js';

export {
  JsonFileMistakeStorage,
  InMemoryMistakeStorage,
  MISTAKES_FILE,
  defaultMistakesPath,
} from './storage.js';

export {
  MistakeStore,
  compareMistakes,
  normalizeStoreFile,
  DEFAULT_RECURRING_THRESHOLD,
  DEFAULT_MAX_MISTAKES,
} from './store.js';
export type { MistakeStoreOptions } from './store.js';
