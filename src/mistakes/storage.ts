/**
 * Mistake store backends
 *
 * JsonFileMistakeStorage writes `.research-loop/mistakes.json` through a
 * temp file and rename, so a crash mid-write leaves the previous file intact.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { localConfigDir } from '../config.js';
import type { MistakeStorage, MistakeStoreFile } from './types.js';

export const MISTAKES_FILE = 'mistakes.json';

export function defaultMistakesPath(cwd?: string): string {
  return join(localConfigDir(cwd), MISTAKES_FILE);
}

export class JsonFileMistakeStorage implements MistakeStorage {
  readonly location: string;

  constructor(path?: string) {
    this.location = path ?? defaultMistakesPath();
  }

  async read(): Promise<unknown | null> {
    if (!existsSync(this.location)) {
      return null;
    }
    const raw = await readFile(this.location, 'utf-8');
    return JSON.parse(raw) as unknown;
  }

  async write(file: MistakeStoreFile): Promise<void> {
    await mkdir(dirname(this.location), { recursive: true });
    const tempPath = `${this.location}.${process.pid}.tmp`;
    try {
      await writeFile(tempPath, JSON.stringify(file, null, 2) + '\n', 'utf-8');
      await rename(tempPath, this.location);
    } catch (err) {
      await rm(tempPath, { force: true });
      throw err;
    }
  }
}

/**
 * In-memory backend for tests and ephemeral runs. Stores a JSON copy so
 * callers never share references with the persisted value.
 */
export class InMemoryMistakeStorage implements MistakeStorage {
  readonly location = 'memory://mistakes';
  private data: string | null = null;
  writes = 0;
  /** When set, the next writes reject with this error. */
  failWrites: Error | null = null;

  constructor(initial?: unknown) {
    if (initial !== undefined) {
      this.data = JSON.stringify(initial);
    }
  }

  async read(): Promise<unknown | null> {
    return this.data === null ? null : (JSON.parse(this.data) as unknown);
  }

  async write(file: MistakeStoreFile): Promise<void> {
    if (this.failWrites) {
      throw this.failWrites;
    }
    this.data = JSON.stringify(file);
    this.writes += 1;
  }
}
