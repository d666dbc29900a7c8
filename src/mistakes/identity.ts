/**
 * Stable mistake identity
 */

import { UnknownMistakeTypeError } from '../errors.js';
import { isToolName, sortTools, type ToolName } from '../trace/types.js';
import { MISTAKE_TYPES, type MistakeType } from './types.js';

export function deriveIdentityKey(type: MistakeType, tools: Iterable<ToolName>): string {
  return `${type}:${sortTools(tools).join(',')}`;
}

/**
 * Recover the tool list from an identity key. Unknown names are dropped.
 */
export function toolsFromIdentityKey(key: string): ToolName[] {
  const separator = key.indexOf(':');
  if (separator === -1) return [];
  return sortTools(key.slice(separator + 1).split(',').filter(isToolName));
}

export function isMistakeType(value: unknown): value is MistakeType {
  return typeof value === 'string' && (MISTAKE_TYPES as readonly string[]).includes(value);
}

export function assertMistakeType(value: unknown): MistakeType {
  if (!isMistakeType(value)) {
    throw new UnknownMistakeTypeError(value);
  }
  return value;
}

/** Lower rank = higher priority. */
export function mistakePriority(type: MistakeType): number {
  return MISTAKE_TYPES.indexOf(type);
}

export function sameTools(a: readonly ToolName[], b: readonly ToolName[]): boolean {
  const left = sortTools(a);
  const right = sortTools(b);
  return left.length === right.length && left.every((tool, index) => tool === right[index]);
}
