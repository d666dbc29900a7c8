/**
 * Error taxonomy for the research loop.
 *
 * Every error carries a stable `code` so the CLI and callers can branch on
 * the failure kind without string matching.
 */

export type ResearchLoopErrorCode =
  | 'TRACE_MALFORMED'
  | 'PERSISTENCE_UNAVAILABLE'
  | 'UNKNOWN_MISTAKE_TYPE'
  | 'CONFIG_INVALID';

export class ResearchLoopError extends Error {
  constructor(
    readonly code: ResearchLoopErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A trace is missing required fields or names a tool outside the closed set.
 * The run is rejected and never scored.
 */
export class TraceMalformedError extends ResearchLoopError {
  constructor(readonly issues: string[]) {
    super('TRACE_MALFORMED', `Malformed trace: ${issues.join('; ')}`);
  }
}

export type PersistenceOperation = 'load' | 'save' | 'clear';

/**
 * Durable state could not be read or written.
 */
export class PersistenceUnavailableError extends ResearchLoopError {
  constructor(
    readonly operation: PersistenceOperation,
    readonly path: string,
    cause?: unknown,
  ) {
    super(
      'PERSISTENCE_UNAVAILABLE',
      `Could not ${operation} mistake store at ${path}: ${describeCause(cause)}`,
      { cause },
    );
  }
}

/**
 * Internal invariant violation: the learner produced a type outside the
 * fixed mapping.
 */
export class UnknownMistakeTypeError extends ResearchLoopError {
  constructor(readonly value: unknown) {
    super('UNKNOWN_MISTAKE_TYPE', `Unknown mistake type: ${String(value)}`);
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return 'unknown error';
  return String(cause);
}
