/**
 * Custom Error Classes
 *
 * Construction-time parameter violations and run-time contract violations
 * are surfaced to the caller as one of these; the core never repairs misuse.
 */

/**
 * Error thrown when an operation is invoked in a state that does not allow it,
 * e.g. `react` after the episode has ended
 */
export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidStateError';

    // Maintains proper stack trace for where error was thrown (only in V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidStateError);
    }
  }
}

/**
 * Error thrown for malformed parameters or an action outside the allowed set
 */
export class InvalidArgumentError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'InvalidArgumentError';
    this.issues = issues;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidArgumentError);
    }
  }
}

/**
 * Error thrown by a knowledge-store collaborator when a lookup fails.
 * Propagated unchanged so that a failed lookup is never read as "no knowledge".
 */
export class ExternalLookupError extends Error {
  public readonly query: unknown;

  constructor(message: string, query: unknown, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ExternalLookupError';
    this.query = query;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ExternalLookupError);
    }
  }
}
