/**
 * Error types for seqindex operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - "No results" is never an error
 */

/**
 * Base class for all seqindex errors
 */
export abstract class SeqIndexError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown for empty or malformed symbols, patterns, metadata, modes or options
 */
export class InvalidInputError extends SeqIndexError {
  readonly code = "INVALID_INPUT";

  constructor(
    public readonly field: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid ${field}: ${reason}`, options);
  }
}

/**
 * Thrown when a sequence id is unknown
 */
export class NotFoundError extends SeqIndexError {
  readonly code = "NOT_FOUND";

  constructor(
    public readonly id: number,
    options?: ErrorOptions
  ) {
    super(`Sequence not found: ${id}`, options);
  }
}

/**
 * Thrown when the index disagrees with the store
 *
 * Handled inside the coordinator by rebuilding; callers only see it when a
 * retry after a successful rebuild detects the mismatch again.
 */
export class IndexInconsistencyError extends SeqIndexError {
  readonly code = "INDEX_INCONSISTENCY";

  constructor(
    public readonly reason: string,
    options?: ErrorOptions
  ) {
    super(`Index inconsistency: ${reason}`, options);
  }
}

/**
 * Operation against the underlying storage
 */
export type StorageOperation =
  | "read"
  | "write"
  | "remove"
  | "list"
  | "mkdir"
  | "parse"
  | "rebuild";

/**
 * Thrown when the persistence layer fails or a rebuild cannot complete
 */
export class StorageFailureError extends SeqIndexError {
  readonly code = "STORAGE_FAILURE";

  constructor(
    public readonly operation: StorageOperation,
    public readonly target: string,
    options?: ErrorOptions
  ) {
    super(`Storage ${operation} failed: ${target}`, options);
  }
}
