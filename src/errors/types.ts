/**
 * Error type definitions for docqa
 *
 * Every failure the pipeline can produce is one of these classes. Each
 * carries:
 * - kind: the failure category, used to build structured error results
 * - hint: how the user can recover
 * - code: the process exit code used by the CLI
 */

/**
 * Failure categories.
 *
 * - configuration: bad settings, credentials or model access (fatal, not retried)
 * - connectivity: transport/throttling/deadline failures after retries
 * - malformed_response: a backend answered with an unexpected shape (fatal)
 * - no_data: nothing to ingest or retrieve (recoverable by supplying input)
 * - query: a single query failed for another reason
 * - validation: invalid caller input
 * - cancelled: the caller abandoned the operation
 */
export type ErrorKind =
  | 'configuration'
  | 'connectivity'
  | 'malformed_response'
  | 'no_data'
  | 'query'
  | 'validation'
  | 'cancelled';

/**
 * Base class for all docqa errors.
 */
export class RAGError extends Error {
  /** Failure category */
  public readonly kind: ErrorKind;

  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(
    kind: ErrorKind,
    message: string,
    hint?: string,
    code: number = 1,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    // Required for instanceof checks on subclasses after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'RAGError';
    this.kind = kind;
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Invalid settings, missing credentials or a model the account cannot use.
 *
 * Exit code 2
 */
export class ConfigurationError extends RAGError {
  constructor(message: string, hint?: string, cause?: unknown) {
    super(
      'configuration',
      message,
      hint ?? 'Run: docqa config list  to see valid options',
      2,
      cause
    );
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3
 */
export class FileNotFoundError extends RAGError {
  public readonly path: string;

  constructor(path: string, hint?: string) {
    super(
      'configuration',
      `Path does not exist: ${path}`,
      hint ?? 'Check the path and try again',
      3
    );
    this.name = 'FileNotFoundError';
    this.path = path;
  }
}

/**
 * Nothing to work with: no documents found, empty index, nothing retrievable.
 *
 * Exit code 4
 */
export class NoDataError extends RAGError {
  constructor(message: string, hint?: string) {
    super(
      'no_data',
      message,
      hint ?? 'Add .txt or .md files to the documents directory, or run: docqa init',
      4
    );
    this.name = 'NoDataError';
  }
}

/**
 * The backend could not be reached in time: network failure, throttling,
 * service unavailability or an expired deadline. Raised once retries are
 * exhausted.
 *
 * Exit code 5
 */
export class ConnectivityError extends RAGError {
  /** Backend error name when known (e.g. ThrottlingException) */
  public readonly reason?: string;

  constructor(message: string, reason?: string, cause?: unknown) {
    super(
      'connectivity',
      message,
      'Check your network connection and AWS service quotas, then try again',
      5,
      cause
    );
    this.name = 'ConnectivityError';
    this.reason = reason;
  }
}

/**
 * A backend answered, but not in the expected shape.
 *
 * Exit code 6
 */
export class MalformedResponseError extends RAGError {
  /** Individual schema issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], cause?: unknown) {
    super(
      'malformed_response',
      message,
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check that the configured model id matches the request protocol',
      6,
      cause
    );
    this.name = 'MalformedResponseError';
    this.issues = issues;
  }
}

/**
 * Embedding dimensions disagree: between an index and its entries, between a
 * query vector and an index, or between a primary and a fallback model.
 *
 * Exit code 2 (a configuration problem)
 */
export class DimensionMismatchError extends RAGError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number, context: string) {
    super(
      'configuration',
      `Embedding dimension mismatch in ${context}: expected ${expected}, got ${actual}`,
      'Use the same embedding model for indexing and querying',
      2
    );
    this.name = 'DimensionMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * A single query failed for a reason outside the other categories.
 *
 * Exit code 7
 */
export class QueryError extends RAGError {
  constructor(message: string, cause?: unknown) {
    super('query', message, 'Try the question again', 7, cause);
    this.name = 'QueryError';
  }
}

/**
 * Thrown when input validation fails.
 *
 * Exit code 1
 */
export class ValidationError extends RAGError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super('validation', message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown when an operation is abandoned through its AbortSignal.
 *
 * Exit code 130 (same as SIGINT)
 */
export class OperationCancelledError extends RAGError {
  constructor(operation: string = 'Operation') {
    super('cancelled', `${operation} cancelled`, undefined, 130);
    this.name = 'OperationCancelledError';
  }
}
