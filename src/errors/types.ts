/**
 * Error type definitions for Review Advisor
 *
 * These custom error classes provide:
 * - Actionable error messages with recovery hints
 * - Exit codes for programmatic error handling
 * - Type safety for error handling logic
 */

/**
 * Base class for all application errors.
 *
 * - hint: Tells the operator HOW to fix the problem
 * - code: Allows scripts to handle different errors differently
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3: File not found (following common Unix conventions)
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(
      `Path does not exist: ${path}`,
      'Check the path and try again',
      3
    );
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors.
 *
 * Examples:
 * - Invalid TOML syntax
 * - Out-of-range values (e.g. retain_tail >= summarize_threshold)
 * - Unknown config keys
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(
      message,
      hint ?? 'Run: radv config list  to see valid options',
      2
    );
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when an API key is missing or invalid.
 *
 * Exit code 4: API key error
 */
export class APIKeyError extends CLIError {
  constructor(provider: string, envVar?: string) {
    const envVarName = envVar ?? `${provider.toUpperCase()}_API_KEY`;
    super(
      `${provider} API key not configured`,
      `Set the ${envVarName} environment variable (a .env file in the working directory also works)`,
      4
    );
    this.name = 'APIKeyError';
  }
}

/**
 * Thrown for database-related errors.
 *
 * Wraps SQLite errors with user-friendly messages.
 *
 * Exit code 5: Database error
 */
export class DatabaseError extends CLIError {
  constructor(message: string, cause?: Error) {
    super(
      message,
      'Try running: radv status  to check database health',
      5,
      cause
    );
    this.name = 'DatabaseError';
  }
}

/**
 * Thrown when input validation fails.
 *
 * Exit code 1: General error (validation is user input error)
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

// ============================================================================
// Domain errors
// ============================================================================

/**
 * A review row that cannot become a Document.
 */
export interface MalformedRecordIssue {
  /** 1-based row number within the ingested batch (header excluded) */
  row: number;
  /** Human-readable reason, e.g. "missing review" */
  reason: string;
}

/**
 * Thrown when ingestion input is malformed.
 *
 * Fatal to the ingestion run: the whole batch is rejected so that reviews
 * are never dropped silently.
 *
 * Exit code 7: Ingestion input error
 */
export class MalformedRecordError extends CLIError {
  public readonly issues: MalformedRecordIssue[];

  constructor(message: string, issues: MalformedRecordIssue[] = []) {
    const listed = issues
      .slice(0, 5)
      .map((issue) => `  - row ${issue.row}: ${issue.reason}`)
      .join('\n');
    const more = issues.length > 5 ? `\n  ... and ${issues.length - 5} more` : '';
    super(
      message,
      issues.length > 0
        ? `Fix these rows or run with ingest.on_malformed = "skip":\n${listed}${more}`
        : 'Check the review file and try again',
      7
    );
    this.name = 'MalformedRecordError';
    this.issues = issues;
  }
}

/**
 * Thrown when the vector index cannot answer a query (empty index,
 * embedding provider down, dimension mismatch).
 *
 * Recoverable: the orchestrator degrades to a contextless answer.
 *
 * Exit code 8
 */
export class RetrievalUnavailableError extends CLIError {
  constructor(message: string, cause?: Error) {
    super(
      message,
      'Run: radv ingest <reviews.csv>  to build the review index, then check: radv status',
      8,
      cause
    );
    this.name = 'RetrievalUnavailableError';
  }
}

/**
 * Thrown when the LLM cannot produce a completion.
 *
 * Recoverable: the orchestrator answers with a fixed fallback message.
 *
 * Exit code 9
 */
export class GenerationUnavailableError extends CLIError {
  constructor(message: string, cause?: Error) {
    super(
      message,
      'Check your LLM provider settings with: radv config list',
      9,
      cause
    );
    this.name = 'GenerationUnavailableError';
  }
}

/**
 * Thrown when a conversation mutation is invalid (unknown role, empty
 * thread id). Raised before any state is touched.
 *
 * Exit code 10
 */
export class InvalidThreadStateError extends CLIError {
  public readonly threadId: string;

  constructor(threadId: string, message: string) {
    super(message, 'Messages must use role "user", "assistant" or "system"', 10);
    this.name = 'InvalidThreadStateError';
    this.threadId = threadId;
  }
}

/**
 * Thrown when the embedding provider fails or times out.
 *
 * Exit code 11
 */
export class EmbeddingUnavailableError extends CLIError {
  constructor(message: string, cause?: Error) {
    super(
      message,
      'Check the [embedding] settings with: radv config list  (increase embedding.timeout_ms for slow providers)',
      11,
      cause
    );
    this.name = 'EmbeddingUnavailableError';
  }
}

/**
 * Thrown when the caller aborts a turn. The conversation is left as it was
 * before the turn started.
 *
 * Exit code 130 (interrupted)
 */
export class TurnAbortedError extends CLIError {
  public readonly threadId: string;

  constructor(threadId: string) {
    super(`Turn aborted for thread "${threadId}"`, undefined, 130);
    this.name = 'TurnAbortedError';
    this.threadId = threadId;
  }
}
