/**
 * Error Handler
 *
 * Every error is first normalized into an ErrorOutput, then rendered either
 * as coloured terminal text or as JSON (`--json`). Stack traces and causes
 * only appear with `--verbose`.
 */

import chalk from 'chalk';
import { CLIError, MalformedRecordError, TurnAbortedError } from './types.js';
import type { MalformedRecordIssue } from './types.js';

export interface ErrorHandlerOptions {
  /** Show causes and stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  /** Rows rejected by ingestion */
  issues?: MalformedRecordIssue[];
  cause?: string;
  stack?: string;
}

const VERBOSE_HINT = 'Run with --verbose for more details';

/**
 * Collapse any thrown value into the fields both renderers share.
 */
function toErrorOutput(error: unknown, verbose: boolean): ErrorOutput {
  if (!(error instanceof Error)) {
    return { error: String(error), code: 1 };
  }

  const output: ErrorOutput = {
    error: error.message,
    code: error instanceof CLIError ? error.code : 1,
  };
  if (error instanceof CLIError) {
    output.hint = error.hint;
  }
  if (error instanceof MalformedRecordError && error.issues.length > 0) {
    output.issues = error.issues;
  }
  if (verbose) {
    output.cause = error.cause instanceof Error ? error.cause.message : undefined;
    output.stack = error.stack;
  }
  return output;
}

function renderText(error: unknown, output: ErrorOutput): string {
  // Ctrl+C on a pending turn is not a failure worth a red banner
  if (error instanceof TurnAbortedError) {
    return chalk.dim(output.error);
  }

  const lines = [chalk.red('Error: ') + output.error];

  if (output.hint) {
    lines.push(chalk.dim('Hint: ') + output.hint);
  } else if (error instanceof Error && !(error instanceof CLIError) && !output.stack) {
    lines.push(chalk.dim('Hint: ') + VERBOSE_HINT);
  }

  if (output.cause) {
    lines.push(chalk.dim('Caused by: ') + output.cause);
  }

  if (output.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(output.stack));
  }

  return lines.join('\n');
}

/**
 * Format an error for display without exiting.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;
  const output = toErrorOutput(error, verbose);

  return json ? JSON.stringify(output, null, 2) : renderText(error, output);
}

/**
 * CLIError carries its own code; everything else exits with 1.
 */
export function getExitCode(error: unknown): number {
  return error instanceof CLIError ? error.code : 1;
}

/**
 * Print the error to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * @example
 * ```typescript
 * const handler = createGlobalErrorHandler({ verbose: true });
 * process.on('uncaughtException', handler);
 * process.on('unhandledRejection', handler);
 * ```
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
