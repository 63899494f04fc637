/**
 * Error handling module for Review Advisor
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Invalid option', 'Try: radv config list');
 */

// Error types
export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  APIKeyError,
  DatabaseError,
  ValidationError,
  MalformedRecordError,
  RetrievalUnavailableError,
  GenerationUnavailableError,
  InvalidThreadStateError,
  EmbeddingUnavailableError,
  TurnAbortedError,
  type MalformedRecordIssue,
} from './types.js';

// Error handling utilities
export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
