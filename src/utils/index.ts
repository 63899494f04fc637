/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

export { safeJsonParse } from './json.js';
export { consoleLogger, silentLogger, type Logger } from './logger.js';
export { withTimeout, TimeoutError } from './timeout.js';
