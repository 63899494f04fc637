/**
 * Search Module Errors
 *
 * All errors extend CLIError for consistent error handling.
 */

import { CLIError } from '../errors/index.js';

/**
 * Thrown when vectors of different shapes or models meet in one index:
 * a query vector with the wrong dimensionality, an upsert whose embeddings
 * disagree with the index, or persisted vectors built with another model.
 *
 * Exit code 6: Search validation error
 *
 * @example
 * ```typescript
 * if (vector.length !== this.dimensions) {
 *   throw new EmbeddingMismatchError(
 *     `Query vector has ${vector.length} dimensions, index expects ${this.dimensions}`,
 *     this.dimensions,
 *     vector.length
 *   );
 * }
 * ```
 */
export class EmbeddingMismatchError extends CLIError {
  public readonly expected: string | number;
  public readonly actual: string | number;

  constructor(message: string, expected: string | number, actual: string | number) {
    super(
      message,
      'Rebuild the index with the current embedding model: radv ingest <reviews.csv>',
      6
    );
    this.name = 'EmbeddingMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}
