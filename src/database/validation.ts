/**
 * Database Row Validation
 *
 * Zod schemas for validating database reads at runtime. The database can
 * drift from the code (failed migration, manual edits), and a row that does
 * not match should fail loudly instead of flowing on as bad data.
 *
 * Usage:
 * ```ts
 * const row = db.prepare('SELECT * FROM documents WHERE id = ?').get(id);
 * return row ? validateRow(DocumentRowSchema, row, `documents.id=${id}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError } from '../errors/types.js';

// ============================================================================
// Row Schemas
// ============================================================================

/**
 * A row of the documents table.
 *
 * `embedding` is a Buffer (BLOB); Float32Array conversion happens in
 * operations.ts.
 */
export const DocumentRowSchema = z.object({
  id: z.string().min(1),
  position: z.number().int().nonnegative(),
  product_title: z.string(),
  review_text: z.string(),
  metadata: z.string(),
  embedding: z.instanceof(Buffer),
  created_at: z.string(),
});

export type DocumentRow = z.infer<typeof DocumentRowSchema>;

/**
 * A row of the index_meta table.
 */
export const IndexMetaRowSchema = z.object({
  key: z.string(),
  value: z.string(),
});

export type IndexMetaRow = z.infer<typeof IndexMetaRowSchema>;

/**
 * Shape of the documents.metadata JSON column.
 */
export const DocumentMetadataSchema = z.record(z.string(), z.string());

/**
 * Single-value aggregate such as `SELECT COUNT(*) AS count ...`
 */
export const CountRowSchema = z.object({ count: z.number().int().nonnegative() });

// ============================================================================
// Schema Validation Error
// ============================================================================

/**
 * Thrown when a database row fails Zod schema validation.
 *
 * Exit code 5: Database error (same as DatabaseError)
 */
export class SchemaValidationError extends CLIError {
  /** Individual validation issues from Zod */
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const formattedIssues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    const issuesSummary = formattedIssues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');

    const hint =
      `Schema validation failed:\n${issuesSummary}` +
      (formattedIssues.length > 3 ? `\n  ... and ${formattedIssues.length - 3} more` : '') +
      `\n\nThis may indicate a database/code version mismatch.\n` +
      `Try: radv ingest <reviews.csv>  to rebuild the index`;

    super(message, hint, 5);
    this.name = 'SchemaValidationError';
    this.issues = formattedIssues;
  }
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Validate a single database row against a Zod schema.
 *
 * @param context - Context string for error messages (e.g., "documents.id=rev-1")
 * @throws SchemaValidationError if validation fails
 */
export function validateRow<T extends z.ZodSchema>(
  schema: T,
  row: unknown,
  context: string
): z.output<T> {
  const result = schema.safeParse(row);

  if (result.success) {
    return result.data;
  }

  throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate an array of database rows against a Zod schema.
 *
 * By default, throws on first invalid row. Use `options.continueOnError`
 * to collect all errors and return only valid rows.
 *
 * @example
 * ```ts
 * const rows = validateRows(DocumentRowSchema, raw, 'documents', {
 *   continueOnError: true,
 *   onError: (row, error) => logger.warn(`Invalid row: ${error.message}`),
 * });
 * ```
 */
export function validateRows<T extends z.ZodSchema>(
  schema: T,
  rows: unknown[],
  context: string,
  options?: {
    /** If true, continue validation on errors (returns only valid rows) */
    continueOnError?: boolean;
    /** Callback for each invalid row (only called if continueOnError) */
    onError?: (row: unknown, error: z.ZodError) => void;
  }
): z.output<T>[] {
  const valid: z.output<T>[] = [];

  rows.forEach((row, i) => {
    const result = schema.safeParse(row);

    if (result.success) {
      valid.push(result.data);
    } else if (options?.continueOnError) {
      options.onError?.(row, result.error);
    } else {
      throw new SchemaValidationError(
        `Database schema mismatch in ${context}[${i}]`,
        result.error.issues
      );
    }
  });

  return valid;
}
