/**
 * JSON Utilities
 *
 * Safe JSON parsing with fallback for corrupted data.
 */

import type { ZodType, ZodTypeDef } from 'zod';

/**
 * Safely parse a JSON string against a schema, with fallback on error.
 *
 * Use this when parsing JSON from external sources (database, files, APIs)
 * where corruption is possible. Both malformed JSON and JSON of the wrong
 * shape yield the fallback.
 *
 * @param json - The JSON string to parse (can be null/undefined)
 * @param schema - Shape the parsed value must satisfy
 * @param fallback - Value to return if parsing or validation fails
 * @param onError - Optional callback for logging/reporting parse errors
 *
 * @example
 * ```typescript
 * const metadata = safeJsonParse(row.metadata, MetadataSchema, {}, (err) => {
 *   logger.warn(`Corrupt metadata: ${err.message}`);
 * });
 * ```
 */
export function safeJsonParse<T>(
  json: string | null | undefined,
  schema: ZodType<T, ZodTypeDef, unknown>,
  fallback: T,
  onError?: (error: Error, rawValue: string) => void
): T {
  if (json === null || json === undefined) {
    return fallback;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    if (onError && error instanceof Error) {
      onError(error, json);
    }
    return fallback;
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    onError?.(new Error(result.error.issues.map((i) => i.message).join('; ')), json);
    return fallback;
  }
  return result.data;
}
