/**
 * Database Module
 *
 * SQLite storage for ingested reviews and their embeddings.
 *
 * @example
 * ```ts
 * import { getDatabase, runMigrations } from './database/index.js';
 *
 * runMigrations();
 * const docs = getDatabase().loadDocuments();
 * ```
 */

// Connection management (low-level)
export { getDb, closeDb, openDatabase } from './connection.js';

// Migration utilities
export {
  runMigrations,
  hasPendingMigrations,
  getAppliedMigrations,
  resetMigrationState,
  getMigrationCount,
  type MigrationResult,
} from './migrate.js';

// Schema types and BLOB helpers
export type { DocumentRecord, IndexMeta } from './schema.js';
export { embeddingToBlob, blobToEmbedding } from './schema.js';

// Validation schemas and utilities
export {
  DocumentRowSchema,
  IndexMetaRowSchema,
  type DocumentRow,
  type IndexMetaRow,
  SchemaValidationError,
  validateRow,
  validateRows,
} from './validation.js';

// High-level database operations
export { getDatabase, resetDatabase, DatabaseOperations } from './operations.js';
