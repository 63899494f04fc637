/**
 * Database Operations
 *
 * High-level operations for the review index.
 * Wraps low-level SQL queries with type-safe TypeScript interfaces.
 *
 * These work with a raw better-sqlite3 Database instance (getDb() unless one
 * is injected). They handle:
 * - Type conversion (Float32Array ↔ Buffer)
 * - JSON serialization of metadata
 * - Transactions for batch writes
 */

import { statSync } from 'node:fs';
import type Database from 'better-sqlite3';
import { getDb } from './connection.js';
import { getDbPath } from '../config/paths.js';
import { blobToEmbedding, embeddingToBlob } from './schema.js';
import type { DocumentRecord, IndexMeta } from './schema.js';
import {
  CountRowSchema,
  DocumentMetadataSchema,
  DocumentRowSchema,
  IndexMetaRowSchema,
  validateRow,
  validateRows,
  type DocumentRow,
} from './validation.js';
import { DatabaseError } from '../errors/types.js';
import { safeJsonParse } from '../utils/json.js';

const META_KEYS = {
  embeddingProvider: 'embedding_provider',
  embeddingModel: 'embedding_model',
  dimensions: 'dimensions',
  documentCount: 'document_count',
  source: 'source',
  ingestedAt: 'ingested_at',
} as const;

/**
 * High-level database operations wrapper.
 */
export class DatabaseOperations {
  private db: Database.Database;

  constructor(db?: Database.Database) {
    this.db = db ?? getDb();
  }

  /**
   * Get the current database file size in bytes.
   * Returns 0 if the database file doesn't exist yet.
   * Throws for other errors (permissions, disk issues, etc.)
   */
  getDatabaseSize(): number {
    try {
      return statSync(getDbPath()).size;
    } catch (error) {
      // Fresh install
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return 0;
      }
      throw error;
    }
  }

  // ==========================================================================
  // Documents
  // ==========================================================================

  /**
   * Replace the whole persisted index with `documents` and `meta`.
   *
   * Runs in one transaction: readers see either the old index or the new
   * one, never a mix.
   */
  replaceDocuments(documents: readonly DocumentRecord[], meta: IndexMeta): void {
    const deleteAll = this.db.prepare('DELETE FROM documents');
    const insert = this.db.prepare(`
      INSERT INTO documents (id, position, product_title, review_text, metadata, embedding)
      VALUES (@id, @position, @productTitle, @reviewText, @metadata, @embedding)
    `);

    const replace = this.db.transaction(() => {
      deleteAll.run();
      for (const doc of documents) {
        insert.run({
          id: doc.id,
          position: doc.position,
          productTitle: doc.productTitle,
          reviewText: doc.reviewText,
          metadata: JSON.stringify(doc.metadata),
          embedding: embeddingToBlob(doc.embedding),
        });
      }
      this.writeIndexMeta(meta);
    });

    try {
      replace();
    } catch (error) {
      throw new DatabaseError(
        `Failed to persist ${documents.length} documents`,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Load every persisted document in insertion order.
   */
  loadDocuments(): DocumentRecord[] {
    const rows = this.db.prepare('SELECT * FROM documents ORDER BY position').all();
    return validateRows(DocumentRowSchema, rows, 'documents').map(rowToRecord);
  }

  /**
   * Look up a single document by id.
   */
  getDocument(id: string): DocumentRecord | undefined {
    const row = this.db.prepare('SELECT * FROM documents WHERE id = ?').get(id);
    return row ? rowToRecord(validateRow(DocumentRowSchema, row, `documents.id=${id}`)) : undefined;
  }

  countDocuments(): number {
    const row = this.db.prepare('SELECT COUNT(*) AS count FROM documents').get();
    return validateRow(CountRowSchema, row, 'documents.count').count;
  }

  countProducts(): number {
    const row = this.db
      .prepare('SELECT COUNT(DISTINCT product_title) AS count FROM documents')
      .get();
    return validateRow(CountRowSchema, row, 'documents.products').count;
  }

  /**
   * Delete every document and the index metadata.
   *
   * @returns Number of documents deleted
   */
  clearDocuments(): number {
    const clear = this.db.transaction(() => {
      const result = this.db.prepare('DELETE FROM documents').run();
      this.db.prepare('DELETE FROM index_meta').run();
      return result.changes;
    });
    return clear();
  }

  // ==========================================================================
  // Index metadata
  // ==========================================================================

  /**
   * Read the index metadata, or undefined when nothing was ingested yet.
   */
  getIndexMeta(): IndexMeta | undefined {
    const rows = validateRows(
      IndexMetaRowSchema,
      this.db.prepare('SELECT key, value FROM index_meta').all(),
      'index_meta'
    );
    const values = new Map(rows.map((row) => [row.key, row.value]));

    const provider = values.get(META_KEYS.embeddingProvider);
    const model = values.get(META_KEYS.embeddingModel);
    const dimensions = Number(values.get(META_KEYS.dimensions));
    const documentCount = Number(values.get(META_KEYS.documentCount));
    const ingestedAt = values.get(META_KEYS.ingestedAt);

    if (
      provider === undefined ||
      model === undefined ||
      ingestedAt === undefined ||
      !Number.isInteger(dimensions) ||
      !Number.isInteger(documentCount)
    ) {
      return undefined;
    }

    return {
      embeddingProvider: provider,
      embeddingModel: model,
      dimensions,
      documentCount,
      source: values.get(META_KEYS.source),
      ingestedAt,
    };
  }

  private writeIndexMeta(meta: IndexMeta): void {
    const upsert = this.db.prepare(`
      INSERT INTO index_meta (key, value, updated_at)
      VALUES (?, ?, datetime('now'))
      ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
    `);

    upsert.run(META_KEYS.embeddingProvider, meta.embeddingProvider);
    upsert.run(META_KEYS.embeddingModel, meta.embeddingModel);
    upsert.run(META_KEYS.dimensions, String(meta.dimensions));
    upsert.run(META_KEYS.documentCount, String(meta.documentCount));
    upsert.run(META_KEYS.ingestedAt, meta.ingestedAt);
    if (meta.source !== undefined) {
      upsert.run(META_KEYS.source, meta.source);
    } else {
      this.db.prepare('DELETE FROM index_meta WHERE key = ?').run(META_KEYS.source);
    }
  }
}

function rowToRecord(row: DocumentRow): DocumentRecord {
  return {
    id: row.id,
    position: row.position,
    productTitle: row.product_title,
    reviewText: row.review_text,
    metadata: safeJsonParse(row.metadata, DocumentMetadataSchema, {}),
    embedding: blobToEmbedding(row.embedding),
  };
}

// ============================================================================
// Singleton
// ============================================================================

let instance: DatabaseOperations | null = null;

/**
 * Shared operations instance bound to getDb().
 */
export function getDatabase(): DatabaseOperations {
  if (!instance) {
    instance = new DatabaseOperations();
  }
  return instance;
}

/**
 * Drop the shared instance. Call after closeDb() or in tests.
 */
export function resetDatabase(): void {
  instance = null;
}
