/**
 * Database Migration Runner
 *
 * Applies SQL migrations in order, tracking which have been applied.
 * Migrations are idempotent - safe to run multiple times.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { getDb } from './connection.js';
import { validateRows } from './validation.js';

// ============================================================================
// Migration State Tracking
// ============================================================================

/**
 * Connections already migrated in this process. Keyed by connection so
 * in-memory test databases are migrated independently.
 */
let migratedConnections = new WeakSet<Database.Database>();

/**
 * Result of running migrations.
 *
 * Provides explicit success/failure information instead of throwing.
 */
export interface MigrationResult {
  /** Names of migrations that were successfully applied */
  applied: string[];
  /** Migrations that failed with their error messages */
  failed: Array<{ name: string; error: string }>;
}

const MigrationRowSchema = z.object({
  name: z.string(),
  applied_at: z.string(),
});

// ============================================================================
// Embedded Migrations
// ============================================================================

// SQL is embedded as strings so the compiled CLI needs no files beside it
const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: '001-initial.sql',
    sql: `
-- Migration 001: Initial Schema

-- One row per ingested review, in ingestion order.
-- embedding holds a Float32 vector; all rows share one dimensionality.
CREATE TABLE IF NOT EXISTS documents (
  id TEXT PRIMARY KEY,
  position INTEGER NOT NULL UNIQUE,
  product_title TEXT NOT NULL,
  review_text TEXT NOT NULL,
  metadata TEXT NOT NULL DEFAULT '{}',
  embedding BLOB NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Key/value facts about the persisted index (embedding model, dimensions, ...)
CREATE TABLE IF NOT EXISTS index_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL,
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);
`,
  },
  {
    name: '002-product-title-index.sql',
    sql: `
-- Migration 002: Distinct-product counts for \`radv status\`
CREATE INDEX IF NOT EXISTS idx_documents_product_title ON documents(product_title);
`,
  },
];

// ============================================================================
// Migration Runner
// ============================================================================

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);
}

function readAppliedMigrations(db: Database.Database): Array<{ name: string; applied_at: string }> {
  const rows = db.prepare('SELECT name, applied_at FROM _migrations ORDER BY id').all();
  return validateRows(MigrationRowSchema, rows, '_migrations');
}

/**
 * Run all pending migrations.
 *
 * Each migration runs in its own transaction. A failed migration is
 * reported and the rest still run; the connection is only marked as
 * migrated when everything succeeded, so the next call retries.
 *
 * @example
 * ```ts
 * const result = runMigrations();
 * if (result.failed.length > 0) {
 *   throw new DatabaseError(`Migration ${result.failed[0].name} failed`);
 * }
 * ```
 */
export function runMigrations(db: Database.Database = getDb()): MigrationResult {
  if (migratedConnections.has(db)) {
    return { applied: [], failed: [] };
  }

  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  ensureMigrationsTable(db);
  const appliedNames = new Set(readAppliedMigrations(db).map((row) => row.name));

  for (const migration of MIGRATIONS) {
    if (appliedNames.has(migration.name)) {
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();
      applied.push(migration.name);
    } catch (error) {
      failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  if (failed.length === 0) {
    migratedConnections.add(db);
  }

  return { applied, failed };
}

/**
 * Check if migrations are needed.
 */
export function hasPendingMigrations(db: Database.Database = getDb()): boolean {
  return getAppliedMigrations(db).length < MIGRATIONS.length;
}

/**
 * Get list of applied migrations, oldest first.
 */
export function getAppliedMigrations(
  db: Database.Database = getDb()
): Array<{ name: string; applied_at: string }> {
  const tableExists = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='_migrations'")
    .get();
  if (!tableExists) {
    return [];
  }
  return readAppliedMigrations(db);
}

/**
 * Forget which connections were migrated.
 * Call this in tests to force the next runMigrations() to check again.
 */
export function resetMigrationState(): void {
  migratedConnections = new WeakSet();
}

/**
 * Total number of migrations defined.
 */
export function getMigrationCount(): number {
  return MIGRATIONS.length;
}
