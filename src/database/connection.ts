/**
 * Database Connection Module
 *
 * Provides a singleton SQLite connection using better-sqlite3.
 * The database is stored at ~/.radv/advisor.db
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { getDbPath } from '../config/paths.js';

// Module-level singleton instance
let db: Database.Database | null = null;
let exitHandlerRegistered = false;

/**
 * Open a connection with the pragmas every connection needs.
 * Pass ':memory:' for an in-process database (tests).
 */
export function openDatabase(path: string): Database.Database {
  if (path !== ':memory:') {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const connection = new Database(path);

  // Enable foreign keys (OFF by default in SQLite!)
  connection.pragma('foreign_keys = ON');

  // WAL lets `radv status` read while an ingest is writing
  if (path !== ':memory:') {
    connection.pragma('journal_mode = WAL');
  }

  return connection;
}

/**
 * Get the singleton database instance.
 *
 * Creates the database and its directory on first call.
 * Subsequent calls return the same instance.
 *
 * @example
 * ```ts
 * const db = getDb();
 * const count = db.prepare('SELECT COUNT(*) AS count FROM documents').get();
 * ```
 */
export function getDb(): Database.Database {
  if (db) {
    return db;
  }

  db = openDatabase(getDbPath());

  if (!exitHandlerRegistered) {
    process.on('exit', () => closeDb());
    exitHandlerRegistered = true;
  }

  return db;
}

/**
 * Close the database connection.
 *
 * Safe to call multiple times or when no connection exists.
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}
