/**
 * Centralized Path Definitions
 *
 * All modules should import from here instead of computing paths locally.
 *
 * Directory structure:
 * ~/.radv/            (or $RADV_HOME)
 * ├── advisor.db      (SQLite database: documents + embeddings)
 * └── config.toml     (User configuration)
 *
 * Paths are resolved on every call so tests can point RADV_HOME at a
 * temporary directory.
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

export const DB_FILENAME = 'advisor.db';
export const CONFIG_FILENAME = 'config.toml';

/**
 * Get the data directory ($RADV_HOME, defaulting to ~/.radv)
 */
export function getRadvDir(): string {
  const override = process.env.RADV_HOME?.trim();
  return override ? override : join(homedir(), '.radv');
}

/**
 * Get the database file path (~/.radv/advisor.db)
 */
export function getDbPath(): string {
  return join(getRadvDir(), DB_FILENAME);
}

/**
 * Get the config file path (~/.radv/config.toml)
 */
export function getConfigPath(): string {
  return join(getRadvDir(), CONFIG_FILENAME);
}
