/**
 * Test Utilities - Unified Reset
 *
 * Resets every module-level singleton for test isolation.
 *
 * ORDER MATTERS: drop the operations wrapper before closing the
 * connection it holds.
 *
 * @example
 * ```typescript
 * beforeEach(() => {
 *   resetAll();
 *   vi.clearAllMocks();
 * });
 * ```
 */

import { resetDatabase, closeDb, resetMigrationState } from '../database/index.js';
import { _clearEnvCache } from '../config/env.js';

export function resetAll(): void {
  resetDatabase();
  closeDb();
  resetMigrationState();
  _clearEnvCache();
}
