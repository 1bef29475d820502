/**
 * Test Utilities - Unified Reset
 *
 * Provides a single function to reset all singletons for test isolation.
 *
 * ORDER MATTERS:
 * 1. Reset the database operations singleton (it holds the connection)
 * 2. Forget which connection was migrated
 * 3. Close the database connection last
 *
 * @example
 * ```typescript
 * import { resetAll } from '../test-utils/index.js';
 *
 * beforeEach(() => {
 *   resetAll();
 *   vi.clearAllMocks();
 * });
 * ```
 */

import { resetDatabase, resetMigrationState, closeDb } from '../database/index.js';
import { _clearEnvCache } from '../config/env.js';

/**
 * Reset all application singletons for test isolation.
 */
export function resetAll(): void {
  resetDatabase();
  resetMigrationState();
  closeDb();
  _clearEnvCache();
}
