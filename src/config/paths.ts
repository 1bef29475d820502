/**
 * Centralized Path Definitions
 *
 * All modules should import from here instead of computing paths locally.
 *
 * Directory structure:
 * ~/.fra/            (FRA_HOME overrides)
 * ├── index.db       (SQLite index; VECTOR_DB_PATH overrides)
 * └── config.toml    (User configuration)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the application directory (~/.fra, or $FRA_HOME)
 */
export function getAppDir(): string {
  const override = process.env.FRA_HOME?.trim();
  return override ? override : join(homedir(), '.fra');
}

/**
 * Get the index database path
 */
export function getDbPath(): string {
  const override = process.env.VECTOR_DB_PATH?.trim();
  return override ? override : join(getAppDir(), 'index.db');
}

/**
 * Get the config file path
 */
export function getConfigPath(): string {
  return join(getAppDir(), 'config.toml');
}
