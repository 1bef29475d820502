/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create config directory (~/.fra)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Provide type-safe access
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';
import { z, type ZodIssue } from 'zod';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getAppDir, getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function ensureAppDir(): void {
  const dir = getAppDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Deep merge two objects, with source values overriding target.
 * Arrays and primitives are replaced, nested tables are merged.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) continue;
    const targetValue = target[key];
    result[key] =
      isPlainObject(sourceValue) && isPlainObject(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

/**
 * Validate a merged config object and apply cross-field checks.
 *
 * @throws ConfigError listing every failing field
 */
export function validateConfig(candidate: unknown, context: string): Config {
  const result = ConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigError(
      `${context}:\n${formatIssues(result.error.issues)}`,
      'Run: fra config list  to see current values and types'
    );
  }

  const { chunk_size, chunk_overlap } = result.data.indexing;
  if (chunk_overlap >= chunk_size) {
    throw new ConfigError(
      `${context}:\n  - indexing.chunk_overlap: must be smaller than chunk_size (${chunk_size})`
    );
  }

  return result.data;
}

function readToml(configPath: string): PlainObject {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath}`
    );
  }
}

/**
 * Load and parse the config file
 * Returns the merged config (defaults + user overrides)
 *
 * @param createIfMissing - If true, writes the commented template on first run
 * @throws ConfigError if the config file exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureAppDir();
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return structuredClone(DEFAULT_CONFIG);
  }

  const parsed = readToml(configPath);

  // Sparse files are fine: check shapes first, then fill in defaults
  const partial = PartialConfigSchema.safeParse(parsed);
  if (!partial.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(partial.error.issues)}`,
      `Edit ${configPath} or delete it to restore defaults`
    );
  }

  return validateConfig(deepMerge(DEFAULT_CONFIG, parsed), 'Invalid configuration');
}

/**
 * Whether `key` names a setting the schema knows, set or not.
 * Example: isConfigKey('llm.fallback_providers') => true
 */
export function isConfigKey(key: string): boolean {
  let schema: z.ZodTypeAny = ConfigSchema;
  for (const part of key.split('.')) {
    while (schema instanceof z.ZodOptional || schema instanceof z.ZodDefault) {
      schema = schema._def.innerType;
    }
    if (!(schema instanceof z.ZodObject)) {
      return false;
    }
    const next: z.ZodTypeAny | undefined = schema.shape[part];
    if (next === undefined) {
      return false;
    }
    schema = next;
  }
  return true;
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('search.top_k') => 5
 */
export function getConfigValue(key: string): unknown {
  let current: unknown = loadConfig();
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Set a specific config value by dot-notation path
 * Writes the change back to the config file after validating the result
 */
export function setConfigValue(key: string, value: string): void {
  const parts = key.split('.').filter((part) => part.length > 0);
  const lastPart = parts.pop();
  if (lastPart === undefined) {
    throw new ConfigError('Invalid config key: empty key');
  }

  const configPath = getConfigPath();
  ensureAppDir();

  const config: PlainObject = fs.existsSync(configPath) ? readToml(configPath) : {};

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: PlainObject = {};
      current[part] = created;
      current = created;
    }
  }
  current[lastPart] = parseValue(value);

  validateConfig(deepMerge(DEFAULT_CONFIG, config), `Invalid value for '${key}'`);

  fs.writeFileSync(configPath, TOML.stringify(config as TOML.JsonMap), 'utf-8');
}

/**
 * Remove an override so the default applies again.
 *
 * @returns false if the file did not set the key
 */
export function unsetConfigValue(key: string): boolean {
  const configPath = getConfigPath();
  if (!fs.existsSync(configPath)) {
    return false;
  }

  const config = readToml(configPath);
  const parts = key.split('.').filter((part) => part.length > 0);
  const lastPart = parts.pop();

  let current: PlainObject = config;
  for (const part of parts) {
    const next = current[part];
    if (!isPlainObject(next)) return false;
    current = next;
  }
  if (lastPart === undefined || !(lastPart in current)) {
    return false;
  }

  delete current[lastPart];
  fs.writeFileSync(configPath, TOML.stringify(config as TOML.JsonMap), 'utf-8');
  return true;
}

/**
 * Parse a string value into the appropriate type
 * Handles booleans, numbers, comma lists in brackets, and strings
 */
function parseValue(value: string): unknown {
  const trimmed = value.trim();
  if (trimmed.toLowerCase() === 'true') return true;
  if (trimmed.toLowerCase() === 'false') return false;

  if (trimmed.startsWith('[') && trimmed.endsWith(']')) {
    return trimmed
      .slice(1, -1)
      .split(',')
      .map((item) => item.trim().replace(/^["']|["']$/g, ''))
      .filter((item) => item.length > 0);
  }

  const num = Number(trimmed);
  if (!isNaN(num) && trimmed !== '') return num;

  return value;
}

/**
 * List all config values in a flat format
 * Returns entries like ['search.top_k', 5]
 */
export function listConfig(): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: PlainObject, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;
      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(loadConfig());
  return entries;
}
