/**
 * Config Module Tests
 *
 * Loading, validation and merging against a temporary FRA_HOME.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { ConfigSchema, PartialConfigSchema } from '../schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from '../defaults.js';
import {
  deepMerge,
  getConfigValue,
  listConfig,
  loadConfig,
  setConfigValue,
  unsetConfigValue,
  validateConfig,
} from '../loader.js';
import { getConfigPath, getDbPath } from '../paths.js';
import { ConfigError } from '../../errors/index.js';

describe('Config Schema', () => {
  it('validates the defaults', () => {
    expect(ConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true);
  });

  it('rejects an unknown provider', () => {
    const result = ConfigSchema.safeParse({ ...DEFAULT_CONFIG, default_provider: 'gpt-api' });
    expect(result.success).toBe(false);
  });

  it('rejects top_k outside the valid range', () => {
    const result = ConfigSchema.safeParse({ ...DEFAULT_CONFIG, search: { top_k: 200 } });
    expect(result.success).toBe(false);
  });

  it('rejects an unknown search depth', () => {
    const result = ConfigSchema.safeParse({
      ...DEFAULT_CONFIG,
      web_search: { ...DEFAULT_CONFIG.web_search, search_depth: 'deep' },
    });
    expect(result.success).toBe(false);
  });

  it('allows sparse configs through PartialConfigSchema', () => {
    expect(PartialConfigSchema.safeParse({ default_model: 'gpt-4o' }).success).toBe(true);
    expect(PartialConfigSchema.safeParse({ search: { top_k: 8 } }).success).toBe(true);
  });
});

describe('validateConfig', () => {
  it('rejects an overlap that is not below the chunk size', () => {
    const candidate = { ...DEFAULT_CONFIG, indexing: { ...DEFAULT_CONFIG.indexing, chunk_overlap: 500 } };

    expect(() => validateConfig(candidate, 'Invalid configuration')).toThrow(
      'Invalid configuration:\n  - indexing.chunk_overlap: must be smaller than chunk_size (500)'
    );
  });
});

describe('deepMerge', () => {
  it('merges nested tables and replaces arrays', () => {
    const merged = deepMerge(
      { search: { top_k: 5, min_score: 0.05 }, list: ['a'] },
      { search: { top_k: 8 }, list: ['b'], extra: undefined }
    );

    expect(merged).toEqual({ search: { top_k: 8, min_score: 0.05 }, list: ['b'] });
  });
});

describe('Config Loading', () => {
  let home: string;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'fra-config-'));
    vi.stubEnv('FRA_HOME', home);
    vi.stubEnv('VECTOR_DB_PATH', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    fs.rmSync(home, { recursive: true, force: true });
  });

  it('resolves paths under FRA_HOME', () => {
    expect(getConfigPath()).toBe(path.join(home, 'config.toml'));
    expect(getDbPath()).toBe(path.join(home, 'index.db'));
  });

  it('honours VECTOR_DB_PATH for the database', () => {
    vi.stubEnv('VECTOR_DB_PATH', '/tmp/elsewhere.db');
    expect(getDbPath()).toBe('/tmp/elsewhere.db');
  });

  it('returns defaults without writing when asked not to create the file', () => {
    const config = loadConfig(false);

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(fs.existsSync(getConfigPath())).toBe(false);
  });

  it('writes the template on first load and reads it back as the defaults', () => {
    loadConfig();

    expect(fs.readFileSync(getConfigPath(), 'utf-8')).toBe(CONFIG_TEMPLATE);
    expect(loadConfig()).toEqual({ ...DEFAULT_CONFIG, routing: {} });
  });

  it('merges a sparse file over the defaults', () => {
    fs.writeFileSync(getConfigPath(), '[search]\ntop_k = 8\n\n[routing]\nextra_live_keywords = ["guidance"]\n');

    const config = loadConfig();

    expect(config.search).toEqual({ top_k: 8, min_score: 0.05 });
    expect(config.routing).toEqual({ extra_live_keywords: ['guidance'] });
    expect(config.embedding).toEqual(DEFAULT_CONFIG.embedding);
  });

  it('reports invalid TOML as a ConfigError', () => {
    fs.writeFileSync(getConfigPath(), 'top_k = = 3');

    expect(() => loadConfig()).toThrow(ConfigError);
  });

  it('reports invalid values with their path', () => {
    fs.writeFileSync(getConfigPath(), '[search]\ntop_k = 0\n');

    expect(() => loadConfig()).toThrow(/search\.top_k/);
  });

  describe('get / set / list', () => {
    it('reads values by dot path', () => {
      expect(getConfigValue('web_search.search_depth')).toBe('basic');
      expect(getConfigValue('search.nope')).toBeUndefined();
    });

    it('writes parsed values back to the file', () => {
      setConfigValue('search.top_k', '8');
      setConfigValue('llm.fallback_providers', '[openai, ollama]');

      expect(getConfigValue('search.top_k')).toBe(8);
      expect(getConfigValue('llm.fallback_providers')).toEqual(['openai', 'ollama']);
    });

    it('refuses a value that fails validation and leaves the file alone', () => {
      setConfigValue('search.top_k', '8');
      const before = fs.readFileSync(getConfigPath(), 'utf-8');

      expect(() => setConfigValue('search.top_k', 'many')).toThrow(ConfigError);
      expect(fs.readFileSync(getConfigPath(), 'utf-8')).toBe(before);
    });

    it('unsets an override so the default applies again', () => {
      setConfigValue('search.top_k', '8');

      expect(unsetConfigValue('search.top_k')).toBe(true);
      expect(getConfigValue('search.top_k')).toBe(DEFAULT_CONFIG.search.top_k);
      expect(unsetConfigValue('search.top_k')).toBe(false);
    });

    it('reports nothing to unset without a config file', () => {
      expect(unsetConfigValue('search.top_k')).toBe(false);
      expect(fs.existsSync(getConfigPath())).toBe(false);
    });

    it('lists every leaf value', () => {
      const entries = new Map(listConfig());

      expect(entries.get('default_provider')).toBe('anthropic');
      expect(entries.get('indexing.chunk_size')).toBe(500);
      expect(entries.get('document.source_id')).toBe('filing-10k');
    });
  });
});
