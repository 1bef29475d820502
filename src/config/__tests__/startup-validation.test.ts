/**
 * Startup Validation Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { validateStartupConfig, getValidationOptionsForCommand } from '../startup-validation.js';
import { DEFAULT_CONFIG } from '../defaults.js';
import type { Config } from '../schema.js';
import { _clearEnvCache } from '../env.js';

const ALL_KEYS = {
  ANTHROPIC_API_KEY: 'sk-ant-test-secret',
  OPENAI_API_KEY: 'sk-test-secret',
  TAVILY_API_KEY: 'tvly-test-secret',
};

function setKeys(keys: Partial<typeof ALL_KEYS>): void {
  for (const name of Object.keys(ALL_KEYS)) {
    vi.stubEnv(name, '');
  }
  for (const [name, value] of Object.entries(keys)) {
    vi.stubEnv(name, value);
  }
  _clearEnvCache();
}

function withProvider(config: Partial<Config>): Config {
  return { ...DEFAULT_CONFIG, ...config };
}

describe('validateStartupConfig', () => {
  beforeEach(() => {
    vi.stubEnv('OLLAMA_HOST', 'http://localhost:11434');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    _clearEnvCache();
  });

  it('passes cleanly when every key is present', () => {
    setKeys(ALL_KEYS);

    const result = validateStartupConfig({ config: DEFAULT_CONFIG });

    expect(result).toEqual({ valid: true, warnings: [], errors: [], hints: [] });
  });

  it('warns without failing when the LLM key is missing', () => {
    setKeys({ TAVILY_API_KEY: ALL_KEYS.TAVILY_API_KEY });

    const result = validateStartupConfig({ config: DEFAULT_CONFIG });

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      'Anthropic is not usable (ANTHROPIC_API_KEY environment variable is not set); fallback providers will be tried',
    ]);
    expect(result.hints).toHaveLength(1);
  });

  it('warns without failing when the Tavily key is missing', () => {
    setKeys({ ANTHROPIC_API_KEY: ALL_KEYS.ANTHROPIC_API_KEY });

    const result = validateStartupConfig({ config: DEFAULT_CONFIG });

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      'Live web search is unavailable (TAVILY_API_KEY environment variable is not set); answers will use the 10-K filing only',
    ]);
  });

  it('needs no key for ollama', () => {
    setKeys({ TAVILY_API_KEY: ALL_KEYS.TAVILY_API_KEY });

    const result = validateStartupConfig({ config: withProvider({ default_provider: 'ollama' }) });

    expect(result.warnings).toEqual([]);
  });

  it('fails when the OpenAI embedding provider has no key', () => {
    setKeys({ ANTHROPIC_API_KEY: ALL_KEYS.ANTHROPIC_API_KEY, TAVILY_API_KEY: ALL_KEYS.TAVILY_API_KEY });

    const result = validateStartupConfig({
      config: withProvider({ embedding: { ...DEFAULT_CONFIG.embedding, provider: 'openai' } }),
    });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'OpenAI embedding provider configured but its key is not usable: OPENAI_API_KEY environment variable is not set',
    ]);
  });

  it('honours the skip options', () => {
    setKeys({});

    const result = validateStartupConfig({
      config: withProvider({ embedding: { ...DEFAULT_CONFIG.embedding, provider: 'openai' } }),
      skipLLM: true,
      skipWebSearch: true,
      skipEmbedding: true,
    });

    expect(result).toEqual({ valid: true, warnings: [], errors: [], hints: [] });
  });
});

describe('getValidationOptionsForCommand', () => {
  it('checks every key for ask and chat', () => {
    expect(getValidationOptionsForCommand('ask')).toEqual({ skipLLM: false, skipWebSearch: false, skipEmbedding: false });
    expect(getValidationOptionsForCommand('chat')).toEqual({ skipLLM: false, skipWebSearch: false, skipEmbedding: false });
  });

  it('checks only embedding for index and search', () => {
    expect(getValidationOptionsForCommand('index')).toEqual({ skipLLM: true, skipWebSearch: true, skipEmbedding: false });
    expect(getValidationOptionsForCommand('search')).toEqual({ skipLLM: true, skipWebSearch: true, skipEmbedding: false });
  });

  it('checks nothing for route, status and config', () => {
    for (const command of ['route', 'status', 'config']) {
      expect(getValidationOptionsForCommand(command)).toEqual({ skipLLM: true, skipWebSearch: true, skipEmbedding: true });
    }
  });
});
