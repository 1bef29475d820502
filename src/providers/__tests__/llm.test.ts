/**
 * LLM Provider Factory Tests
 *
 * Verifies provider dispatch and the fallback chain in createLLMProvider().
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DEFAULT_CONFIG } from '../../config/defaults.js';
import type { Config } from '../../config/schema.js';
import type { CompletionProvider } from '../types.js';

vi.mock('../anthropic.js', () => ({
  createAnthropicProvider: vi.fn(),
  DEFAULT_ANTHROPIC_MODEL: 'claude-sonnet-4-20250514',
}));

vi.mock('../openai.js', () => ({
  createOpenAIProvider: vi.fn(),
  DEFAULT_OPENAI_MODEL: 'gpt-4o',
}));

vi.mock('../ollama.js', () => ({
  createOllamaProvider: vi.fn(),
  DEFAULT_OLLAMA_MODEL: 'llama3.2',
}));

// Import after mocking
import { createAnthropicProvider } from '../anthropic.js';
import { createOpenAIProvider } from '../openai.js';
import { createOllamaProvider } from '../ollama.js';
import { createLLMProvider, AllProvidersFailedError } from '../llm.js';

// ============================================================================
// TEST HELPERS
// ============================================================================

function fakeProvider(name: string, model: string): CompletionProvider {
  return { name, model, complete: vi.fn().mockResolvedValue('ok') };
}

function createTestConfig(overrides: Partial<Config> = {}): Config {
  return { ...DEFAULT_CONFIG, ...overrides };
}

const anthropicMock = vi.mocked(createAnthropicProvider);
const openaiMock = vi.mocked(createOpenAIProvider);
const ollamaMock = vi.mocked(createOllamaProvider);

function anthropicWorks(): void {
  anthropicMock.mockImplementation(({ model = 'claude-sonnet-4-20250514' } = {}) => ({
    provider: fakeProvider('anthropic', model),
    name: 'anthropic',
    model,
  }));
}

function openaiWorks(): void {
  openaiMock.mockImplementation(({ model = 'gpt-4o' } = {}) => ({
    provider: fakeProvider('openai', model),
    name: 'openai',
    model,
  }));
}

function ollamaWorks(): void {
  ollamaMock.mockImplementation(({ model = 'llama3.2' } = {}) => ({
    provider: fakeProvider('ollama', model),
    name: 'ollama',
    model,
    host: 'http://localhost:11434',
  }));
}

function thrower(message: string): () => never {
  return () => {
    throw new Error(message);
  };
}

// ============================================================================
// TESTS
// ============================================================================

describe('createLLMProvider', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  describe('primary provider succeeds', () => {
    it('returns the configured provider and model', () => {
      anthropicWorks();

      const result = createLLMProvider(createTestConfig({ default_model: 'claude-3-5-haiku-latest' }));

      expect(result.name).toBe('anthropic');
      expect(result.model).toBe('claude-3-5-haiku-latest');
      expect(result.usedFallback).toBe(false);
      expect(result.requestedProvider).toBe('anthropic');
      expect(result.failedAttempts).toEqual([]);
      expect(anthropicMock).toHaveBeenCalledWith({
        model: 'claude-3-5-haiku-latest',
        timeout: DEFAULT_CONFIG.llm.timeout_ms,
      });
    });

    it('lets options.model override the configured model', () => {
      openaiWorks();

      const result = createLLMProvider(createTestConfig({ default_provider: 'openai' }), { model: 'gpt-4o-mini' });

      expect(result.model).toBe('gpt-4o-mini');
    });

    it('does not call onFallback when the primary works', () => {
      anthropicWorks();
      const onFallback = vi.fn();

      createLLMProvider(createTestConfig(), { fallback: { onFallback } });

      expect(onFallback).not.toHaveBeenCalled();
    });
  });

  describe('fallback behavior', () => {
    it('falls back to the next provider with its default model', () => {
      anthropicMock.mockImplementation(thrower('ANTHROPIC_API_KEY environment variable is not set'));
      openaiWorks();

      const result = createLLMProvider(createTestConfig());

      expect(result.name).toBe('openai');
      expect(result.model).toBe('gpt-4o');
      expect(result.usedFallback).toBe(true);
      expect(result.requestedProvider).toBe('anthropic');
      expect(result.failedAttempts.map((a) => a.provider)).toEqual(['anthropic']);
    });

    it('reports each step through the callbacks', () => {
      anthropicMock.mockImplementation(thrower('API key missing'));
      openaiWorks();
      const onFallback = vi.fn();
      const onProviderFailed = vi.fn();

      createLLMProvider(createTestConfig(), { fallback: { onFallback, onProviderFailed } });

      expect(onFallback).toHaveBeenCalledWith('anthropic', 'openai', 'API key missing');
      expect(onProviderFailed).toHaveBeenCalledTimes(1);
      expect(onProviderFailed.mock.calls[0]?.[0]).toBe('anthropic');
    });

    it('follows a configured chain and fallback models', () => {
      anthropicMock.mockImplementation(thrower('no key'));
      ollamaWorks();
      const config = createTestConfig({
        llm: { ...DEFAULT_CONFIG.llm, fallback_providers: ['ollama'], fallback_models: { ollama: 'llama3.1' } },
      });

      const result = createLLMProvider(config);

      expect(result.name).toBe('ollama');
      expect(result.model).toBe('llama3.1');
      expect(openaiMock).not.toHaveBeenCalled();
    });

    it('throws AllProvidersFailedError after trying the whole chain', () => {
      anthropicMock.mockImplementation(thrower('Anthropic unavailable'));
      openaiMock.mockImplementation(thrower('OpenAI unavailable'));
      ollamaMock.mockImplementation(thrower('Ollama unavailable'));

      let caught: unknown;
      try {
        createLLMProvider(createTestConfig());
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(AllProvidersFailedError);
      if (caught instanceof AllProvidersFailedError) {
        expect(caught.message).toBe('All LLM providers failed. Tried: anthropic -> openai -> ollama');
        expect(caught.lastError?.message).toBe('Ollama unavailable');
      }
    });

    it('stops after the primary when fallback is disabled', () => {
      anthropicMock.mockImplementation(thrower('no key'));
      openaiWorks();

      expect(() => createLLMProvider(createTestConfig(), { fallback: { disableFallback: true } })).toThrow(
        AllProvidersFailedError
      );
      expect(openaiMock).not.toHaveBeenCalled();
    });
  });
});
