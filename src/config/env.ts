/**
 * Environment Variable Handler
 *
 * Loads and provides access to API credentials.
 * Supports .env files for local development via dotenv.
 *
 * SECURITY NOTES:
 * - Keys are NEVER logged, even in verbose mode
 * - Keys are NEVER included in error messages
 * - Only key presence/absence and format validity are reported
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/**
 * Environment variable schema with optional values.
 * Keys are checked when a provider is actually used, so a missing
 * Tavily key only matters for questions routed to web search.
 */
export const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OLLAMA_HOST: z.string().default('http://localhost:11434'),
  TAVILY_API_KEY: z.string().optional(),
  VECTOR_DB_PATH: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

/** Services that authenticate with a key from the environment */
export type KeyedService = 'anthropic' | 'openai' | 'tavily';

// ============================================================================
// PRIVATE STATE
// ============================================================================

/** Loaded once at first access; reset with _clearEnvCache() in tests */
let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 *
 * @returns The parsed environment variables with defaults applied
 */
export function loadEnv(): EnvVars {
  if (_envCache === null) {
    _envCache = EnvSchema.parse({
      ANTHROPIC_API_KEY: process.env.ANTHROPIC_API_KEY,
      OPENAI_API_KEY: process.env.OPENAI_API_KEY,
      OLLAMA_HOST: process.env.OLLAMA_HOST,
      TAVILY_API_KEY: process.env.TAVILY_API_KEY,
      VECTOR_DB_PATH: process.env.VECTOR_DB_PATH,
    });
  }
  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Check if an API key is configured (non-empty) without exposing it.
 */
export function hasApiKey(service: KeyedService): boolean {
  return getApiKey(service) !== undefined;
}

/**
 * Get a trimmed API key, or undefined when unset or blank.
 */
export function getApiKey(service: KeyedService): string | undefined {
  const env = loadEnv();
  const raw =
    service === 'anthropic'
      ? env.ANTHROPIC_API_KEY
      : service === 'openai'
        ? env.OPENAI_API_KEY
        : env.TAVILY_API_KEY;
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Get the Ollama host URL.
 */
export function getOllamaHost(): string {
  return getEnv('OLLAMA_HOST');
}

/**
 * Mask a secret for display: keeps the first four characters.
 */
export function maskSecret(secret: string | undefined): string {
  if (!secret) return '(not set)';
  return secret.length <= 8 ? '****' : `${secret.slice(0, 4)}****`;
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to mock different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Shown when a required key is missing.
 */
export const SETUP_INSTRUCTIONS: Record<KeyedService | 'ollama', string> = {
  anthropic: `
To use Anthropic (Claude) models:

1. Get your API key from https://console.anthropic.com/
2. Set ANTHROPIC_API_KEY in your shell or in a .env file
`.trim(),

  openai: `
To use OpenAI models:

1. Get your API key from https://platform.openai.com/api-keys
2. Set OPENAI_API_KEY in your shell or in a .env file
`.trim(),

  tavily: `
To enable live web search:

1. Get an API key from https://tavily.com/
2. Set TAVILY_API_KEY in your shell or in a .env file

Without it, questions are answered from the 10-K filing only.
`.trim(),

  ollama: `
To use Ollama (local models):

1. Install Ollama from https://ollama.ai/ and run: ollama serve
2. Pull a model, e.g.: ollama pull llama3.1
3. (Optional) Set OLLAMA_HOST if it is not on http://localhost:11434
`.trim(),
};
