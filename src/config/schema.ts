/**
 * Configuration Schema
 *
 * Defines the shape of ~/.fra/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * LLM provider type (used in multiple schemas)
 */
export const LLMProviderTypeSchema = z.enum(['anthropic', 'openai', 'ollama']);

/**
 * LLM call settings with fallback support
 */
export const LLMConfigSchema = z.object({
  /** Fallback providers in order of preference (omit to use defaults) */
  fallback_providers: z
    .array(LLMProviderTypeSchema)
    .optional()
    .describe('Fallback providers if primary fails (e.g., ["openai", "ollama"])'),
  /** Model to use per fallback provider (uses defaults if omitted) */
  fallback_models: z
    .record(LLMProviderTypeSchema, z.string())
    .optional()
    .describe('Model to use per fallback provider (e.g., { openai: "gpt-4o" })'),
  max_tokens: z.number().int().min(64).max(32000).describe('Maximum tokens in the synthesized answer'),
  temperature: z.number().min(0).max(2).describe('Sampling temperature for synthesis'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Timeout for a single model call in milliseconds'),
  max_attempts: z.number().int().min(1).max(10).describe('Attempts per model call before giving up'),
  base_delay_ms: z.number().int().min(0).max(60000).describe('First backoff delay, doubled per retry'),
});

/**
 * Embedding provider configuration
 * "hashing" runs locally with no model download; the others call an API.
 */
export const EmbeddingConfigSchema = z.object({
  provider: z
    .enum(['hashing', 'openai', 'ollama'])
    .describe('Embedding provider (hashing is local and deterministic)'),
  model: z.string().describe('Embedding model name'),
  dimensions: z
    .number()
    .int()
    .min(32)
    .max(4096)
    .describe('Vector length for the hashing provider'),
  batch_size: z
    .number()
    .int()
    .min(1)
    .max(256)
    .default(32)
    .describe('Number of texts to embed per batch'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .default(120000)
    .describe('Timeout in milliseconds for one embedding batch'),
});

/**
 * The filing being analysed
 */
export const DocumentConfigSchema = z.object({
  path: z.string().describe('Path to the HTML 10-K filing'),
  source_id: z.string().min(1).describe('Identifier the index is stored under'),
});

/**
 * Indexing configuration
 * Controls how the filing is split into chunks
 */
export const IndexingConfigSchema = z.object({
  chunk_size: z.number().int().min(20).max(4000).describe('Words per chunk'),
  chunk_overlap: z
    .number()
    .int()
    .min(0)
    .max(2000)
    .describe('Words shared by consecutive chunks (must be below chunk_size)'),
  chars_per_page: z
    .number()
    .int()
    .min(200)
    .max(100000)
    .describe('Page length estimate when the filing has no page-break markers'),
  min_words: z.number().int().min(1).describe('Smallest extracted word count accepted as a filing'),
});

/**
 * Search configuration
 * Controls how retrieval behaves
 */
export const SearchConfigSchema = z.object({
  top_k: z.number().int().min(1).max(100).describe('Number of chunks to retrieve'),
  min_score: z
    .number()
    .min(-1)
    .max(1)
    .optional()
    .describe('Similarity floor; chunks scoring lower are dropped'),
});

/**
 * Live web search (Tavily)
 */
export const WebSearchConfigSchema = z.object({
  max_results: z.number().int().min(1).max(20).describe('Results requested per search'),
  search_depth: z.enum(['basic', 'advanced']).describe('Tavily search depth'),
  timeout_ms: z.number().int().min(1000).max(120000).describe('Timeout for one search request'),
  max_attempts: z.number().int().min(1).max(10).describe('Attempts before search is reported unavailable'),
  base_delay_ms: z.number().int().min(0).max(60000).describe('First backoff delay, doubled per retry'),
});

/**
 * Extra routing keywords, appended to the built-in lists
 */
export const RoutingConfigSchema = z.object({
  extra_document_keywords: z.array(z.string()).optional(),
  extra_live_keywords: z.array(z.string()).optional(),
  extra_comparative_keywords: z.array(z.string()).optional(),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  default_model: z.string().describe('Model used to synthesize answers'),
  default_provider: LLMProviderTypeSchema.describe('LLM provider to use'),
  llm: LLMConfigSchema,
  embedding: EmbeddingConfigSchema,
  document: DocumentConfigSchema,
  indexing: IndexingConfigSchema,
  search: SearchConfigSchema,
  web_search: WebSearchConfigSchema,
  /** Optional routing keyword extensions */
  routing: RoutingConfigSchema.optional(),
});

/**
 * TypeScript type inferred from the schema
 * Use this for type-safe config access throughout the codebase
 */
export type Config = z.infer<typeof ConfigSchema>;
export type LLMProviderType = z.infer<typeof LLMProviderTypeSchema>;
export type EmbeddingProviderType = Config['embedding']['provider'];

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
