/**
 * Default Configuration Values
 *
 * These are used when:
 * 1. No config.toml exists (first run)
 * 2. User's config.toml is missing certain fields
 *
 * The loader merges user config ON TOP of these defaults.
 */

import type { Config } from './schema.js';

/**
 * Default configuration
 * Runs fully local for indexing; only synthesis and web search need keys.
 */
export const DEFAULT_CONFIG: Config = {
  // LLM settings - Claude as default for quality
  default_model: 'claude-sonnet-4-20250514',
  default_provider: 'anthropic',

  llm: {
    max_tokens: 2048,
    temperature: 0.2,     // Low: answers should stay close to the evidence
    timeout_ms: 60000,
    max_attempts: 3,
    base_delay_ms: 1000,
  },

  // Feature hashing needs no model download and gives identical vectors on every run
  embedding: {
    provider: 'hashing',
    model: 'feature-hash-v1',
    dimensions: 384,
    batch_size: 32,
    timeout_ms: 120000,
  },

  document: {
    path: 'data/filing-10k.htm',
    source_id: 'filing-10k',
  },

  // 500-word windows, 100 words shared with the next window
  indexing: {
    chunk_size: 500,
    chunk_overlap: 100,
    chars_per_page: 3000,
    min_words: 100,
  },

  search: {
    top_k: 5,
    min_score: 0.05,
  },

  web_search: {
    max_results: 5,
    search_depth: 'basic',
    timeout_ms: 30000,
    max_attempts: 3,
    base_delay_ms: 1000,
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.fra/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# Filing Research Agent Configuration
# Location: ~/.fra/config.toml

# LLM Settings (used to synthesize answers)
default_model = "${DEFAULT_CONFIG.default_model}"
default_provider = "${DEFAULT_CONFIG.default_provider}"

[llm]
max_tokens = ${DEFAULT_CONFIG.llm.max_tokens}
temperature = ${DEFAULT_CONFIG.llm.temperature}
timeout_ms = ${DEFAULT_CONFIG.llm.timeout_ms}
max_attempts = ${DEFAULT_CONFIG.llm.max_attempts}
base_delay_ms = ${DEFAULT_CONFIG.llm.base_delay_ms}
# fallback_providers = ["openai", "ollama"]

# Embedding Settings
# "hashing" runs locally. Changing provider or model forces a re-index.
[embedding]
provider = "${DEFAULT_CONFIG.embedding.provider}"
model = "${DEFAULT_CONFIG.embedding.model}"
dimensions = ${DEFAULT_CONFIG.embedding.dimensions}
batch_size = ${DEFAULT_CONFIG.embedding.batch_size}
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}

# The filing to analyse
[document]
path = "${DEFAULT_CONFIG.document.path}"
source_id = "${DEFAULT_CONFIG.document.source_id}"

# Chunking (sizes are in words)
[indexing]
chunk_size = ${DEFAULT_CONFIG.indexing.chunk_size}
chunk_overlap = ${DEFAULT_CONFIG.indexing.chunk_overlap}
chars_per_page = ${DEFAULT_CONFIG.indexing.chars_per_page}
min_words = ${DEFAULT_CONFIG.indexing.min_words}

[search]
top_k = ${DEFAULT_CONFIG.search.top_k}
min_score = ${DEFAULT_CONFIG.search.min_score ?? 0}

# Live web search (needs TAVILY_API_KEY)
[web_search]
max_results = ${DEFAULT_CONFIG.web_search.max_results}
search_depth = "${DEFAULT_CONFIG.web_search.search_depth}"
timeout_ms = ${DEFAULT_CONFIG.web_search.timeout_ms}
max_attempts = ${DEFAULT_CONFIG.web_search.max_attempts}
base_delay_ms = ${DEFAULT_CONFIG.web_search.base_delay_ms}

# Extra routing keywords
[routing]
# extra_live_keywords = ["share buyback"]
# extra_comparative_keywords = ["dell"]
`;
