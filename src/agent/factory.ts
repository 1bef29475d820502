/**
 * Agent Factory
 *
 * Wires the indexer, retriever, tools, synthesizer and router from a
 * loaded Config. Every collaborator can be injected, which is how tests
 * run the whole pipeline without a network.
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const agent = createResearchAgent(config, { logger: ctx });
 * const answer = await agent.ask('What are the main risk factors?');
 * ```
 */

import type { Config } from '../config/schema.js';
import { getApiKey } from '../config/env.js';
import { getDatabase, type DatabaseOperations } from '../database/index.js';
import { DocumentIndexer } from '../indexer/document-indexer.js';
import { createEmbeddingProvider } from '../indexer/embedder/index.js';
import type { IndexProgress } from '../indexer/types.js';
import { createLLMProvider, type FallbackOptions } from '../providers/llm.js';
import type { CompletionProvider } from '../providers/types.js';
import { Retriever } from '../search/retriever.js';
import { consoleLogger, scopedLogger, type Logger } from '../utils/logger.js';
import { ResearchAgent } from './research-agent.js';
import { Synthesizer } from './synthesizer.js';
import { ToolRouter } from './tool-router.js';
import { DocumentQATool } from './tools/document-qa.js';
import { ExternalSearchAdapter, TavilySearchClient, type SearchClient } from './tools/web-search.js';
import type { EvidenceTool, ToolName } from './tools/types.js';

export interface IndexerFactoryOptions {
  db?: DatabaseOperations;
  onProgress?: (progress: IndexProgress) => void;
  logger?: Logger;
}

/**
 * A DocumentIndexer configured from [embedding] and [indexing].
 */
export function createDocumentIndexer(config: Config, options: IndexerFactoryOptions = {}): DocumentIndexer {
  return new DocumentIndexer({
    provider: createEmbeddingProvider(config.embedding),
    db: options.db ?? getDatabase(),
    chunkConfig: {
      chunkSize: config.indexing.chunk_size,
      chunkOverlap: config.indexing.chunk_overlap,
    },
    charsPerPage: config.indexing.chars_per_page,
    minWords: config.indexing.min_words,
    embedding: {
      batchSize: config.embedding.batch_size,
      timeout: config.embedding.timeout_ms,
    },
    onProgress: options.onProgress,
    logger: options.logger,
  });
}

export interface RetrieverFactoryOptions {
  /** Defaults to config.document.source_id */
  sourceId?: string;
  /** Defaults to config.search.top_k */
  topK?: number;
  logger?: Logger;
}

export function createRetriever(
  indexer: DocumentIndexer,
  config: Config,
  options: RetrieverFactoryOptions = {}
): Retriever {
  return new Retriever(indexer, {
    sourceId: options.sourceId ?? config.document.source_id,
    defaultTopK: options.topK ?? config.search.top_k,
    minScore: config.search.min_score,
    timeoutMs: config.embedding.timeout_ms,
    logger: options.logger,
  });
}

export interface ResearchAgentFactoryOptions extends RetrieverFactoryOptions {
  db?: DatabaseOperations;
  /** Reuse an indexer (and its loaded snapshot) */
  indexer?: DocumentIndexer;
  /** Skip provider creation from config */
  completionProvider?: CompletionProvider;
  /** Replace the Tavily client */
  searchClient?: SearchClient;
  /** Answer from the filing only */
  disableWeb?: boolean;
  /** Passed to createLLMProvider() */
  fallback?: FallbackOptions;
  /** Injected into retry loops, for tests */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Build a ResearchAgent from configuration.
 *
 * @throws AllProvidersFailedError if no LLM provider could be created
 */
export function createResearchAgent(config: Config, options: ResearchAgentFactoryOptions = {}): ResearchAgent {
  const logger = options.logger ?? consoleLogger;

  const indexer = options.indexer ?? createDocumentIndexer(config, { db: options.db, logger });
  const retriever = createRetriever(indexer, config, { ...options, logger });

  const tools: Partial<Record<ToolName, EvidenceTool>> = {
    document_qa: new DocumentQATool(retriever, { topK: options.topK ?? config.search.top_k }),
  };

  if (!options.disableWeb) {
    const client =
      options.searchClient ??
      new TavilySearchClient({
        apiKey: getApiKey('tavily'),
        maxResults: config.web_search.max_results,
        searchDepth: config.web_search.search_depth,
        timeoutMs: config.web_search.timeout_ms,
      });
    tools.web_search = new ExternalSearchAdapter(client, {
      maxAttempts: config.web_search.max_attempts,
      baseDelayMs: config.web_search.base_delay_ms,
      sleep: options.sleep,
      logger: scopedLogger(logger, 'web_search'),
    });
  }

  const completionProvider =
    options.completionProvider ?? createLLMProvider(config, { fallback: options.fallback }).provider;

  const synthesizer = new Synthesizer(completionProvider, {
    maxTokens: config.llm.max_tokens,
    temperature: config.llm.temperature,
    timeoutMs: config.llm.timeout_ms,
    maxAttempts: config.llm.max_attempts,
    baseDelayMs: config.llm.base_delay_ms,
    sleep: options.sleep,
    logger: scopedLogger(logger, 'synthesis'),
  });

  return new ResearchAgent({ router: createToolRouter(config), tools, synthesizer, logger });
}

/**
 * The built-in keyword router plus the [routing] extras from config.
 */
export function createToolRouter(config: Config): ToolRouter {
  return new ToolRouter({
    extraKeywords: {
      document: config.routing?.extra_document_keywords,
      live: config.routing?.extra_live_keywords,
      comparative: config.routing?.extra_comparative_keywords,
    },
  });
}
