/**
 * Filing Research Agent - Library Entry Point
 *
 * Most users want the CLI (`fra`). These exports are for embedding the
 * agent in another program.
 *
 * ## Primary Interface
 *
 * ```bash
 * fra index ./filing-10k.htm                        # Index a 10-K filing
 * fra ask "What are the main risk factors?"          # One cited answer
 * fra chat                                          # Interactive loop
 * ```
 *
 * @example Answering a question
 * ```typescript
 * import { createResearchAgent, loadConfig, runMigrations } from 'filing-research-agent';
 *
 * runMigrations();
 * const agent = createResearchAgent(loadConfig());
 * const answer = await agent.ask('What drove revenue growth?');
 * console.log(answer.plan);
 * console.log(answer.text);
 * ```
 *
 * @packageDocumentation
 */

// Agent
export {
  createResearchAgent,
  createDocumentIndexer,
  createRetriever,
  createToolRouter,
  ResearchAgent,
  ToolRouter,
  Synthesizer,
  describePlan,
  formatCitations,
  formatCitationsJSON,
  SynthesisUnavailableError,
  AllToolsFailedError,
} from './agent/index.js';
export type { AgentAnswer, RoutingDecision, Citation, ToolResult, ToolName } from './agent/index.js';

// Config
export { loadConfig, DEFAULT_CONFIG, getAppDir, getDbPath, getConfigPath } from './config/index.js';
export type { Config } from './config/index.js';

// Indexing and retrieval
export { DocumentIndexer, parseFilingHtml, chunkDocument, createEmbeddingProvider } from './indexer/index.js';
export type { IndexSummary, IndexProgress, EmbeddingProvider } from './indexer/index.js';
export { Retriever, VectorIndex, EmbeddingMismatchError } from './search/index.js';
export type { RetrievalResult } from './search/index.js';

// Storage
export { runMigrations, getDatabase, closeDb } from './database/index.js';

// Providers
export { createLLMProvider, AllProvidersFailedError } from './providers/index.js';
export type { CompletionProvider } from './providers/index.js';

// Errors
export * from './errors/index.js';
