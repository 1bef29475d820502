/**
 * Evidence Tools
 */

export * from './types.js';
export { ExternalSearchUnavailableError } from './errors.js';
export { DocumentQATool, NO_DOCUMENT_MATCHES, type ChunkRetriever, type DocumentQAOptions } from './document-qa.js';
export {
  TavilySearchClient,
  ExternalSearchAdapter,
  SearchHttpError,
  normalizeSearchResponse,
  isRetryableSearchError,
  TAVILY_ENDPOINT,
  NO_WEB_RESULTS,
  type SearchClient,
  type SearchHit,
  type SearchResponse,
  type TavilyClientOptions,
  type ExternalSearchOptions,
} from './web-search.js';
