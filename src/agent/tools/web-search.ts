/**
 * Web Search Tool
 *
 * Live market data through the Tavily search API. The HTTP client is kept
 * behind SearchClient so the adapter's retry and normalization logic can
 * be tested against an in-process fake.
 *
 * FAILURE HANDLING:
 * - Network errors, timeouts, 429 and 5xx responses are retried with backoff
 * - A missing or rejected key fails at once
 * - Once retries are exhausted the adapter throws
 *   ExternalSearchUnavailableError; the agent turns that into a degraded,
 *   document-only answer
 */

import { z } from 'zod';
import { APIKeyError } from '../../errors/index.js';
import { retryWithBackoff, RetryExhaustedError, TimeoutError, withTimeout } from '../../utils/retry.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import { ExternalSearchUnavailableError } from './errors.js';
import type { Citation, EvidenceTool, EvidencePassage, ToolResult, WebCitation } from './types.js';

// ============================================================================
// CONSTANTS
// ============================================================================

export const TAVILY_ENDPOINT = 'https://api.tavily.com/search';

/** Results quoted when the provider gives no summary answer */
const FALLBACK_RESULT_COUNT = 3;
const FALLBACK_CONTENT_LENGTH = 300;

export const NO_WEB_RESULTS = 'No results found.';

// ============================================================================
// CLIENT
// ============================================================================

/**
 * One result from a web search.
 */
export interface SearchHit {
  title?: string;
  url: string;
  content: string;
  score?: number;
}

export interface SearchResponse {
  /** Provider-written summary, when it returns one */
  answer?: string;
  results: SearchHit[];
}

/**
 * A web search backend.
 */
export interface SearchClient {
  readonly name: string;
  search(query: string): Promise<SearchResponse>;
}

/**
 * Non-2xx response from the search API.
 */
export class SearchHttpError extends Error {
  constructor(
    public readonly status: number,
    body: string
  ) {
    super(`Search request failed with HTTP ${status}${body ? `: ${body.slice(0, 200)}` : ''}`);
    this.name = 'SearchHttpError';
  }
}

const TavilyResultSchema = z.object({
  title: z.string().nullish(),
  url: z.string(),
  content: z.string().nullish(),
  score: z.number().nullish(),
});

const TavilyResponseSchema = z.object({
  answer: z.string().nullish(),
  results: z.array(TavilyResultSchema).default([]),
});

export interface TavilyClientOptions {
  /** Omit to make every search fail with APIKeyError */
  apiKey?: string;
  maxResults: number;
  searchDepth: 'basic' | 'advanced';
  timeoutMs: number;
  endpoint?: string;
}

/**
 * Tavily over plain HTTPS (global fetch).
 *
 * @example
 * ```typescript
 * const client = new TavilySearchClient({
 *   apiKey: getApiKey('tavily'),
 *   maxResults: 5,
 *   searchDepth: 'basic',
 *   timeoutMs: 30000,
 * });
 * const { answer, results } = await client.search('Microsoft gross margin 2024');
 * ```
 */
export class TavilySearchClient implements SearchClient {
  readonly name = 'tavily';
  private readonly endpoint: string;

  constructor(private readonly options: TavilyClientOptions) {
    this.endpoint = options.endpoint ?? TAVILY_ENDPOINT;
  }

  async search(query: string): Promise<SearchResponse> {
    const apiKey = this.options.apiKey;
    if (!apiKey) {
      throw new APIKeyError('Tavily', 'TAVILY_API_KEY');
    }

    const controller = new AbortController();
    const body = JSON.stringify({
      api_key: apiKey,
      query,
      max_results: this.options.maxResults,
      search_depth: this.options.searchDepth,
      include_answer: true,
    });

    const data = await withTimeout(
      async () => {
        const response = await fetch(this.endpoint, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body,
          signal: controller.signal,
        });
        if (!response.ok) {
          throw new SearchHttpError(response.status, await response.text());
        }
        const json: unknown = await response.json();
        return json;
      },
      this.options.timeoutMs,
      'Web search'
    ).catch((error: unknown) => {
      controller.abort();
      throw error;
    });

    const parsed = TavilyResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error(`Unexpected search response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
    }

    return {
      answer: parsed.data.answer ?? undefined,
      results: parsed.data.results.map((r) => ({
        title: r.title ?? undefined,
        url: r.url,
        content: r.content ?? '',
        score: r.score ?? undefined,
      })),
    };
  }
}

// ============================================================================
// ADAPTER
// ============================================================================

/**
 * True for failures worth another attempt.
 */
export function isRetryableSearchError(error: Error): boolean {
  if (error instanceof APIKeyError) return false;
  if (error instanceof SearchHttpError) {
    return error.status === 429 || error.status >= 500;
  }
  // Network errors (TypeError from fetch), timeouts, malformed bodies
  return true;
}

function toCitation(hit: SearchHit): WebCitation {
  return hit.title ? { sourceType: 'web', url: hit.url, title: hit.title } : { sourceType: 'web', url: hit.url };
}

/**
 * Shape a raw search response into a ToolResult.
 */
export function normalizeSearchResponse(response: SearchResponse): ToolResult {
  const hits = response.results.filter((hit) => hit.url.trim() !== '');

  const answer = response.answer?.trim();
  let answerText: string;
  if (answer) {
    answerText = answer;
  } else if (hits.length > 0) {
    answerText = hits
      .slice(0, FALLBACK_RESULT_COUNT)
      .map((hit, i) => `[Source ${i + 1}]: ${hit.content.slice(0, FALLBACK_CONTENT_LENGTH)}`)
      .join('\n\n');
  } else {
    answerText = NO_WEB_RESULTS;
  }

  const seen = new Set<string>();
  const citations: Citation[] = [];
  for (const hit of hits) {
    if (seen.has(hit.url)) continue;
    seen.add(hit.url);
    citations.push(toCitation(hit));
  }

  const passages: EvidencePassage[] = hits
    .filter((hit) => hit.content.trim() !== '')
    .map((hit): EvidencePassage => {
      const passage: EvidencePassage = { text: hit.content, citation: toCitation(hit) };
      if (hit.score !== undefined) passage.score = hit.score;
      return passage;
    });

  // The provider's summary is evidence too, attributed to its top result
  const topHit = hits[0];
  if (answer && topHit) {
    passages.unshift({ text: answer, citation: toCitation(topHit) });
  }

  return { tool: 'web_search', answerText, citations, passages };
}

export interface ExternalSearchOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/**
 * Wraps a SearchClient with retry and result normalization.
 */
export class ExternalSearchAdapter implements EvidenceTool {
  readonly name = 'web_search' as const;
  private readonly logger: Logger;

  constructor(
    private readonly client: SearchClient,
    private readonly options: ExternalSearchOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * EvidenceTool entry point; same as search().
   */
  run(query: string): Promise<ToolResult> {
    return this.search(query);
  }

  /**
   * @throws ExternalSearchUnavailableError when the search can't be completed
   */
  async search(query: string): Promise<ToolResult> {
    const maxAttempts = this.options.maxAttempts ?? 3;

    try {
      const response = await retryWithBackoff(() => this.client.search(query), {
        maxAttempts,
        baseDelayMs: this.options.baseDelayMs ?? 1000,
        shouldRetry: isRetryableSearchError,
        onRetry: (error, attempt, delayMs) =>
          this.logger.debug?.(
            `${this.client.name} search attempt ${attempt} failed (${error.message}); retrying in ${delayMs}ms`
          ),
        sleep: this.options.sleep,
      });
      return normalizeSearchResponse(response);
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        const last = error.lastError;
        const reason =
          last instanceof APIKeyError
            ? 'TAVILY_API_KEY is not set'
            : last instanceof TimeoutError
              ? `request timed out after ${last.timeoutMs}ms`
              : (last?.message ?? 'unknown error');
        throw new ExternalSearchUnavailableError(reason, error.errors.length, last);
      }
      throw error;
    }
  }
}
