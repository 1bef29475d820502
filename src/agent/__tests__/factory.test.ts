/**
 * Agent Factory Tests
 *
 * The whole pipeline against an in-memory database, the hashing embedder,
 * a fake search client and a fake model.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type Database from 'better-sqlite3';

import { createDocumentIndexer, createResearchAgent } from '../factory.js';
import type { SearchClient, SearchResponse } from '../tools/web-search.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';
import type { Config } from '../../config/schema.js';
import { _clearEnvCache } from '../../config/env.js';
import type { DatabaseOperations } from '../../database/index.js';
import type { CompletionProvider } from '../../providers/types.js';
import { silentLogger } from '../../utils/logger.js';
import { buildFilingHtml, createTestDatabase, words } from '../../test-utils/index.js';

const CONFIG: Config = {
  ...DEFAULT_CONFIG,
  embedding: { ...DEFAULT_CONFIG.embedding, dimensions: 1024 },
  indexing: { chunk_size: 20, chunk_overlap: 5, chars_per_page: 3000, min_words: 10 },
  search: { top_k: 5 },
  web_search: { ...DEFAULT_CONFIG.web_search, max_attempts: 1 },
};

const FILING = buildFilingHtml({
  cover: [words(10, 'c')],
  sections: [
    {
      heading: 'Item 1A. Risk Factors',
      paragraphs: ['Component shortages and supply chain disruptions could reduce gross margin and delay shipments.'],
    },
  ],
});

const COMPARATIVE_QUESTION = "How does the gross margin compare to Microsoft's current gross margin?";

const SEARCH_RESPONSE: SearchResponse = {
  answer: 'Microsoft gross margin is about 69%.',
  results: [{ title: 'Quarterly results', url: 'https://example.com/msft', content: 'Gross margin was 69%.' }],
};

describe('createResearchAgent', () => {
  let db: Database.Database;
  let ops: DatabaseOperations;
  const completionProvider: CompletionProvider = {
    name: 'fake',
    model: 'fake-model',
    complete: vi.fn(async () => 'Margins are under pressure [S1].'),
  };
  const searchClient: SearchClient = { name: 'fake-search', search: vi.fn(async () => SEARCH_RESPONSE) };

  beforeEach(async () => {
    ({ db, ops } = createTestDatabase());
    const indexer = createDocumentIndexer(CONFIG, { db: ops, logger: silentLogger });
    await indexer.buildIndex(FILING, CONFIG.document.source_id);
  });

  afterEach(() => {
    db.close();
    vi.unstubAllEnvs();
    vi.unstubAllGlobals();
    _clearEnvCache();
  });

  it('should answer from the persisted index and live search', async () => {
    const agent = createResearchAgent(CONFIG, {
      db: ops,
      completionProvider,
      searchClient,
      logger: silentLogger,
    });

    const answer = await agent.ask(COMPARATIVE_QUESTION);

    expect(answer.text).toBe('Margins are under pressure [S1].');
    expect(answer.toolsUsed).toEqual(['document_qa', 'web_search']);
    expect(answer.citations).toContainEqual({ sourceType: 'document', section: 'Risk Factors', page: 1 });
    expect(answer.citations[answer.citations.length - 1]).toEqual({
      sourceType: 'web',
      url: 'https://example.com/msft',
      title: 'Quarterly results',
    });
    expect(searchClient.search).toHaveBeenCalledWith(COMPARATIVE_QUESTION);
  });

  it('should answer from the filing only when web search is disabled', async () => {
    const agent = createResearchAgent(CONFIG, {
      db: ops,
      completionProvider,
      disableWeb: true,
      logger: silentLogger,
    });

    const answer = await agent.ask(COMPARATIVE_QUESTION);

    expect(answer.toolsUsed).toEqual(['document_qa']);
    expect(answer.unavailableTools).toEqual(['web_search']);
    expect(answer.citations.every((c) => c.sourceType === 'document')).toBe(true);
  });

  it('should degrade when no Tavily key is configured', async () => {
    vi.stubEnv('TAVILY_API_KEY', '');
    _clearEnvCache();
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);

    const agent = createResearchAgent(CONFIG, { db: ops, completionProvider, logger: silentLogger });
    const answer = await agent.ask(COMPARATIVE_QUESTION);

    expect(fetchMock).not.toHaveBeenCalled();
    expect(answer.invocations[1]).toMatchObject({
      toolName: 'web_search',
      error: 'external_search_unavailable',
      errorMessage: 'Live web search is unavailable: TAVILY_API_KEY is not set',
    });
    expect(answer.notes).toEqual([
      'Note: live web data was unavailable, so this answer relies on the 10-K filing only.',
    ]);
  });

  it('should add configured routing keywords', async () => {
    const agent = createResearchAgent(
      { ...CONFIG, routing: { extra_live_keywords: ['guidance'] } },
      { db: ops, completionProvider, searchClient, logger: silentLogger }
    );

    expect(agent.plan('What is the latest guidance?').routing.tools).toEqual(['web_search']);
  });
});
