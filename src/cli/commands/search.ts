/**
 * Search Command
 *
 * Retrieval only: the filing chunks closest to a query, with scores.
 * No routing, no web search and no model call, which makes it the quickest
 * way to check what document_qa would see.
 *
 *   fra search "supply chain concentration"
 *   fra search "share repurchases" --top-k 10 --json
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { runMigrations } from '../../database/index.js';
import { ValidationError } from '../../errors/index.js';
import { createDocumentIndexer, createRetriever } from '../../agent/factory.js';
import { formatResults, formatResultsJSON } from '../../search/formatter.js';
import { parseTopK } from '../utils/agent-session.js';

interface SearchCommandOptions {
  topK?: string;
  sourceId?: string;
}

const MAX_TOP_K = 50;

export function createSearchCommand(getContext: () => CommandContext): Command {
  return new Command('search')
    .argument('<query>', 'Text to search the indexed filing for')
    .description('Show the filing passages closest to a query')
    .option('-k, --top-k <number>', 'Number of results')
    .option('-s, --source-id <id>', 'Indexed source to search (defaults to document.source_id)')
    .action(async (query: string, cmdOptions: SearchCommandOptions) => {
      const ctx = getContext();
      const trimmed = query.trim();
      if (trimmed === '') {
        throw new ValidationError('Search query cannot be empty', ['Provide a query, e.g.: fra search "risk factors"']);
      }

      runMigrations();
      const config = loadConfig();
      const topK = cmdOptions.topK === undefined ? config.search.top_k : parseTopK(cmdOptions.topK, MAX_TOP_K);

      const indexer = createDocumentIndexer(config, { logger: ctx });
      const retriever = createRetriever(indexer, config, { sourceId: cmdOptions.sourceId, topK, logger: ctx });

      const start = performance.now();
      const results = await retriever.query(trimmed, topK);
      const searchMs = performance.now() - start;
      ctx.debug(`Search took ${searchMs.toFixed(0)}ms`);

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            { query: trimmed, count: results.length, results: formatResultsJSON(results), metadata: { searchMs } },
            null,
            2
          )
        );
        return;
      }

      if (results.length === 0) {
        ctx.log(chalk.yellow(`No passages found for: "${trimmed}"`));
        return;
      }

      ctx.log(chalk.bold(`Top ${results.length} passages for "${trimmed}":`));
      ctx.log('');
      ctx.log(formatResults(results));
    });
}
