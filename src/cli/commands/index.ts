/**
 * Index Command
 *
 * Builds the vector index for a 10-K filing.
 *
 * Usage:
 *   fra index                          Index config.document.path
 *   fra index ./aapl-10k.htm           Index a specific file
 *   fra index ./aapl-10k.htm -s aapl   Store under another source id
 *   fra index --force                  Rebuild even if the index is current
 *   fra index --json                   Output progress as NDJSON
 *
 * The build:
 * 1. Parsing - Extract text blocks with section labels and pages
 * 2. Chunking - Split into overlapping word windows
 * 3. Embedding - Compute a vector for each chunk
 * 4. Storing - Replace the source's chunks in one transaction
 *
 * An unchanged file with an unchanged embedding model is loaded, not rebuilt.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { existsSync, statSync } from 'node:fs';
import type { CommandContext } from '../types.js';
import { ProgressReporter } from '../utils/progress.js';
import { loadConfig } from '../../config/loader.js';
import { runMigrations } from '../../database/index.js';
import { createDocumentIndexer } from '../../agent/factory.js';
import { DocumentNotFoundError } from '../../errors/index.js';

/**
 * Command-specific options.
 */
interface IndexCommandOptions {
  sourceId?: string;
  force: boolean;
}

/**
 * Create the index command.
 *
 * @param getContext - Factory function to get the command context
 */
export function createIndexCommand(getContext: () => CommandContext): Command {
  return new Command('index')
    .argument('[file]', 'Filing HTML file (defaults to document.path from config)')
    .description('Index a 10-K filing for question answering')
    .option('-s, --source-id <id>', 'Source id to store the index under (defaults to document.source_id)')
    .option('--force', 'Rebuild even if the stored index is current', false)
    .action(async (file: string | undefined, cmdOptions: IndexCommandOptions) => {
      const ctx = getContext();
      const config = loadConfig();

      const documentPath = resolve(file ?? config.document.path);
      const sourceId = cmdOptions.sourceId ?? config.document.source_id;

      if (!existsSync(documentPath) || !statSync(documentPath).isFile()) {
        throw new DocumentNotFoundError(documentPath);
      }

      ctx.debug(`Indexing file: ${documentPath}`);
      ctx.debug(`Source id: ${sourceId}`);
      ctx.debug(`Embedding: ${config.embedding.model} (${config.embedding.provider})`);

      runMigrations();

      const reporter = new ProgressReporter({
        json: ctx.options.json,
        isInteractive: process.stdout.isTTY ?? false,
      });

      const indexer = createDocumentIndexer(config, {
        onProgress: (progress) => reporter.update(progress),
        logger: ctx,
      });

      try {
        const summary = await indexer.ensureIndex(documentPath, sourceId, { force: cmdOptions.force });
        reporter.finish(summary);
      } catch (error) {
        reporter.fail('Indexing failed');
        throw error;
      }
    });
}
