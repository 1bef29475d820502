/**
 * Agent Session Setup
 *
 * What `fra ask` and `fra chat` do before the first question: migrate the
 * database, bring the filing index up to date, and wire the agent.
 *
 * The index is refreshed from config.document.path when that file exists.
 * An unchanged filing is loaded from storage without re-embedding. When the
 * file is missing the stored index is used as is, and when neither exists
 * document_qa reports the filing as unavailable on each question.
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import chalk from 'chalk';
import ora from 'ora';
import type { CommandContext } from '../types.js';
import type { Config } from '../../config/schema.js';
import { loadConfig } from '../../config/loader.js';
import { runMigrations } from '../../database/index.js';
import { CLIError } from '../../errors/index.js';
import { createDocumentIndexer, createResearchAgent } from '../../agent/factory.js';
import type { ResearchAgent } from '../../agent/research-agent.js';
import type { DocumentIndexer } from '../../indexer/document-indexer.js';
import type { IndexSummary } from '../../indexer/types.js';

export interface SessionOptions {
  /** Skip web search entirely (--no-web) */
  disableWeb?: boolean;
  /** Chunks retrieved per question (--top-k) */
  topK?: number;
}

export interface ResearchSession {
  config: Config;
  indexer: DocumentIndexer;
  agent: ResearchAgent;
  /** Undefined when the filing could not be loaded up front */
  index?: IndexSummary;
}

/**
 * Load or build the configured filing's index.
 *
 * Filing problems (missing, unparseable, mismatched) are reported as
 * warnings; the agent can still answer live-data questions without it.
 */
export async function prepareIndex(
  ctx: CommandContext,
  config: Config,
  indexer: DocumentIndexer
): Promise<IndexSummary | undefined> {
  const documentPath = resolve(config.document.path);
  const sourceId = config.document.source_id;

  if (!existsSync(documentPath)) {
    ctx.debug(`Filing not found at ${documentPath}; using the stored index for "${sourceId}"`);
    return undefined;
  }

  const spinner =
    !ctx.options.json && process.stdout.isTTY ? ora({ text: `Loading ${sourceId} index...` }).start() : null;

  try {
    const summary = await indexer.ensureIndex(documentPath, sourceId);
    const how = summary.cached ? 'loaded' : 'built';
    spinner?.succeed(`${sourceId} index ${how} (${summary.chunkCount} chunks)`);
    ctx.debug(`Index ${how} in ${summary.durationMs.toFixed(0)}ms`);
    return summary;
  } catch (error) {
    spinner?.fail(`Could not load the ${sourceId} index`);
    if (error instanceof CLIError) {
      ctx.warn(error.message);
      return undefined;
    }
    throw error;
  }
}

/**
 * Everything a command needs to answer questions.
 */
export async function openResearchSession(ctx: CommandContext, options: SessionOptions = {}): Promise<ResearchSession> {
  runMigrations();
  const config = loadConfig();

  ctx.debug(`Embedding: ${config.embedding.model} (${config.embedding.provider})`);
  ctx.debug(`LLM: ${config.default_provider}/${config.default_model}`);

  const indexer = createDocumentIndexer(config, { logger: ctx });
  const index = await prepareIndex(ctx, config, indexer);

  const agent = createResearchAgent(config, {
    indexer,
    disableWeb: options.disableWeb,
    topK: options.topK,
    logger: ctx,
    fallback: {
      onFallback: (from, to, reason) => {
        ctx.warn(`${from} unavailable (${reason}); answering with ${to}`);
      },
    },
  });

  if (options.disableWeb) {
    ctx.log(chalk.dim('Live web search disabled; answering from the 10-K filing only.'));
  }

  return { config, indexer, agent, index };
}

/**
 * Parse and validate a --top-k option.
 *
 * @throws CLIError if not an integer in [1, max]
 */
export function parseTopK(value: string, max: number): number {
  const topK = Number(value);

  if (!Number.isInteger(topK) || topK < 1) {
    throw new CLIError(`Invalid --top-k value: "${value}"`, `Must be a positive integer (1-${max})`);
  }

  if (topK > max) {
    throw new CLIError(`--top-k value too large: ${topK}`, `Maximum allowed is ${max}`);
  }

  return topK;
}
