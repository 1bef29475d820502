/**
 * Status Command
 *
 * Shows what is indexed and which services are usable:
 *   fra status         - Show status
 *   fra status --json  - Output as JSON
 *
 * Keys are shown masked; only presence is reported in JSON.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { getDatabase, runMigrations } from '../../database/index.js';
import type { SourceRecord } from '../../database/index.js';
import { loadConfig } from '../../config/loader.js';
import { getConfigPath, getDbPath } from '../../config/paths.js';
import { getApiKey, maskSecret, type KeyedService } from '../../config/env.js';
import { DatabaseError } from '../../errors/index.js';
import { formatTable, type Column } from '../../utils/table.js';

const KEYED_SERVICES: ReadonlyArray<[KeyedService, string]> = [
  ['anthropic', 'ANTHROPIC_API_KEY'],
  ['openai', 'OPENAI_API_KEY'],
  ['tavily', 'TAVILY_API_KEY'],
];

/**
 * The configured filing is marked with "*".
 */
function sourceColumns(activeSourceId: string): Array<Column<SourceRecord>> {
  return [
    { header: 'Source', value: (s) => (s.sourceId === activeSourceId ? `${s.sourceId} *` : s.sourceId), maxWidth: 32 },
    { header: 'Chunks', value: (s) => s.chunkCount, align: 'right' },
    { header: 'Pages', value: (s) => `${s.pageCount} (${s.pageStrategy})`, align: 'right' },
    { header: 'Model', value: (s) => s.embeddingModel },
    { header: 'Indexed', value: (s) => s.indexedAt },
  ];
}

/**
 * Format bytes to human-readable size (e.g., "127.4 MB")
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 Bytes';

  const k = 1024;
  const sizes = ['Bytes', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);

  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i] ?? 'Bytes'}`;
}

/**
 * Format a path with ~ for home directory
 */
function formatPath(filePath: string): string {
  const homeDir = process.env['HOME'] ?? process.env['USERPROFILE'] ?? '';
  if (homeDir && filePath.startsWith(homeDir)) {
    return '~' + filePath.slice(homeDir.length);
  }
  return filePath;
}

function listIndexedSources(): SourceRecord[] {
  try {
    runMigrations();
    return getDatabase().listSources();
  } catch (error) {
    throw new DatabaseError('Failed to read indexed sources', error instanceof Error ? error : undefined);
  }
}

/**
 * Create the status command
 */
export function createStatusCommand(getContext: () => CommandContext): Command {
  return new Command('status')
    .description('Show indexed filings and service configuration')
    .action(() => {
      const ctx = getContext();
      ctx.debug('Fetching status...');

      const sources = listIndexedSources();
      const config = loadConfig();
      const dbPath = getDbPath();
      const dbSize = getDatabase().getDatabaseSize();
      const configPath = getConfigPath();

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            {
              sources,
              document: config.document,
              database: { path: dbPath, size: dbSize, sizeFormatted: formatBytes(dbSize) },
              embedding: { provider: config.embedding.provider, model: config.embedding.model },
              llm: { provider: config.default_provider, model: config.default_model },
              keys: Object.fromEntries(KEYED_SERVICES.map(([service]) => [service, getApiKey(service) !== undefined])),
              config: { path: configPath },
            },
            null,
            2
          )
        );
        return;
      }

      const lines: string[] = [];
      lines.push(chalk.bold('Filing Research Status'));
      lines.push(chalk.dim('─'.repeat(35)));

      if (sources.length === 0) {
        lines.push(chalk.yellow('No filings indexed.'));
        lines.push(`Run ${chalk.cyan('fra index <file>')} to get started.`);
      } else {
        lines.push(formatTable(sourceColumns(config.document.source_id), sources));
      }

      lines.push('');
      lines.push(`${chalk.cyan('Filing:')}       ${config.document.path} (${config.document.source_id})`);
      lines.push(`${chalk.cyan('Database:')}     ${formatBytes(dbSize)} (${formatPath(dbPath)})`);
      lines.push(`${chalk.cyan('Embeddings:')}   ${config.embedding.model} (${config.embedding.provider})`);
      lines.push(`${chalk.cyan('Provider:')}     ${config.default_provider} (${config.default_model})`);
      lines.push(`${chalk.cyan('Config:')}       ${formatPath(configPath)}`);

      lines.push('');
      for (const [service, envVar] of KEYED_SERVICES) {
        const key = getApiKey(service);
        const shown = key === undefined ? chalk.dim(maskSecret(key)) : maskSecret(key);
        lines.push(`${chalk.cyan(`${envVar}:`.padEnd(19))}${shown}`);
      }

      ctx.log(lines.join('\n'));
    });
}
