/**
 * Config Command
 *
 *   fra config list               All settings, defaults included
 *   fra config get <key>          One setting
 *   fra config set <key> <value>  Write an override to ~/.fra/config.toml
 *   fra config unset <key>        Drop an override
 *   fra config path               Where the file lives
 *   fra config reset --force      Back to the commented template
 *
 * Keys are dot paths into the TOML file, e.g. web_search.max_results.
 * Failures are thrown and reported by the global handler like every
 * other command.
 */

import { existsSync, unlinkSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import {
  getConfigValue,
  isConfigKey,
  listConfig,
  loadConfig,
  setConfigValue,
  unsetConfigValue,
} from '../../config/loader.js';
import { getConfigPath } from '../../config/paths.js';
import { CLIError, ConfigError } from '../../errors/index.js';

/**
 * Display form of a config value; arrays in TOML's bracket syntax.
 */
export function formatValue(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => (typeof item === 'string' ? `"${item}"` : String(item))).join(', ')}]`;
  }
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * `config list` lines: one block per top-level table, headed like TOML.
 */
export function renderConfigList(entries: Array<[string, unknown]>): string[] {
  const lines: string[] = [];
  let table: string | undefined;

  for (const [key, value] of entries) {
    const dot = key.indexOf('.');
    const group = dot === -1 ? '' : key.slice(0, dot);
    if (group !== table) {
      if (lines.length > 0) lines.push('');
      if (group !== '') lines.push(chalk.dim(`[${group}]`));
      table = group;
    }
    const name = dot === -1 ? key : key.slice(dot + 1);
    lines.push(`${chalk.cyan(name)} = ${chalk.yellow(formatValue(value))}`);
  }

  return lines;
}

function output(ctx: CommandContext, json: unknown, text: string): void {
  if (ctx.options.json) {
    console.log(JSON.stringify(json));
  } else {
    ctx.log(text);
  }
}

export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('View and change settings');

  configCmd
    .command('list')
    .alias('ls')
    .description('Show every setting')
    .action(() => {
      const ctx = getContext();
      const entries = listConfig();

      if (ctx.options.json) {
        console.log(JSON.stringify(loadConfig(), null, 2));
        return;
      }

      for (const line of renderConfigList(entries)) {
        ctx.log(line);
      }
      ctx.log('');
      ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
    });

  configCmd
    .command('get <key>')
    .description('Show one setting (e.g. fra config get web_search.max_results)')
    .action((key: string) => {
      const ctx = getContext();
      if (!isConfigKey(key)) {
        throw new ConfigError(`Unknown config key: ${key}`);
      }

      const value = getConfigValue(key);
      if (value === undefined) {
        output(ctx, { key, value: null }, chalk.dim('(not set)'));
        return;
      }
      output(ctx, { key, value }, formatValue(value));
    });

  configCmd
    .command('set <key> <value>')
    .description('Override a setting (e.g. fra config set search.top_k 8)')
    .action((key: string, value: string) => {
      const ctx = getContext();

      if (!isConfigKey(key)) {
        throw new ConfigError(`Unknown config key: ${key}`);
      }
      setConfigValue(key, value);

      const stored = getConfigValue(key);
      output(ctx, { key, value: stored }, `${chalk.green('✓')} ${chalk.cyan(key)} = ${chalk.yellow(formatValue(stored))}`);
    });

  configCmd
    .command('unset <key>')
    .description('Drop an override and use the default again')
    .action((key: string) => {
      const ctx = getContext();
      const removed = unsetConfigValue(key);

      output(
        ctx,
        { key, removed, value: getConfigValue(key) },
        removed ? `${chalk.green('✓')} ${chalk.cyan(key)} reset to default` : chalk.dim(`${key} was not overridden`)
      );
    });

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath();
      output(ctx, { path: configPath }, configPath);
    });

  configCmd
    .command('reset')
    .description('Replace the config file with the defaults')
    .option('-f, --force', 'Confirm the reset')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();

      if (!options.force) {
        throw new CLIError('Refusing to reset without --force', 'Run: fra config reset --force');
      }

      const configPath = getConfigPath();
      if (existsSync(configPath)) {
        unlinkSync(configPath);
      }
      loadConfig(true);

      output(ctx, { reset: true, path: configPath }, `${chalk.green('✓')} Configuration reset to defaults`);
    });

  return configCmd;
}
