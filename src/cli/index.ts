#!/usr/bin/env node
/**
 * Filing Research Agent CLI Entry Point
 *
 * This is the main entry point for the `fra` command.
 * It sets up Commander.js with global options and registers all subcommands.
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import type { GlobalOptions, CommandContext } from './types.js';
import { createAskCommand } from './commands/ask.js';
import { createChatCommand } from './commands/chat.js';
import { createConfigCommand } from './commands/config.js';
import { createIndexCommand } from './commands/index.js';
import { createRouteCommand } from './commands/route.js';
import { createSearchCommand } from './commands/search.js';
import { createStatusCommand } from './commands/status.js';
import { handleError, createGlobalErrorHandler, CLIError, ExitCode } from '../errors/index.js';
import {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
} from '../config/index.js';

const PackageJsonSchema = z.object({ version: z.string() });

/**
 * Version from package.json; two levels up from both src/cli and dist/cli.
 */
function readVersion(): string {
  try {
    const parsed = PackageJsonSchema.safeParse(
      JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'))
    );
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

const program = new Command();

program
  .name('fra')
  .description('Question answering over a 10-K filing with live market data')
  .version(readVersion(), '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText(
    'after',
    `
${chalk.dim('Examples:')}
  ${chalk.cyan('fra index ./filing-10k.htm')}                   Index a 10-K filing
  ${chalk.cyan('fra ask "What are the main risk factors?"')}     Ask one question
  ${chalk.cyan('fra ask "Current stock price?" --json')}         Answer as JSON
  ${chalk.cyan('fra chat')}                                     Ask questions interactively
  ${chalk.cyan('fra search "supply chain"')}                     Show matching filing passages
  ${chalk.cyan('fra route "Compare margins to Microsoft"')}      Show which tools would run
  ${chalk.cyan('fra config set web_search.max_results 8')}       Change a setting
`
  );

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.error(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = () => createContext(getGlobalOptions());

program.addCommand(createIndexCommand(getContext));
program.addCommand(createAskCommand(getContext));
program.addCommand(createChatCommand(getContext));
program.addCommand(createSearchCommand(getContext));
program.addCommand(createRouteCommand(getContext));
program.addCommand(createStatusCommand(getContext));
program.addCommand(createConfigCommand(getContext));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

program.on('command:*', (operands: string[]) => {
  throw new CLIError(`Unknown command: ${operands[0] ?? ''}`, 'Run: fra --help  to see available commands');
});

// Missing keys are warnings: the agent degrades to the sources it can reach
program.hook('preAction', (_thisCommand, actionCommand) => {
  const validationOptions = getValidationOptionsForCommand(actionCommand.name());
  if (validationOptions.skipLLM && validationOptions.skipWebSearch && validationOptions.skipEmbedding) {
    return;
  }

  const opts = getGlobalOptions();
  const result = validateStartupConfig(validationOptions);

  if (result.errors.length > 0 || (result.warnings.length > 0 && !opts.json)) {
    printStartupValidation(result, opts.verbose);
  }

  if (!result.valid) {
    throw new CLIError('Configuration validation failed', 'Fix the issues above and try again', ExitCode.Config);
  }
});

async function main(): Promise<void> {
  // Read lazily so --verbose/--json parsed later still apply
  const globalHandler = (error: unknown) => createGlobalErrorHandler(getGlobalOptions())(error);
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getGlobalOptions());
  }
}

void main();
