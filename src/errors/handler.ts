/**
 * Error reporting for the CLI
 *
 * Every command lets its errors propagate to main(), which prints them
 * here and exits with the error's code. `--json` prints the ErrorOutput
 * object instead of text; `--verbose` adds the stack trace.
 */

import chalk from 'chalk';
import { CLIError, ExitCode } from './types.js';

export interface ErrorHandlerOptions {
  verbose?: boolean;
  json?: boolean;
}

/**
 * What `--json` prints on stderr.
 */
export interface ErrorOutput {
  error: string;
  /** Error class name, e.g. "ConfigError" */
  type: string;
  code: ExitCode;
  hint?: string;
  stack?: string;
}

const VERBOSE_HINT = 'Run with --verbose for more details';

/**
 * Normalize anything thrown into an ErrorOutput.
 */
export function toErrorOutput(error: unknown, verbose = false): ErrorOutput {
  if (!(error instanceof Error)) {
    return { error: String(error), type: 'UnknownError', code: ExitCode.General };
  }

  const output: ErrorOutput = {
    error: error.message,
    type: error.name,
    code: error instanceof CLIError ? error.code : ExitCode.General,
  };
  if (error instanceof CLIError && error.hint) {
    output.hint = error.hint;
  }
  if (verbose && error.stack) {
    output.stack = error.stack;
  }
  return output;
}

/**
 * Render an error for stderr. Pure, so it can be tested without exiting.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const output = toErrorOutput(error, options.verbose);

  if (options.json) {
    return JSON.stringify(output, null, 2);
  }

  const lines = [`${chalk.red('Error:')} ${output.error}`];

  // Unexpected errors have no hint of their own
  const hint = output.hint ?? (error instanceof Error && !(error instanceof CLIError) && !options.verbose ? VERBOSE_HINT : undefined);
  if (hint) {
    lines.push(`${chalk.dim('Hint:')} ${hint}`);
  }

  if (output.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(output.stack));
  }

  return lines.join('\n');
}

export function getExitCode(error: unknown): ExitCode {
  return error instanceof CLIError ? error.code : ExitCode.General;
}

/**
 * Print the error and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Handler for process-level 'uncaughtException' and 'unhandledRejection'.
 */
export function createGlobalErrorHandler(options: ErrorHandlerOptions = {}): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
