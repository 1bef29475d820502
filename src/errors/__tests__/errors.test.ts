/**
 * Error Tests
 *
 * Class messages/hints/codes, normalization to ErrorOutput, and the
 * terminal rendering (with chalk disabled).
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import chalk from 'chalk';
import {
  ExitCode,
  CLIError,
  DocumentNotFoundError,
  DocumentParseError,
  IndexNotBuiltError,
  ConfigError,
  APIKeyError,
  DatabaseError,
  ValidationError,
  toErrorOutput,
  formatError,
  getExitCode,
} from '../index.js';

describe('error classes', () => {
  it.each([
    [new CLIError('boom'), 'CLIError', ExitCode.General],
    [new DocumentNotFoundError('/filings/missing.htm'), 'DocumentNotFoundError', ExitCode.Document],
    [new DocumentParseError('acme-2023', 'no text found'), 'DocumentParseError', ExitCode.Document],
    [new IndexNotBuiltError('acme-2023'), 'IndexNotBuiltError', ExitCode.Document],
    [new ConfigError('bad'), 'ConfigError', ExitCode.Config],
    [new APIKeyError('Tavily'), 'APIKeyError', ExitCode.Credentials],
    [new DatabaseError('locked'), 'DatabaseError', ExitCode.Database],
    [new ValidationError('bad input'), 'ValidationError', ExitCode.General],
  ])('%s has name %s and exit code %i', (error, name, code) => {
    expect(error).toBeInstanceOf(CLIError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe(name);
    expect(error.code).toBe(code);
  });

  it('builds document messages from the path and source', () => {
    expect(new DocumentNotFoundError('/filings/missing.htm').message).toBe(
      'Document does not exist: /filings/missing.htm'
    );
    expect(new DocumentParseError('acme-2023', 'no text found').message).toBe(
      'Could not parse document "acme-2023": no text found'
    );
    expect(new IndexNotBuiltError('acme-2023').hint).toBe('Run: fra index <file>  to build it');
  });

  it('derives the env var for APIKeyError unless given', () => {
    expect(new APIKeyError('Tavily').hint).toBe(
      'Set the TAVILY_API_KEY environment variable (a .env file works too)'
    );
    expect(new APIKeyError('Anthropic', 'CLAUDE_KEY').hint).toBe(
      'Set the CLAUDE_KEY environment variable (a .env file works too)'
    );
  });

  it('keeps the cause of a DatabaseError', () => {
    const cause = new Error('SQLITE_BUSY');
    expect(new DatabaseError('Database locked', cause).cause).toBe(cause);
  });

  it('lists ValidationError issues in the hint', () => {
    const error = new ValidationError('Invalid input', ['top_k: must be positive', 'query: empty']);
    expect(error.hint).toBe('Issues:\n  top_k: must be positive\n  query: empty');
    expect(new ValidationError('Invalid input').hint).toBe('Check your input and try again');
  });
});

describe('toErrorOutput', () => {
  it('carries the hint and code of a CLIError', () => {
    expect(toErrorOutput(new ConfigError('Bad config', 'Fix it'))).toEqual({
      error: 'Bad config',
      type: 'ConfigError',
      code: ExitCode.Config,
      hint: 'Fix it',
    });
  });

  it('treats plain errors as general failures', () => {
    expect(toErrorOutput(new TypeError('x is undefined'))).toEqual({
      error: 'x is undefined',
      type: 'TypeError',
      code: ExitCode.General,
    });
  });

  it('stringifies non-errors', () => {
    expect(toErrorOutput(42)).toEqual({ error: '42', type: 'UnknownError', code: ExitCode.General });
  });

  it('adds the stack only when verbose', () => {
    const error = new CLIError('boom');
    expect(toErrorOutput(error).stack).toBeUndefined();
    expect(toErrorOutput(error, true).stack).toBe(error.stack);
  });
});

describe('formatError', () => {
  let level: typeof chalk.level;

  beforeAll(() => {
    level = chalk.level;
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = level;
  });

  it('prints the message and hint', () => {
    expect(formatError(new CLIError('Failed', 'Try again'))).toBe('Error: Failed\nHint: Try again');
  });

  it('prints no hint line for a CLIError without one', () => {
    expect(formatError(new CLIError('Failed'))).toBe('Error: Failed');
  });

  it('suggests --verbose for unexpected errors', () => {
    expect(formatError(new Error('Something broke'))).toBe(
      'Error: Something broke\nHint: Run with --verbose for more details'
    );
  });

  it('appends the stack trace when verbose', () => {
    const error = new Error('Something broke');
    const lines = formatError(error, { verbose: true }).split('\n');

    expect(lines.slice(0, 3)).toEqual(['Error: Something broke', '', 'Stack trace:']);
  });

  it('prints the ErrorOutput as JSON', () => {
    const parsed: unknown = JSON.parse(formatError(new APIKeyError('Tavily'), { json: true }));
    expect(parsed).toEqual({
      error: 'Tavily API key not configured',
      type: 'APIKeyError',
      code: 4,
      hint: 'Set the TAVILY_API_KEY environment variable (a .env file works too)',
    });
  });
});

describe('getExitCode', () => {
  it('uses the CLIError code', () => {
    expect(getExitCode(new DatabaseError('locked'))).toBe(5);
    expect(getExitCode(new CLIError('x', undefined, ExitCode.ServiceUnavailable))).toBe(7);
  });

  it('returns 1 for anything else', () => {
    expect(getExitCode(new Error('test'))).toBe(1);
    expect(getExitCode(null)).toBe(1);
  });
});
