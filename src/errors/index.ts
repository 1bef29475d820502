/**
 * Errors
 *
 * Commands throw CLIError subclasses; main() hands whatever escapes to
 * handleError, which prints it (text or --json) and exits with its code.
 *
 * @example
 * ```typescript
 * import { ConfigError } from './errors/index.js';
 *
 * throw new ConfigError('Unknown config key: search.nope');
 * // Error: Unknown config key: search.nope
 * // Hint: Run: fra config list  to see valid options     (exit 2)
 * ```
 */

// Error types
export {
  ExitCode,
  CLIError,
  DocumentNotFoundError,
  DocumentParseError,
  IndexNotBuiltError,
  ConfigError,
  APIKeyError,
  DatabaseError,
  ValidationError,
} from './types.js';

// Error handling utilities
export {
  toErrorOutput,
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
