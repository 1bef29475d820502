/**
 * Tool Errors
 */

import { CLIError, ExitCode } from '../../errors/index.js';

/**
 * Live web search could not be reached after its retries, or was never
 * usable (no API key, rejected key).
 */
export class ExternalSearchUnavailableError extends CLIError {
  /** The last error from the search provider */
  public readonly cause?: Error;
  /** Attempts made before giving up */
  public readonly attempts: number;

  constructor(reason: string, attempts: number, cause?: Error) {
    super(
      `Live web search is unavailable: ${reason}`,
      'Check TAVILY_API_KEY and your network connection, or use --no-web',
      ExitCode.ServiceUnavailable
    );
    this.name = 'ExternalSearchUnavailableError';
    this.cause = cause;
    this.attempts = attempts;
  }
}
