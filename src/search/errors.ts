/**
 * Search Module Errors
 *
 * Custom error classes for search-related failures.
 * All errors extend CLIError for consistent error handling.
 */

import { CLIError, ExitCode } from '../errors/index.js';

/**
 * Thrown when a stored index was built with a different embedding model
 * than the one currently configured.
 *
 * Vectors from two models live in different spaces, so the stored chunks
 * can't be searched with the new model's query vectors.
 */
export class EmbeddingMismatchError extends CLIError {
  constructor(
    public readonly sourceId: string,
    public readonly storedModel: string,
    public readonly configuredModel: string
  ) {
    super(
      `Index for "${sourceId}" was built with ${storedModel}, but ${configuredModel} is configured`,
      'Rebuild it with: fra index --force',
      ExitCode.EmbeddingMismatch
    );
    this.name = 'EmbeddingMismatchError';
  }
}
