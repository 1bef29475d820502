/**
 * Logger
 *
 * Library classes take a Logger in their options instead of writing to the
 * console. The CLI's CommandContext already has this shape, so commands
 * pass `ctx` straight through and --verbose/--json apply everywhere.
 */

export interface Logger {
  warn: (message: string) => void;
  /** Optional; only shown by the CLI under --verbose */
  debug?: (message: string) => void;
}

/**
 * Used when nothing is injected: warnings on stderr, debug dropped.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
};

export const silentLogger: Logger = {
  warn: () => undefined,
  debug: () => undefined,
};

/**
 * Prefix every message with `[scope] `.
 *
 * @example
 * ```typescript
 * scopedLogger(ctx, 'web_search').warn('rate limited');
 * // [web_search] rate limited
 * ```
 */
export function scopedLogger(logger: Logger, scope: string): Logger {
  const debug = logger.debug;
  return {
    warn: (message) => logger.warn(`[${scope}] ${message}`),
    debug: debug === undefined ? undefined : (message) => debug(`[${scope}] ${message}`),
  };
}
