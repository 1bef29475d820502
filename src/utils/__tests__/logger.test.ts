/**
 * Logger Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { scopedLogger, type Logger } from '../logger.js';

describe('scopedLogger', () => {
  it('prefixes warnings and debug messages', () => {
    const base = { warn: vi.fn(), debug: vi.fn() };
    const logger = scopedLogger(base, 'web_search');

    logger.warn('rate limited');
    logger.debug?.('attempt 2');

    expect(base.warn).toHaveBeenCalledWith('[web_search] rate limited');
    expect(base.debug).toHaveBeenCalledWith('[web_search] attempt 2');
  });

  it('has no debug when the base logger has none', () => {
    const base: Logger = { warn: vi.fn() };
    expect(scopedLogger(base, 'synthesis').debug).toBeUndefined();
  });
});
