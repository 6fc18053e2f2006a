import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger, isLogLevel, setLogLevel } from './logger';

afterEach(() => {
  setLogLevel('info');
  vi.restoreAllMocks();
});

describe('createLogger', () => {
  it('prefixes messages with the scope', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    createLogger('alignment').info('📐 Aligned', 3);

    expect(log).toHaveBeenCalledWith('[alignment]', '📐 Aligned', 3);
  });

  it('drops messages below the minimum level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger('cache');

    setLogLevel('error');
    logger.debug('hidden');
    logger.warn('hidden too');
    logger.error('❌ shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[cache]', '❌ shown');
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});
