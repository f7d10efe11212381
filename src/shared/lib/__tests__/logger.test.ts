import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger, isLogLevel, setLogLevel } from '../logger';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    setLogLevel('info');
  });

  it('prefixes lines with timestamp, level and scope', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    setLogLevel('info');

    createLogger('youtube').info('hello');

    expect(spy).toHaveBeenCalledWith(
      expect.stringMatching(/^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[INFO\] \[youtube\] hello$/)
    );
  });

  it('drops lines below the active level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    setLogLevel('warn');

    const logger = createLogger();
    logger.info('quiet');
    logger.debug('quieter');
    logger.warn('loud');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('recognises only real level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});
