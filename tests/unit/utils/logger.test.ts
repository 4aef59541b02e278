import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, isLogLevel } from '../../../src/utils/logger.js';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('recognizes log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });

  it('writes info and debug lines to stderr', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const log = createLogger({ level: 'debug', prefix: 'test' });

    log.info('copy started', { bytes: 3 });
    log.debug('tick');

    expect(write).toHaveBeenNthCalledWith(1, '[test] INFO: copy started {"bytes":3}\n');
    expect(write).toHaveBeenNthCalledWith(2, '[test] DEBUG: tick \n');
  });

  it('drops messages below the configured level', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = createLogger({ level: 'error' });

    log.debug('hidden');
    log.info('hidden');
    log.warn('hidden');
    log.error('shown', { code: 1 });

    expect(write).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[bytepace] ERROR:', 'shown', { code: 1 });
  });

  it('changes level at runtime', () => {
    const log = createLogger({ level: 'info' });
    log.setLevel('warn');
    expect(log.getLevel()).toBe('warn');
  });
});
