import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger } from '../logger.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops entries below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = createLogger('warn');
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[memphora] shown');
  });

  it('routes levels to matching console methods', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = createLogger('debug', 'test');
    logger.debug('d');
    logger.info('i', { userId: 'u1' });
    logger.error('e');

    expect(log.mock.calls).toEqual([['[test] d'], ['[test] i {"userId":"u1"}']]);
    expect(error).toHaveBeenCalledWith('[test] e');
  });

  it('omits empty extra objects', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    createLogger('info').info('ready', {});
    expect(log).toHaveBeenCalledWith('[memphora] ready');
  });

  it('writes extra fields into the same line', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    createLogger('debug').warn('retrying', { attempt: 2, path: '/health' });
    expect(warn.mock.calls).toEqual([['[memphora] retrying {"attempt":2,"path":"/health"}']]);
  });

  it('silent drops everything', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    createLogger('silent').error('nope');
    expect(error).not.toHaveBeenCalled();
  });
});
