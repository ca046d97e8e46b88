import { describe, it, expect, vi, afterEach } from 'vitest';
import { createConsoleLogger, isLogLevel } from './logger.js';

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops messages below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const logger = createConsoleLogger('warn');
    logger.debug('hidden');
    logger.warn('shown', { attempt: 1 });

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[evm-rpc] shown', { attempt: 1 });
  });

  it('silent suppresses errors too', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createConsoleLogger('silent', 'ws').error('boom');

    expect(error).not.toHaveBeenCalled();
  });

  it('isLogLevel recognizes level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
