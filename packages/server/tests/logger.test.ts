import { afterEach, describe, expect, it, vi } from 'vitest';
import { describeError, getLogLevel, logger, setLogLevel } from '../src/utils/logger.js';

describe('logger', () => {
  afterEach(() => {
    setLogLevel('info');
    vi.restoreAllMocks();
  });

  it('should write the level, message and data on one line', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});

    logger.info('Client connected', { endpoint: '127.0.0.1:5001' });

    expect(info).toHaveBeenCalledTimes(1);
    expect(info.mock.calls[0]?.[0]).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] INFO: Client connected \{"endpoint":"127\.0\.0\.1:5001"\}$/
    );
  });

  it('should omit the data when none is given', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    logger.warn('Server closed');

    expect(warn.mock.calls[0]?.[0]).toMatch(/\] WARN: Server closed$/);
  });

  it('should drop entries below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    setLogLevel('error');
    logger.debug('debug entry');
    logger.info('info entry');
    logger.error('error entry');

    expect(getLogLevel()).toBe('error');
    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('should write debug entries once enabled', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    setLogLevel('debug');
    logger.debug('Move refused');

    expect(debug).toHaveBeenCalledTimes(1);
  });

  describe('describeError', () => {
    it('should take the message and name of an Error', () => {
      expect(describeError(new TypeError('bad value'))).toMatchObject({
        error: 'bad value',
        name: 'TypeError',
      });
    });

    it('should stringify anything else', () => {
      expect(describeError('plain failure')).toEqual({ error: 'plain failure' });
    });
  });
});
