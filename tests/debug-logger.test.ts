/**
 * Unit tests for DebugLogger
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DebugLogger, isLogLevel, setLogLevel } from '../src/debug-logger.js';

describe('DebugLogger', () => {
  let originalLevel: string | undefined;

  beforeEach(() => {
    originalLevel = process.env.PUFFDOWN_LOG_LEVEL;
    delete process.env.PUFFDOWN_LOG_LEVEL;
    setLogLevel(null);
  });

  afterEach(() => {
    if (originalLevel !== undefined) {
      process.env.PUFFDOWN_LOG_LEVEL = originalLevel;
    } else {
      delete process.env.PUFFDOWN_LOG_LEVEL;
    }
    setLogLevel(null);
    vi.restoreAllMocks();
  });

  it('should log only errors by default', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = new DebugLogger('engine');

    logger.info('hidden');
    logger.warn('hidden');
    logger.error('shown', 42);

    expect(warnSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledTimes(1);
    const [prefix, message, extra] = errorSpy.mock.calls[0];
    expect(prefix).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[engine\] \[ERROR\]$/);
    expect(message).toBe('shown');
    expect(extra).toBe(42);
  });

  it('should follow PUFFDOWN_LOG_LEVEL', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    process.env.PUFFDOWN_LOG_LEVEL = 'debug';

    new DebugLogger().debug('visible');

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toMatch(/\[puffdown\] \[DEBUG\]$/);
  });

  it('should let setLogLevel override the environment', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    process.env.PUFFDOWN_LOG_LEVEL = 'debug';
    setLogLevel('none');

    const logger = new DebugLogger('store');
    logger.debug('hidden');
    logger.error('hidden');

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should send warnings to console.warn', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    setLogLevel('warn');

    new DebugLogger('lane').warn('slow');

    expect(warnSpy).toHaveBeenCalledTimes(1);
  });
});

describe('isLogLevel()', () => {
  it('should accept only upper-case level names', () => {
    expect(isLogLevel('INFO')).toBe(true);
    expect(isLogLevel('info')).toBe(false);
    expect(isLogLevel('LOUD')).toBe(false);
  });
});
