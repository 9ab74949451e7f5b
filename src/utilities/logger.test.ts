import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';

import { Logger } from './logger.js';

describe('Logger', () => {
  let logSpy: MockInstance<typeof console.log>;
  let warnSpy: MockInstance<typeof console.warn>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should stay silent under test by default', () => {
    const testLogger = new Logger();

    testLogger.error('Test error');
    testLogger.info('Test message');

    expect(errorSpy).not.toHaveBeenCalled();
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should drop messages below the configured level', () => {
    const testLogger = new Logger({ level: 'WARN', silent: false });

    testLogger.info('Test message');
    testLogger.debug('Test debug');

    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should route each level to its console method', () => {
    const testLogger = new Logger({ level: 'INFO', silent: false });

    testLogger.warn('Test warning');
    testLogger.info('Test message');

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0]?.[0]).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] WARN: Test warning$/,
    );
    expect(logSpy.mock.calls[0]?.[0]).toMatch(/\] INFO: Test message$/);
  });

  it('should append context as indented JSON outside production', () => {
    const testLogger = new Logger({ silent: false });

    testLogger.error('Test error', { code: 'TEST_ERROR' });

    const [line] = errorSpy.mock.calls[0] ?? [];
    expect(String(line).split('\n').slice(1)).toEqual(['{', '  "code": "TEST_ERROR"', '}']);
  });

  it('should send every level to stderr when asked', () => {
    const testLogger = new Logger({ level: 'DEBUG', silent: false, useStderr: true });

    testLogger.info('Test message');
    testLogger.debug('Test debug');

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(errorSpy.mock.calls[1]?.[0]).toMatch(/\] DEBUG: Test debug$/);
  });

  it('should change log level', () => {
    const testLogger = new Logger({ level: 'ERROR', silent: false });

    testLogger.debug('hidden');
    testLogger.setLevel('DEBUG');
    testLogger.debug('shown');

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy.mock.calls[0]?.[0]).toMatch(/\] DEBUG: shown$/);
  });
});
