import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Logger, AppError, handleError, isLogLevel, logger as sharedLogger } from './logger.js';
import { DestinationExistsError, InvalidInputError, PatternSyntaxError } from './errors.js';

describe('Logger', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = new Logger({ minLevel: 'debug', color: false });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Basic Logging', () => {
    it('should write info and debug messages to stderr', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const logSpy = vi.spyOn(console, 'log');

      logger.info('Info message');
      logger.debug('Debug message');

      expect(errorSpy).toHaveBeenCalledTimes(2);
      expect(logSpy).not.toHaveBeenCalled();
    });

    it('should log warning messages', () => {
      const consoleSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      logger.warn('Warning message');
      expect(consoleSpy).toHaveBeenCalledOnce();
    });

    it('should log error messages', () => {
      const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      logger.error('Error message', new Error('boom'));
      expect(consoleSpy.mock.calls[0][0]).toContain('Error: boom');
    });
  });

  describe('Formatting', () => {
    it('should include level, context and data', () => {
      const formatted = logger.formatMessage({
        timestamp: new Date('2020-01-02T03:04:05.000Z'),
        level: 'warn',
        message: 'Skipped',
        context: 'organizer',
        data: { destination: 'out/2013/a.jpg' },
      });

      expect(formatted).toBe(
        '2020-01-02T03:04:05.000Z WARN  [organizer] Skipped\n' +
        '  {\n' +
        '    "destination": "out/2013/a.jpg"\n' +
        '  }',
      );
    });

    it('should wrap colored output in reset codes', () => {
      const colored = new Logger({ minLevel: 'info', color: true });
      const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

      colored.info('Hello');

      const output = String(consoleSpy.mock.calls[0][0]);
      expect(output.startsWith('\x1b[32m')).toBe(true);
      expect(output.endsWith('\x1b[0m')).toBe(true);
    });
  });

  describe('Log Levels', () => {
    it('should drop messages below the minimum level', () => {
      const quiet = new Logger({ minLevel: 'error', color: false });
      const consoleSpy = vi.spyOn(console, 'warn');

      quiet.warn('Ignored');

      expect(consoleSpy).not.toHaveBeenCalled();
      expect(quiet.getLogs()).toEqual([]);
    });

    it('should change level at runtime', () => {
      const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      logger.setMinLevel('error');
      logger.info('Hidden');
      expect(consoleSpy).not.toHaveBeenCalled();
      expect(logger.getMinLevel()).toBe('error');
    });

    it('should recognize level names', () => {
      expect(isLogLevel('debug')).toBe(true);
      expect(isLogLevel('DEBUG')).toBe(false);
      expect(isLogLevel(undefined)).toBe(false);
    });
  });

  describe('History', () => {
    it('should keep a bounded history filtered by level', () => {
      const bounded = new Logger({ minLevel: 'debug', color: false, maxLogs: 2 });
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);

      bounded.info('one');
      bounded.warn('two');
      bounded.info('three');

      expect(bounded.getLogs().map(entry => entry.message)).toEqual(['two', 'three']);
      expect(bounded.getLogs('warn').map(entry => entry.message)).toEqual(['two']);

      bounded.clear();
      expect(bounded.getLogs()).toEqual([]);
    });
  });
});

describe('AppError', () => {
  it('should create custom error with code', () => {
    const error = new AppError('Test error', 'TEST_ERROR');
    expect(error.message).toBe('Test error');
    expect(error.code).toBe('TEST_ERROR');
    expect(error.statusCode).toBe(1);
    expect(error instanceof Error).toBe(true);
  });

  it('should serialize to JSON', () => {
    const error = new AppError('Test', 'CODE', 2, { detail: 'info' });
    expect(error.toJSON()).toEqual({
      name: 'AppError',
      message: 'Test',
      code: 'CODE',
      statusCode: 2,
      context: { detail: 'info' },
    });
  });

  it('should give domain errors their codes and exit statuses', () => {
    const exists = new DestinationExistsError('a.jpg', 'out/2013/a.jpg');
    const invalid = new InvalidInputError('bad');
    const pattern = new PatternSyntaxError('[x', 'Missing closing: "]"');

    expect(exists).toBeInstanceOf(AppError);
    expect(exists.code).toBe('DESTINATION_EXISTS');
    expect(exists.statusCode).toBe(1);
    expect(invalid.statusCode).toBe(2);
    expect(pattern.message).toBe('Invalid pattern "[x": Missing closing: "]"');
    expect(pattern.statusCode).toBe(2);
  });
});

describe('handleError', () => {
  beforeEach(() => {
    sharedLogger.clear();
    sharedLogger.setMinLevel('warn');
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should pass AppErrors through', () => {
    const error = new InvalidInputError('nope');
    expect(handleError(error, 'cli')).toBe(error);
    expect(sharedLogger.getLogs('error')[0].context).toBe('cli');
  });

  it('should wrap plain errors', () => {
    const wrapped = handleError(new Error('disk on fire'));
    expect(wrapped.code).toBe('INTERNAL_ERROR');
    expect(wrapped.message).toBe('disk on fire');
  });

  it('should wrap non-error values', () => {
    const wrapped = handleError('odd');
    expect(wrapped.code).toBe('UNKNOWN_ERROR');
    expect(wrapped.statusCode).toBe(1);
  });
});
