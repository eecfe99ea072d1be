import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { logger, LogLevel, parseLogLevel } from './logger.js';
import { withCorrelation } from './correlation.js';
import { ValidationError } from '../models/errors.js';

function lastJson(spy: unknown): Record<string, any> {
  const calls = (spy as ReturnType<typeof vi.fn>).mock.calls;
  return JSON.parse(calls[calls.length - 1][0]);
}

describe('Logger', () => {
  beforeEach(() => {
    logger.reset();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('log levels', () => {
    it('should default to INFO level', () => {
      expect(logger.getLevel()).toBe(LogLevel.INFO);
    });

    it('should parse level names case-insensitively', () => {
      expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
      expect(parseLogLevel('WARNING')).toBe(LogLevel.WARN);
      expect(parseLogLevel(' error ')).toBe(LogLevel.ERROR);
      expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
    });

    it('should filter logs below current level', () => {
      logger.setLevel(LogLevel.WARN);

      logger.debug('debug message');
      logger.info('info message');
      logger.warn('warn message');
      logger.error('error message');

      expect(console.log).not.toHaveBeenCalled();
      expect(console.warn).toHaveBeenCalledTimes(1);
      expect(console.error).toHaveBeenCalledTimes(1);
    });

    it('should read settings from the environment', () => {
      logger.init({ EST_LOG_LEVEL: 'debug', EST_LOG_FORMAT: 'json' });

      expect(logger.getLevel()).toBe(LogLevel.DEBUG);
      expect(logger.getFormat()).toBe('json');
    });

    it('should ignore an unknown format from the environment', () => {
      logger.init({ EST_LOG_FORMAT: 'xml' });
      expect(logger.getFormat()).toBe('pretty');
    });
  });

  describe('json output', () => {
    it('should write level, component and meta', () => {
      logger.setFormat('json');
      logger.child('FeatureCatalog').info('Feature added', { featureId: 'feat_1' });

      const parsed = lastJson(console.log);
      expect(parsed.level).toBe('INFO');
      expect(parsed.component).toBe('FeatureCatalog');
      expect(parsed.message).toBe('Feature added');
      expect(parsed.meta).toEqual({ featureId: 'feat_1' });
    });

    it('should nest component names', () => {
      logger.setFormat('json');
      logger.child('Estimation').child('Overlap').info('nested');

      expect(lastJson(console.log).component).toBe('Estimation.Overlap');
    });

    it('should omit empty meta', () => {
      logger.setFormat('json');
      logger.info('no meta', {});

      expect(lastJson(console.log).meta).toBeUndefined();
    });

    it('should redact secrets in meta', () => {
      logger.setFormat('json');
      logger.info('connecting', { supabaseKey: 'test-secret', url: 'http://localhost' });

      expect(lastJson(console.log).meta).toEqual({ supabaseKey: '[REDACTED]', url: 'http://localhost' });
    });

    it('should redact custom fields added at runtime', () => {
      logger.setFormat('json');
      logger.addRedactFields(['memberName']);
      logger.info('entry', { memberName: 'alex', hours: 3 });

      expect(lastJson(console.log).meta).toEqual({ memberName: '[REDACTED]', hours: 3 });
    });
  });

  describe('correlation IDs', () => {
    it('should include a pinned correlation ID', () => {
      logger.setFormat('json');
      logger.withCorrelationId('est-abc-123').info('correlated');

      expect(lastJson(console.log).correlationId).toBe('est-abc-123');
    });

    it('should pick up the scoped correlation ID', () => {
      logger.setFormat('json');
      withCorrelation('est-scope-1', () => logger.child('Api').info('inside scope'));

      expect(lastJson(console.log).correlationId).toBe('est-scope-1');
    });
  });

  describe('error logging', () => {
    it('should include error name, message and code', () => {
      logger.setFormat('json');
      logger.error('Rejected input', new ValidationError('hours', -1, 'must be positive'));

      const parsed = lastJson(console.error);
      expect(parsed.error.name).toBe('ValidationError');
      expect(parsed.error.code).toBe('VALIDATION_ERROR');
      expect(parsed.error.stack).toBeDefined();
    });

    it('should support error with additional meta', () => {
      logger.setFormat('json');
      logger.error('Something failed', new Error('boom'), { context: 'test' });

      const parsed = lastJson(console.error);
      expect(parsed.error.message).toBe('boom');
      expect(parsed.meta.context).toBe('test');
    });

    it('should treat a plain object as meta', () => {
      logger.setFormat('json');
      logger.error('Something failed', { rows: 3 });

      const parsed = lastJson(console.error);
      expect(parsed.error).toBeUndefined();
      expect(parsed.meta).toEqual({ rows: 3 });
    });
  });

  describe('pretty output', () => {
    it('should contain the component and message', () => {
      logger.child('Cli').info('Loaded features', { count: 12 });

      const line = (console.log as ReturnType<typeof vi.fn>).mock.calls[0][0] as string;
      expect(line).toContain('[Cli]');
      expect(line).toContain('Loaded features');
      expect(line).toContain('{"count":12}');
    });
  });

  describe('timing', () => {
    it('should track operation timing', async () => {
      logger.setLevel(LogLevel.DEBUG);
      logger.setFormat('json');
      const log = logger.child('Timer');

      log.time('aggregate');
      await new Promise(resolve => setTimeout(resolve, 10));
      const duration = log.timeEnd('aggregate');

      expect(duration).toBeGreaterThanOrEqual(5);
      expect(lastJson(console.log).duration).toBe(duration);
    });

    it('should warn if timer does not exist', () => {
      logger.child('Timer').timeEnd('missing');
      expect(console.warn).toHaveBeenCalledTimes(1);
    });
  });
});
