import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  ClipLogger,
  createLogger,
  isDebugMode,
  noopLogger,
  setDebugMode,
  type LogEntry,
} from '../observability/logger.js';

describe('ClipLogger', () => {
  afterEach(() => {
    setDebugMode(false);
    vi.restoreAllMocks();
  });

  describe('creation', () => {
    it('should create via factory', () => {
      const logger = createLogger({ module: 'test' });
      expect(logger).toBeInstanceOf(ClipLogger);
      expect(logger.module).toBe('test');
    });

    it('should prefix child modules', () => {
      const entries: LogEntry[] = [];
      const child = createLogger({ module: 'clipkeep', handler: (e) => entries.push(e) }).child('sync');

      child.info('hello');

      expect(child.module).toBe('clipkeep:sync');
      expect(entries[0]?.module).toBe('clipkeep:sync');
    });
  });

  describe('log levels', () => {
    it('should call handler for info and above at default level', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', handler: (e) => entries.push(e) });
      logger.debug('debug msg');
      logger.info('info msg');
      logger.warn('warn msg');
      logger.error('error msg');
      expect(entries.map((e) => e.level)).toEqual(['info', 'warn', 'error']);
    });

    it('should only emit errors at error level', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', level: 'error', handler: (e) => entries.push(e) });
      logger.info('info');
      logger.warn('warn');
      logger.error('error');
      expect(entries).toHaveLength(1);
    });

    it('should treat debug: true as level debug', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ level: 'error', debug: true, handler: (e) => entries.push(e) });
      logger.debug('visible');
      expect(entries).toHaveLength(1);
    });
  });

  describe('debug mode', () => {
    it('should toggle global debug mode', () => {
      setDebugMode(true);
      expect(isDebugMode()).toBe(true);
      setDebugMode(false);
      expect(isDebugMode()).toBe(false);
    });

    it('should override level when debug mode is on', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', level: 'error', handler: (e) => entries.push(e) });
      setDebugMode(true);
      logger.debug('should appear');
      expect(entries).toHaveLength(1);
    });
  });

  describe('entries', () => {
    it('should omit empty context', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', handler: (e) => entries.push(e) });
      logger.info('plain', {});
      expect(entries[0]).not.toHaveProperty('context');
    });

    it('should include error details alongside context', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', handler: (e) => entries.push(e) });
      const error = new Error('test error');

      logger.error('failed', error, { extra: 'data' });

      expect(entries[0]?.context).toEqual({
        extra: 'data',
        error: { message: 'test error', stack: error.stack },
      });
    });
  });

  describe('console output', () => {
    it('should stay silent without handler, json or debug mode', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      createLogger({ module: 'test' }).info('quiet');
      expect(log).not.toHaveBeenCalled();
    });

    it('should write JSON lines when json is set', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      createLogger({ module: 'test', json: true }).warn('careful', { attempt: 2 });

      expect(warn).toHaveBeenCalledTimes(1);
      const line = JSON.parse(String(warn.mock.calls[0]?.[0])) as LogEntry;
      expect(line.level).toBe('warn');
      expect(line.message).toBe('careful');
      expect(line.context).toEqual({ attempt: 2 });
    });
  });

  it('noopLogger should accept every call', () => {
    expect(() => {
      noopLogger.debug('a');
      noopLogger.info('b');
      noopLogger.warn('c');
      noopLogger.error('d', new Error('e'));
    }).not.toThrow();
  });
});
