import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  RxBindLogger,
  createLogger,
  describeError,
  isDebugMode,
  setDebugMode,
  type LogEntry,
} from '../observability/logger.js';

describe('RxBindLogger', () => {
  afterEach(() => {
    setDebugMode(false);
    vi.restoreAllMocks();
  });

  describe('creation', () => {
    it('should create via factory', () => {
      const logger = createLogger({ module: 'test' });
      expect(logger).toBeInstanceOf(RxBindLogger);
      expect(logger.module).toBe('test');
    });

    it('should default the module name', () => {
      expect(createLogger().module).toBe('rxbind');
    });

    it('should prefix child modules', () => {
      const entries: LogEntry[] = [];
      const child = createLogger({ module: 'rxbind', handler: (e) => entries.push(e) }).child(
        'collection-view'
      );
      child.info('hello');
      expect(child.module).toBe('rxbind:collection-view');
      expect(entries[0]?.module).toBe('rxbind:collection-view');
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

    it('should include debug when level is debug', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', level: 'debug', handler: (e) => entries.push(e) });
      logger.debug('debug msg');
      expect(entries).toHaveLength(1);
    });

    it('should only emit errors at error level', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', level: 'error', handler: (e) => entries.push(e) });
      logger.info('info');
      logger.warn('warn');
      logger.error('error');
      expect(entries).toHaveLength(1);
    });

    it('should omit an empty context', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', handler: (e) => entries.push(e) });
      logger.info('plain');
      expect(entries[0]).not.toHaveProperty('context');
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

  describe('error logging', () => {
    it('should describe Error instances', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', handler: (e) => entries.push(e) });
      logger.error('failed', new TypeError('bad value'), { extra: 'data' });

      expect(entries[0]?.context?.['extra']).toBe('data');
      expect(entries[0]?.context?.['error']).toMatchObject({
        name: 'TypeError',
        message: 'bad value',
      });
    });

    it('should describe non-Error values', () => {
      expect(describeError('offline')).toEqual({ message: 'offline' });
      expect(describeError(404)).toEqual({ message: '404' });
    });

    it('should write errors to the console without a handler', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const logger = createLogger({ module: 'test' });
      logger.info('silent');
      logger.error('failed');
      expect(spy).toHaveBeenCalledTimes(1);
      expect(spy.mock.calls[0]?.[0]).toBe('[test] failed');
    });
  });

  describe('time', () => {
    it('should measure operation duration', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', level: 'debug', handler: (e) => entries.push(e) });
      const end = logger.time('reload');
      end({ cells: 42 });
      expect(entries).toHaveLength(1);
      expect(entries[0]?.message).toBe('reload completed');
      expect(entries[0]?.context?.['durationMs']).toBeGreaterThanOrEqual(0);
      expect(entries[0]?.context?.['cells']).toBe(42);
    });
  });

  describe('JSON output', () => {
    it('should output JSON when configured', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const logger = createLogger({ module: 'test', json: true });
      logger.info('json test');
      expect(spy).toHaveBeenCalledTimes(1);
      const parsed: unknown = JSON.parse(String(spy.mock.calls[0]?.[0]));
      expect(parsed).toMatchObject({ level: 'info', message: 'json test', module: 'test' });
    });
  });
});
