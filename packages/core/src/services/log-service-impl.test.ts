/**
 * LogService Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { LogService, createLogService } from './log-service-impl.js';

function jsonLine(index = 0): Record<string, unknown> {
  const raw = vi.mocked(console.log).mock.calls[index]?.[0];
  return JSON.parse(String(raw)) as Record<string, unknown>;
}

describe('LogService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('level filtering', () => {
    it('filters debug messages when level is info', () => {
      const log = new LogService({ level: 'info', json: false });
      log.debug('hidden');
      log.info('visible');

      expect(console.debug).not.toHaveBeenCalled();
      expect(console.log).toHaveBeenCalledOnce();
    });

    it('shows all messages when level is debug', () => {
      const log = new LogService({ level: 'debug', json: false });
      log.debug('debug msg');
      log.info('info msg');
      log.warn('warn msg');
      log.error('error msg');

      expect(console.debug).toHaveBeenCalledOnce();
      expect(console.log).toHaveBeenCalledOnce();
      expect(console.warn).toHaveBeenCalledOnce();
      expect(console.error).toHaveBeenCalledOnce();
    });

    it('always shows error messages regardless of level', () => {
      const log = new LogService({ level: 'error', json: false });
      log.warn('hidden');
      log.error('visible');

      expect(console.warn).not.toHaveBeenCalled();
      expect(console.error).toHaveBeenCalledOnce();
    });

    it('exposes the configured level', () => {
      expect(new LogService({ level: 'warn' }).level).toBe('warn');
    });
  });

  describe('dev output (non-JSON)', () => {
    it('prefixes with module name', () => {
      const log = new LogService({ level: 'info', json: false, module: 'Router' });
      log.info('hello');

      expect(console.log).toHaveBeenCalledWith('[Router] hello');
    });

    it('passes data as second argument', () => {
      const log = new LogService({ level: 'info', json: false, module: 'Router' });
      log.info('msg', { key: 'val' });

      expect(console.log).toHaveBeenCalledWith('[Router] msg', { key: 'val' });
    });

    it('omits prefix when no module set', () => {
      const log = new LogService({ level: 'info', json: false });
      log.info('bare message');

      expect(console.log).toHaveBeenCalledWith('bare message');
    });
  });

  describe('JSON output', () => {
    it('outputs one JSON object with all fields', () => {
      const log = new LogService({ level: 'info', json: true, module: 'Agent' });
      log.info('document saved', { bytes: 500 });

      const output = jsonLine();
      expect(output.level).toBe('info');
      expect(output.module).toBe('Agent');
      expect(output.msg).toBe('document saved');
      expect(output.bytes).toBe(500);
      expect(typeof output.ts).toBe('string');
    });

    it('wraps non-object data in { data }', () => {
      const log = new LogService({ level: 'info', json: true });
      log.info('count', 42);

      expect(jsonLine().data).toBe(42);
    });

    it('serializes bigint identifiers as strings', () => {
      const log = new LogService({ level: 'info', json: true });
      log.info('sender', { senderId: 9007199254740993n });

      expect(jsonLine().senderId).toBe('9007199254740993');
    });

    it('reduces errors to name and message', () => {
      const log = new LogService({ level: 'info', json: true });
      log.info('failed', { cause: new TypeError('bad input') });

      expect(jsonLine().cause).toEqual({ name: 'TypeError', message: 'bad input' });
    });

    it('omits module when not set', () => {
      const log = new LogService({ level: 'info', json: true });
      log.info('test');

      expect(jsonLine().module).toBeUndefined();
    });
  });

  describe('child logger', () => {
    it('creates child with combined module name', () => {
      const parent = new LogService({ level: 'info', json: false, module: 'Parent' });
      parent.child('Child').info('hello');

      expect(console.log).toHaveBeenCalledWith('[Parent:Child] hello');
    });

    it('inherits log level from parent', () => {
      const child = new LogService({ level: 'warn', json: false }).child('Child');
      child.info('hidden');
      child.warn('visible');

      expect(console.log).not.toHaveBeenCalled();
      expect(console.warn).toHaveBeenCalledWith('[Child] visible');
    });
  });

  describe('createLogService factory', () => {
    it('returns a LogService instance', () => {
      expect(createLogService({ level: 'info' })).toBeInstanceOf(LogService);
    });

    it('defaults to info level', () => {
      const log = createLogService({ json: false });
      log.debug('hidden');
      log.info('visible');

      expect(console.debug).not.toHaveBeenCalled();
      expect(console.log).toHaveBeenCalledOnce();
    });
  });
});
