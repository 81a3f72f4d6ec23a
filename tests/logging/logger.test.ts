import { describe, it, expect, vi } from 'vitest';
import { Logger, isLogLevel, memoryTransport, stderrTransport } from '../../src/logging/logger.js';

describe('Logger', () => {
  describe('child()', () => {
    it('joins contexts with a dot', () => {
      const { transport, entries } = memoryTransport();
      const parent = new Logger({ level: 'debug', context: 'enum-editor' }).addTransport(transport);

      parent.child('registry').info('test');

      expect(entries.map((e) => e.context)).toEqual(['enum-editor.registry']);
    });

    it('uses the plain context when the parent has none', () => {
      const { transport, entries } = memoryTransport();
      const parent = new Logger({ level: 'debug' }).addTransport(transport);

      parent.child('factory').info('test');

      expect(entries[0]?.context).toBe('factory');
    });

    it('shares transports added after the child was created', () => {
      const parent = new Logger({ level: 'debug' });
      const child = parent.child('ctx');
      const { transport, entries } = memoryTransport();
      parent.addTransport(transport);

      child.info('from-child');
      parent.info('from-parent');

      expect(entries.map((e) => e.message)).toEqual(['from-child', 'from-parent']);
    });
  });

  describe('log level filtering', () => {
    it('defaults to info', () => {
      const { transport, entries } = memoryTransport();
      const logger = new Logger().addTransport(transport);

      logger.debug('d');
      logger.info('i');

      expect(entries.map((e) => e.level)).toEqual(['info']);
      expect(logger.isEnabled('debug')).toBe(false);
    });

    it('filters messages below the configured level', () => {
      const { transport, entries } = memoryTransport();
      const logger = new Logger({ level: 'warn' }).addTransport(transport);

      logger.debug('d');
      logger.info('i');
      logger.warn('w');
      logger.error('e');

      expect(entries.map((e) => e.level)).toEqual(['warn', 'error']);
    });
  });

  it('passes structured data through', () => {
    const { transport, entries } = memoryTransport();
    const logger = new Logger().addTransport(transport);

    logger.info('Created editor instance', { id: 0 });

    expect(entries[0]?.data).toEqual({ id: 0 });
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(1)).toBe(false);
  });
});

describe('stderrTransport', () => {
  it('writes context and data', () => {
    const spy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    stderrTransport({
      level: 'info',
      message: 'hello world',
      context: 'enum-editor',
      timestamp: '2024-01-01T00:00:00.000Z',
      data: { id: 1 },
    });

    expect(spy).toHaveBeenCalledWith('2024-01-01T00:00:00.000Z INFO [enum-editor] hello world {"id":1}\n');
  });

  it('writes a bare line without context or data', () => {
    const spy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    stderrTransport({
      level: 'error',
      message: 'bad thing',
      timestamp: '2024-01-01T00:00:00.000Z',
    });

    expect(spy).toHaveBeenCalledWith('2024-01-01T00:00:00.000Z ERROR bad thing\n');
  });
});
