import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createLogger, loggerFor } from '../../src/reliability/logger';

describe('Logger', () => {
  let consoleOutput: Array<{ level: string; message: string; data: unknown }>;

  beforeEach(() => {
    consoleOutput = [];
    for (const level of ['debug', 'info', 'warn', 'error'] as const) {
      vi.spyOn(console, level).mockImplementation((msg, data) => {
        consoleOutput.push({ level, message: msg, data });
      });
    }
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('log levels', () => {
    it('logs debug messages with context', () => {
      const logger = createLogger('test');
      logger.debug('debug message', { url: 'https://shop.aldi.us/store/aldi/storefront' });

      expect(consoleOutput).toHaveLength(1);
      expect(consoleOutput[0].level).toBe('debug');
      expect(consoleOutput[0].message).toMatch(/^\S+ \[DEBUG\] \[test\] debug message$/);
      expect(consoleOutput[0].data).toEqual({ url: 'https://shop.aldi.us/store/aldi/storefront' });
    });

    it('routes each level to the matching console method', () => {
      const logger = createLogger('test');
      logger.info('info message');
      logger.warn('warn message');
      logger.error('error message');

      expect(consoleOutput.map((o) => o.level)).toEqual(['info', 'warn', 'error']);
      expect(consoleOutput[2].message).toContain('[ERROR] [test] error message');
    });

    it('includes an ISO timestamp', () => {
      const logger = createLogger('test');
      logger.info('timestamped message');

      expect(consoleOutput[0].message).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
    });

    it('includes the component name', () => {
      const logger = createLogger('CategoryDiscovery');
      logger.info('test message');

      expect(consoleOutput[0].message).toContain('[CategoryDiscovery]');
    });
  });

  describe('context handling', () => {
    it('passes no second argument without context', () => {
      const logger = createLogger('test');
      logger.info('no context');

      expect(consoleOutput).toHaveLength(1);
      expect(consoleOutput[0].data).toBeUndefined();
      expect(console.info).toHaveBeenCalledWith(expect.stringContaining('no context'));
    });
  });

  describe('log level filtering', () => {
    it('respects minimum log level', () => {
      const logger = createLogger('test', 'warn');

      logger.debug('debug message');
      logger.info('info message');
      logger.warn('warn message');
      logger.error('error message');

      expect(consoleOutput.map((o) => o.level)).toEqual(['warn', 'error']);
    });
  });

  describe('loggerFor', () => {
    it('defaults to info level text output', () => {
      const logger = loggerFor('Extractor');

      logger.debug('hidden');
      logger.info('shown');

      expect(consoleOutput).toHaveLength(1);
      expect(consoleOutput[0].message).toContain('[Extractor] shown');
    });

    it('applies run settings', () => {
      const logger = loggerFor('Extractor', { logLevel: 'error', logFormat: 'text' });

      logger.warn('hidden');
      logger.error('shown');

      expect(consoleOutput.map((o) => o.level)).toEqual(['error']);
    });
  });
});
