import chalk from 'chalk';

import {
  extractLogTimestamp,
  logDebug,
  logWarn,
  printErrorAndExit,
  renderTemplate,
  setLogLevel,
} from '../src/utils/utils';

describe('utils', () => {
  let consoleErrorSpy: jest.SpyInstance;

  beforeEach(() => {
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
    setLogLevel('warn');
  });

  describe('extractLogTimestamp', () => {
    const now = new Date('2025-06-01T12:00:00.000Z');

    it('should return ISO timestamps as found', () => {
      expect(extractLogTimestamp('2024-01-15T10:30:45.123Z level=info msg="ready"', now)).toBe('2024-01-15T10:30:45.123Z');
    });

    it('should read "YYYY-MM-DD HH:MM:SS" as UTC', () => {
      expect(extractLogTimestamp('2024-01-15 10:30:45 INFO server started', now)).toBe('2024-01-15T10:30:45.000Z');
    });

    it('should read "DD-MM-YYYY HH:MM:SS" as UTC', () => {
      expect(extractLogTimestamp('15-01-2024 10:30:45 WARN slow query', now)).toBe('2024-01-15T10:30:45.000Z');
    });

    it('should fall back to now for impossible dates', () => {
      expect(extractLogTimestamp('2024-02-30 10:00:00 ERROR', now)).toBe('2025-06-01T12:00:00.000Z');
    });

    it('should fall back to now when there is no timestamp', () => {
      expect(extractLogTimestamp('Liveness probe failed', now)).toBe('2025-06-01T12:00:00.000Z');
      expect(extractLogTimestamp('', now)).toBe('2025-06-01T12:00:00.000Z');
    });
  });

  describe('renderTemplate', () => {
    it('should replace known placeholders and blank unknown ones', () => {
      const rendered = renderTemplate('{{owner_kind}} `{{ owner_name }}` in {{missing}}', {
        owner_kind: 'Deployment',
        owner_name: 'web',
      });

      expect(rendered).toBe('Deployment `web` in ');
    });

    it('should not render inherited object properties', () => {
      expect(renderTemplate('[{{constructor}}][{{toString}}]', { owner_name: 'web' })).toBe('[][]');
    });

    it('should leave text without placeholders untouched', () => {
      expect(renderTemplate('Increase Node Count in Cluster', {})).toBe('Increase Node Count in Cluster');
    });
  });

  describe('logging', () => {
    it('should drop messages below the active level', () => {
      setLogLevel('error');

      logWarn('disk almost full');

      expect(consoleErrorSpy).not.toHaveBeenCalled();
    });

    it('should write debug messages to stderr when enabled', () => {
      setLogLevel('debug');

      logDebug('Matched rule crash-loop');

      expect(consoleErrorSpy).toHaveBeenCalledWith(chalk.gray('🔍 Matched rule crash-loop'));
    });
  });

  describe('printErrorAndExit', () => {
    it('should print the message and exit with the given code', () => {
      expect(() => printErrorAndExit('boom', 2)).toThrow('process.exit called with 2');
      expect(consoleErrorSpy).toHaveBeenCalledWith(`\n ${chalk.red('❌ Error:')} boom`);
    });
  });
});
