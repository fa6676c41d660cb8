/**
 * Logger Unit Tests
 */

import { join } from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  buildLogFileName,
  Logger,
  resolveLogFilePath,
  type LogSink,
} from '../../src/shared/logger.js';

const LINE_PREFIX = /^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.\d{3}\] /;

function memorySink(): LogSink & { lines: string[] } {
  const lines: string[] = [];
  return { lines, write: (line) => lines.push(line) };
}

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('buildLogFileName', () => {
    it('should stamp the local date and time', () => {
      expect(buildLogFileName(new Date(2024, 2, 15, 9, 30, 5))).toBe('reelsort-20240315-093005.log');
    });
  });

  describe('resolveLogFilePath', () => {
    it('should prefer an explicit file', () => {
      expect(resolveLogFilePath('/var/log/reelsort.log', '/var/log/runs')).toBe('/var/log/reelsort.log');
    });

    it('should build a timestamped file inside the directory', () => {
      const path = resolveLogFilePath(undefined, '/var/log/runs');
      expect(path?.startsWith(join('/var/log/runs', 'reelsort-'))).toBe(true);
      expect(path?.endsWith('.log')).toBe(true);
    });

    it('should return undefined without either', () => {
      expect(resolveLogFilePath()).toBeUndefined();
    });
  });

  describe('Logger', () => {
    it('should write uncoloured, formatted lines to the sink', () => {
      vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const sink = memorySink();
      const logger = new Logger({ level: 'info', useColors: true, sink });

      logger.child('stager').info('Staged %d file(s)', 3);

      expect(sink.lines).toHaveLength(1);
      const line = sink.lines[0] ?? '';
      expect(line).toMatch(LINE_PREFIX);
      expect(line.replace(LINE_PREFIX, '')).toBe('INFO  [stager] Staged 3 file(s)');
    });

    it('should share the level and sink with children', () => {
      vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const sink = memorySink();
      const logger = new Logger({ level: 'info', useColors: false });
      const child = logger.child('pipeline');

      logger.setSink(sink);
      logger.setLevel('warn');
      child.info('hidden');
      child.warn('shown');

      expect(child.getLevel()).toBe('warn');
      expect(sink.lines.map((line) => line.replace(LINE_PREFIX, ''))).toEqual(['WARN  [pipeline] shown']);
    });

    it('should send errors to stderr', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const logger = new Logger({ level: 'error', useColors: false });

      logger.error('boom');

      expect(errorSpy).toHaveBeenCalledTimes(1);
    });
  });
});
