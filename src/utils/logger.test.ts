import { describe, it, expect } from 'vitest';
import { createWallClock, formatTimestamp, Logger, LogLevel } from './logger';
import type { LogConfig } from '../types/config.types';

// 2026-10-18T12:34:56.789Z plus 42 ns
const FIXED = BigInt(Date.parse('2026-10-18T12:34:56.789Z')) * 1000000n + 42n;

function createLogger(config: Partial<LogConfig> = {}): {
  logger: Logger;
  lines: string[];
} {
  const lines: string[] = [];
  const logger = new Logger(
    { verbosity: 0, quiet: false, timestamp: 'none', ...config },
    line => lines.push(line),
    () => FIXED
  );
  return { logger, lines };
}

function logEveryLevel(logger: Logger): void {
  logger.error('e');
  logger.warn('w');
  logger.info('i');
  logger.debug('d');
  logger.trace('t');
}

describe('Logger', () => {
  describe('verbosity', () => {
    it('should log warnings and errors by default', () => {
      const { logger, lines } = createLogger();

      logEveryLevel(logger);

      expect(lines).toEqual(['ERROR - e', 'WARN - w']);
    });

    it('should add one level per -v', () => {
      const one = createLogger({ verbosity: 1 });
      const three = createLogger({ verbosity: 3 });

      logEveryLevel(one.logger);
      logEveryLevel(three.logger);

      expect(one.lines).toEqual(['ERROR - e', 'WARN - w', 'INFO - i']);
      expect(three.lines).toEqual([
        'ERROR - e',
        'WARN - w',
        'INFO - i',
        'DEBUG - d',
        'TRACE - t',
      ]);
    });

    it('should silence everything when quiet', () => {
      const { logger, lines } = createLogger({ quiet: true, verbosity: 4 });

      logEveryLevel(logger);

      expect(lines).toEqual([]);
      expect(logger.isEnabled(LogLevel.ERROR)).toBe(false);
    });
  });

  describe('line format', () => {
    it('should append context as compact JSON', () => {
      const { logger, lines } = createLogger();

      logger.warn('lowered', { from: 5, to: 3 });

      expect(lines).toEqual(['WARN - lowered {"from":5,"to":3}']);
    });

    it('should prefix a timestamp when configured', () => {
      const sec = createLogger({ timestamp: 'sec' });
      const ms = createLogger({ timestamp: 'ms' });

      sec.logger.error('boom');
      ms.logger.error('boom');

      expect(sec.lines).toEqual(['[2026-10-18T12:34:56Z] ERROR - boom']);
      expect(ms.lines).toEqual(['[2026-10-18T12:34:56.789Z] ERROR - boom']);
    });

    it('should use nine fractional digits in ns mode', () => {
      const { logger, lines } = createLogger({ timestamp: 'ns' });

      logger.error('boom');

      expect(lines).toEqual(['[2026-10-18T12:34:56.789000042Z] ERROR - boom']);
    });
  });

  describe('formatTimestamp', () => {
    it('should format each mode', () => {
      expect(formatTimestamp(FIXED, 'none')).toBeUndefined();
      expect(formatTimestamp(FIXED, 'sec')).toBe('2026-10-18T12:34:56Z');
      expect(formatTimestamp(FIXED, 'ms')).toBe('2026-10-18T12:34:56.789Z');
      expect(formatTimestamp(FIXED, 'ns')).toBe(
        '2026-10-18T12:34:56.789000042Z'
      );
    });

    it('should carry sub-millisecond digits from the same reading', () => {
      const nanos =
        BigInt(Date.parse('2026-10-18T12:34:56.999Z')) * 1000000n + 999999n;

      expect(formatTimestamp(nanos, 'ms')).toBe('2026-10-18T12:34:56.999Z');
      expect(formatTimestamp(nanos, 'ns')).toBe(
        '2026-10-18T12:34:56.999999999Z'
      );
      expect(formatTimestamp(nanos + 1n, 'ns')).toBe(
        '2026-10-18T12:34:57.000000000Z'
      );
    });
  });

  describe('createWallClock', () => {
    it('should track the epoch time without going backwards', () => {
      const clock = createWallClock();
      const before = BigInt(Date.now()) * 1000000n;

      const first = clock();
      const second = clock();
      const after = BigInt(Date.now() + 1) * 1000000n;

      expect(second >= first).toBe(true);
      expect(first >= before - 1000000n).toBe(true);
      expect(second <= after).toBe(true);
    });
  });
});
