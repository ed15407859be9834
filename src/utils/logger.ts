/**
 * Leveled stderr logger.
 *
 * Built from an explicit LogConfig rather than global state, so each run
 * (and each test) owns its own verbosity and output target.
 *
 * Verbosity mapping (number of `-v` flags):
 * - 0: error, warn
 * - 1: + info
 * - 2: + debug
 * - 3: + trace
 *
 * Line format: `[<timestamp>] <LEVEL> - <message> <context JSON>`; the
 * timestamp is omitted in `none` mode and the context only when given.
 */

import type { LogConfig, TimestampMode } from '../types/config.types';

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
  TRACE = 4,
}

const LEVEL_LABELS: Record<LogLevel, string> = {
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.TRACE]: 'TRACE',
};

export type LineWriter = (line: string) => void;

/**
 * Current time as nanoseconds since the Unix epoch.
 */
export type Clock = () => bigint;

const NANOS_PER_MILLI = 1000000n;

/**
 * Wall clock with nanosecond resolution: the epoch time read once, advanced
 * by the monotonic high-resolution timer. Every digit of a timestamp comes
 * from the same reading.
 */
export function createWallClock(): Clock {
  const originEpochNanos = BigInt(Date.now()) * NANOS_PER_MILLI;
  const originHrtime = process.hrtime.bigint();
  return () => originEpochNanos + (process.hrtime.bigint() - originHrtime);
}

export type LogContext = Record<string, unknown>;

/**
 * Renders a timestamp for the given mode, or undefined for `none`.
 */
export function formatTimestamp(
  epochNanos: bigint,
  mode: TimestampMode
): string | undefined {
  const iso = new Date(Number(epochNanos / NANOS_PER_MILLI)).toISOString();
  switch (mode) {
    case 'none':
      return undefined;
    case 'sec':
      return iso.replace(/\.\d{3}Z$/, 'Z');
    case 'ms':
      return iso;
    case 'ns': {
      const nanos = (epochNanos % NANOS_PER_MILLI).toString().padStart(6, '0');
      return iso.replace(/(\.\d{3})Z$/, `$1${nanos}Z`);
    }
  }
}

function defaultWriter(line: string): void {
  // eslint-disable-next-line no-console
  console.error(line);
}

export class Logger {
  private readonly maxLevel: number;

  constructor(
    private readonly config: LogConfig,
    private readonly writeLine: LineWriter = defaultWriter,
    private readonly clock: Clock = createWallClock()
  ) {
    this.maxLevel = config.verbosity + 1;
  }

  isEnabled(level: LogLevel): boolean {
    return !this.config.quiet && level <= this.maxLevel;
  }

  error(message: string, context?: LogContext): void {
    this.log(LogLevel.ERROR, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.log(LogLevel.TRACE, message, context);
  }

  log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isEnabled(level)) return;

    const timestamp = formatTimestamp(this.clock(), this.config.timestamp);

    let line = `${LEVEL_LABELS[level]} - ${message}`;
    if (timestamp !== undefined) {
      line = `[${timestamp}] ${line}`;
    }
    if (context !== undefined) {
      line += ` ${JSON.stringify(context)}`;
    }

    this.writeLine(line);
  }
}
