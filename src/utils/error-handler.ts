/**
 * Error handling utilities for a sampling run.
 *
 * Provides:
 * - A run-level error taxonomy (configuration, degradation, exhaustion, sink, usage)
 * - Classification into fatal and recoverable errors
 * - Typed errors carrying their code
 * - Structured error logging through the run's Logger
 *
 * Failures inside the sampling loop are never thrown past the engine; they
 * are logged here and reported as flags. Only the run entry point turns
 * them into an exit code.
 */

import type { LogContext, Logger } from './logger';

/**
 * Enumeration of run error codes.
 */
export enum RunErrorCode {
  /** Missing, unreadable, malformed or empty input; invalid environment */
  CONFIGURATION = 'CONFIGURATION',
  /** More results requested than there are distinct candidates */
  DEGRADATION = 'DEGRADATION',
  /** No fresh candidate left before the requested count was reached */
  EXHAUSTION = 'EXHAUSTION',
  /** Writing a result failed */
  SINK = 'SINK',
  /** Invalid command line */
  USAGE = 'USAGE',
}

/**
 * Error classification for deciding whether a run can continue.
 */
export enum ErrorClass {
  /** The run cannot start or must stop */
  FATAL = 'FATAL',
  /** The run continues; hard-fail mode decides the exit code */
  RECOVERABLE = 'RECOVERABLE',
}

export function classifyError(code: RunErrorCode): ErrorClass {
  switch (code) {
    case RunErrorCode.CONFIGURATION:
    case RunErrorCode.USAGE:
      return ErrorClass.FATAL;
    case RunErrorCode.DEGRADATION:
    case RunErrorCode.EXHAUSTION:
    case RunErrorCode.SINK:
      return ErrorClass.RECOVERABLE;
  }
}

/**
 * Base class for errors that carry a run error code.
 */
export class RunError extends Error {
  constructor(
    message: string,
    readonly code: RunErrorCode
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Invalid configuration: empty inputs, bad environment values.
 */
export class ConfigurationError extends RunError {
  constructor(message: string) {
    super(message, RunErrorCode.CONFIGURATION);
  }
}

/**
 * Invalid command line.
 */
export class UsageError extends RunError {
  constructor(message: string) {
    super(message, RunErrorCode.USAGE);
  }
}

export enum LoadErrorCode {
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  READ_ERROR = 'READ_ERROR',
  PARSE_ERROR = 'PARSE_ERROR',
  INVALID_SHAPE = 'INVALID_SHAPE',
}

/**
 * Catalog or candidate list could not be loaded.
 */
export class LoadError extends RunError {
  constructor(
    message: string,
    readonly path: string,
    readonly reason: LoadErrorCode,
    readonly field?: string
  ) {
    super(message, RunErrorCode.CONFIGURATION);
  }
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Extracts a message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Logs an error with its code and classification.
 *
 * Logging behavior based on classification:
 * - Fatal: error level; stack trace follows at debug level
 * - Recoverable: error level, no stack
 */
export function logError(
  logger: Logger,
  error: unknown,
  code: RunErrorCode,
  context?: LogContext
): void {
  const errorClass = classifyError(code);

  logger.error(errorMessage(error), {
    errorCode: code,
    errorClass,
    ...context,
  });

  if (
    errorClass === ErrorClass.FATAL &&
    error instanceof Error &&
    error.stack !== undefined
  ) {
    logger.debug(error.stack);
  }
}
