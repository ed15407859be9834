/**
 * Input validation for command-line values.
 *
 * Provides validation for:
 * - Positive, non-zero integers (result count, table width)
 * - Timestamp modes for log lines
 * - Display flag combinations (at most one output mode; table width only with table)
 */

import {
  TIMESTAMP_MODES,
  OutputMode,
  type TimestampMode,
} from '../types/config.types';
import {
  invalid,
  valid,
  ValidationErrorCode,
  type ParseResult,
  type ValidationError,
  type ValidationResult,
} from '../types/validation.types';

const POSITIVE_INTEGER_MESSAGE = 'must be a positive, non-zero integer';
const UNSIGNED_DIGITS = /^\+?\d+$/;

/**
 * Parses a positive, non-zero integer from a command-line string.
 *
 * @param value - Raw argument value
 * @param fieldName - Name of the argument (for error messages)
 *
 * @example
 * ```typescript
 * validatePositiveInteger('5', 'number');  // { isValid: true, value: 5 }
 * validatePositiveInteger('0', 'number');  // isValid: false
 * ```
 */
export function validatePositiveInteger(
  value: string | undefined,
  fieldName: string
): ParseResult<number> {
  if (value === undefined) {
    return invalid({
      code: ValidationErrorCode.MISSING_PARAMETER,
      message: `${fieldName} is required`,
      field: fieldName,
      details: { expected: 'positive, non-zero integer' },
    });
  }

  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (
    !UNSIGNED_DIGITS.test(trimmed) ||
    !Number.isSafeInteger(parsed) ||
    parsed === 0
  ) {
    return invalid({
      code: ValidationErrorCode.INVALID_VALUE,
      message: `${fieldName} ${POSITIVE_INTEGER_MESSAGE}`,
      field: fieldName,
      details: { expected: 'positive, non-zero integer', received: value },
    });
  }

  return valid(parsed);
}

export function isTimestampMode(value: string): value is TimestampMode {
  return TIMESTAMP_MODES.some(mode => mode === value);
}

export function validateTimestampMode(
  value: string | undefined,
  fieldName: string = 'timestamp'
): ParseResult<TimestampMode> {
  if (value === undefined || !isTimestampMode(value)) {
    return invalid({
      code: ValidationErrorCode.INVALID_VALUE,
      message: `invalid value for '${fieldName}'`,
      field: fieldName,
      details: {
        expected: TIMESTAMP_MODES.join(', '),
        received: value,
      },
    });
  }
  return valid(value);
}

/**
 * Checks that at most one display mode was chosen and that a table width
 * is only given together with table output.
 */
export function validateDisplayFlags(
  modes: readonly OutputMode[],
  tableWidthGiven: boolean
): ValidationResult {
  const errors: ValidationError[] = [];

  const distinct = Array.from(new Set(modes));
  if (distinct.length > 1) {
    errors.push({
      code: ValidationErrorCode.INVALID_VALUE,
      message: `display modes cannot be combined: ${distinct
        .map(mode => `--${mode}`)
        .join(', ')}`,
      field: 'display',
      details: { expected: 'one of --table, --readable, --csv' },
    });
  }

  if (tableWidthGiven && !distinct.includes(OutputMode.TABLE)) {
    errors.push({
      code: ValidationErrorCode.INVALID_VALUE,
      message: '--table-width requires --table',
      field: 'table-width',
    });
  }

  return { isValid: errors.length === 0, errors };
}
