/**
 * Shared result types for validators.
 */

/**
 * Enumeration of validation error codes.
 */
export enum ValidationErrorCode {
  /** Required value is absent */
  MISSING_PARAMETER = 'MISSING_PARAMETER',
  /** Value has the wrong type (e.g. string instead of array) */
  INVALID_TYPE = 'INVALID_TYPE',
  /** Value has the right type but is out of range or malformed */
  INVALID_VALUE = 'INVALID_VALUE',
}

/**
 * Detailed validation error information.
 */
export interface ValidationError {
  /** Machine-readable error code */
  code: ValidationErrorCode;
  /** Human-readable error message */
  message: string;
  /** Path of the offending value, e.g. `catalog["7"].title` */
  field: string;
  details?: {
    /** Expected format or value */
    expected?: string;
    /** Actual value received */
    received?: unknown;
    [key: string]: unknown;
  };
}

/**
 * Result of a validation that only reports success or failure.
 */
export interface ValidationResult {
  isValid: boolean;
  /** Empty when isValid is true */
  errors: ValidationError[];
}

export interface ValidResult<T> {
  isValid: true;
  value: T;
  errors: never[];
}

export interface InvalidResult {
  isValid: false;
  errors: ValidationError[];
}

/**
 * Result of a validation that also produces the parsed value.
 */
export type ParseResult<T> = ValidResult<T> | InvalidResult;

export function valid<T>(value: T): ValidResult<T> {
  return { isValid: true, value, errors: [] };
}

export function invalid(...errors: ValidationError[]): InvalidResult {
  return { isValid: false, errors };
}

/**
 * Describes the JSON type of a value for error details.
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
